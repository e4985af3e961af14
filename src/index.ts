#!/usr/bin/env node
import 'dotenv/config';
import { parseCliArgs, USAGE, type CliArgs } from './cli/args';
import { ensureDataDirectories, loadProfile } from './config/profile';
import { createPipeline } from './pipeline/createPipeline';
import { errorMessage } from './utils/logger';

function readArgs(): CliArgs {
  try {
    return parseCliArgs(process.argv.slice(2));
  } catch (error) {
    console.error(errorMessage(error));
    console.error(USAGE);
    process.exit(2);
  }
}

async function main(): Promise<void> {
  const args = readArgs();

  if (args.help) {
    console.log(USAGE);
    return;
  }

  const profile = await loadProfile();
  await ensureDataDirectories(profile);
  const { orchestrator, supervisor } = createPipeline(profile);

  if (args.scrapeOnly) {
    const rawFiles = await orchestrator.runScrapeOnly(args.targetDate);
    console.log(JSON.stringify({ raw_files: rawFiles }, null, 2));
    return;
  }

  const result = await supervisor.run({
    targetDate: args.targetDate,
    onStage: (stage, event) => console.error(`[${stage}] ${event}`),
    onClassifyProgress: (completed, total) => console.error(`[classify] ${completed}/${total}`),
  });
  console.log(JSON.stringify(result, null, 2));
  if (result.status === 'error') {
    process.exitCode = 1;
  }
}

if (require.main === module) {
  main().catch((error) => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
}

export { parseProfile, loadProfile } from './config/profile';
export { createPipeline } from './pipeline/createPipeline';
export { PipelineOrchestrator } from './pipeline/orchestrator';
export { RunSupervisor } from './pipeline/supervisor';
export { DailyRunner } from './pipeline/dailyRunner';
export { ClassificationEngine } from './pipeline/classificationEngine';
export { StageLedger } from './ledger/stageLedger';
export * from './agents/schemas';
export * from './pipeline/types';
