import { resolveApiKey, resolveDataRoot, type Profile } from '../config/profile';
import { ArxivSource } from '../ingest/arxiv/client';
import type { Source } from '../ingest/types';
import { StageLedger } from '../ledger/stageLedger';
import { GeminiCompletionClient, type CompletionClient } from '../llm/completionClient';
import { buildNotifiers } from '../notifiers/registry';
import type { Notifier } from '../notifiers/types';
import { ClassificationEngine } from './classificationEngine';
import { PipelineOrchestrator } from './orchestrator';
import { RunSupervisor } from './supervisor';

export interface PipelineOverrides {
  ledger?: StageLedger;
  source?: Source;
  client?: CompletionClient;
  notifiers?: Notifier[];
  env?: NodeJS.ProcessEnv;
}

export interface Pipeline {
  profile: Profile;
  ledger: StageLedger;
  notifiers: Notifier[];
  orchestrator: PipelineOrchestrator;
  supervisor: RunSupervisor;
}

/** Wires the collaborators for one profile. Anything passed in `overrides` replaces the default. */
export function createPipeline(profile: Profile, overrides: PipelineOverrides = {}): Pipeline {
  const env = overrides.env ?? process.env;
  const ledger = overrides.ledger ?? StageLedger.forDataRoot(resolveDataRoot(profile, env));
  const client =
    overrides.client ??
    new GeminiCompletionClient({
      apiKey: resolveApiKey(profile.llm, env),
      model: profile.llm.model,
      temperature: profile.llm.temperature,
      timeoutMs: profile.llm.timeout_ms,
    });
  const notifiers = overrides.notifiers ?? buildNotifiers(profile.channels);

  const orchestrator = new PipelineOrchestrator({
    profile,
    ledger,
    source: overrides.source ?? new ArxivSource(),
    engine: new ClassificationEngine(client),
    notifiers,
  });

  return {
    profile,
    ledger,
    notifiers,
    orchestrator,
    supervisor: new RunSupervisor(orchestrator),
  };
}
