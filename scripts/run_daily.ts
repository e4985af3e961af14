import 'dotenv/config';
import { ensureDataDirectories, loadProfile } from '../src/config/profile';
import { createPipeline } from '../src/pipeline/createPipeline';
import { DailyRunner } from '../src/pipeline/dailyRunner';
import { parseCliArgs } from '../src/cli/args';

async function main() {
  const args = parseCliArgs(process.argv.slice(2));
  const profile = await loadProfile();
  await ensureDataDirectories(profile);
  const { supervisor, notifiers } = createPipeline(profile);

  const runner = new DailyRunner({
    supervisor,
    notifiers,
    maxAttempts: profile.schedule.max_attempts,
    intervalSeconds: profile.schedule.interval_seconds,
    language: profile.language,
    mode: profile.schedule.mode,
  });

  const report = await runner.run(args.targetDate);
  console.log(JSON.stringify(report, null, 2));
  if (report.status === 'exhausted') {
    process.exitCode = 1;
  }
}

main().catch((error) => {
  console.error('[Daily] Fatal error:', error);
  process.exit(1);
});
