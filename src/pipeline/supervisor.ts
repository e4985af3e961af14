import { createLogger, errorMessage, type Logger } from '../utils/logger';
import { RunLog } from './events';
import type { PipelineOrchestrator } from './orchestrator';
import {
  STAGES,
  type PipelineOutcome,
  type RunOptions,
  type RunResult,
  type Stage,
  type StageState,
} from './types';

type LiveStageState = StageState | 'running';

function initialStages(): Record<Stage, LiveStageState> {
  return { scrape: 'skipped', classify: 'skipped', send: 'skipped' };
}

function settle(state: LiveStageState): StageState {
  return state === 'running' ? 'failed' : state;
}

/**
 * Wraps one orchestrator run into a `RunResult`. Never throws: an exception
 * becomes `status: 'error'` with the stage that was running.
 */
export class RunSupervisor {
  constructor(
    private readonly orchestrator: PipelineOrchestrator,
    private readonly logger: Logger = createLogger('Supervisor')
  ) {}

  async run(options: RunOptions = {}): Promise<RunResult> {
    const log = new RunLog(this.logger);
    const stages = initialStages();

    const onStage: RunOptions['onStage'] = (stage, event) => {
      stages[stage] = event === 'start' ? 'running' : 'ok';
      options.onStage?.(stage, event);
    };

    let outcome: PipelineOutcome | null = null;
    let failure: { stage: Stage | null; message: string } | null = null;

    try {
      outcome = await this.orchestrator.runFullPipeline({
        targetDate: options.targetDate,
        onStage,
        onClassifyProgress: options.onClassifyProgress,
        sink: log,
      });
    } catch (error) {
      const running = STAGES.find((stage) => stages[stage] === 'running') ?? null;
      failure = { stage: running, message: errorMessage(error) };
      log.error(`Pipeline failed: ${failure.message}`, { stage: running ?? 'unknown' });
    }

    const finalStages: Record<Stage, StageState> = {
      scrape: settle(stages.scrape),
      classify: settle(stages.classify),
      send: settle(stages.send),
    };

    const scraped = log.last('scraped');
    const classified = log.last('classified');
    const paperCount = scraped?.paper_count ?? classified?.paper_count ?? 0;
    const date = outcome?.date ?? log.last('day_resolved')?.date ?? options.targetDate ?? '';

    if (failure) {
      return {
        status: 'error',
        date,
        stages: finalStages,
        paper_count: paperCount,
        summary: `Pipeline failed at ${failure.stage ?? 'unknown'} stage: ${failure.message}`,
        errors: [failure.message],
        log: log.formatLines(),
      };
    }

    const status = outcome ? outcome.status : 'error';
    return {
      status,
      date,
      stages: finalStages,
      paper_count: paperCount,
      summary: this.summarize(status, log, paperCount),
      errors: [],
      log: log.formatLines(),
    };
  }

  private summarize(status: RunResult['status'], log: RunLog, paperCount: number): string {
    switch (status) {
      case 'no_papers':
        return 'No papers found for the target date.';
      case 'already_completed':
        return 'Pipeline already completed for this date; nothing to do.';
      case 'completed': {
        const categories = log.last('scraped')?.category_count ?? 0;
        const classified = log.last('classified')?.paper_count ?? paperCount;
        const sent = log.last('sent');
        const delivery =
          sent && sent.channels.length > 0
            ? `sent via ${sent.channels.join(', ')}`
            : 'no notification channel configured';
        return `Scraped ${paperCount} papers across ${categories} categories, classified ${classified}, ${delivery}.`;
      }
      default:
        return `Pipeline finished with status: ${status}.`;
    }
  }
}
