import type { Language } from '../agents/config';
import { formatDay, isWeekend } from '../ingest/arxiv/util';
import type { Notifier } from '../notifiers/types';
import { createLogger, errorMessage, type Logger } from '../utils/logger';
import type { PipelineRunner, RunResult } from './types';

const MIN_INTERVAL_SECONDS = 30;

const WEEKEND_REMINDER: Record<Language, (day: string) => string> = {
  en: (day) => `📅 ${day}: arXiv publishes nothing new at the weekend. Enjoy the break!`,
  zh: (day) => `📅 ${day} 周末无新论文更新，请好好休息！`,
};

export interface DailyRunnerOptions {
  supervisor: PipelineRunner;
  notifiers: Notifier[];
  maxAttempts: number;
  intervalSeconds: number;
  language?: Language;
  /** `workday` sends a reminder instead of running on UTC weekends. */
  mode?: 'workday' | 'daily';
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

export type DailyRunReport =
  | { status: 'completed'; attempts: number; result: RunResult }
  | { status: 'exhausted'; attempts: number; result: RunResult | null }
  | { status: 'weekend'; attempts: 0; reminded: boolean };

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Scheduled entry point: retries the whole pipeline until a run completes
 * or attempts run out, waiting `intervalSeconds` between attempts. On a UTC
 * weekend without an explicit date it only sends a reminder.
 */
export class DailyRunner {
  private readonly logger: Logger;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => Date;
  private readonly maxAttempts: number;
  private readonly intervalSeconds: number;

  constructor(private readonly options: DailyRunnerOptions) {
    this.logger = options.logger ?? createLogger('DailyRunner');
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? (() => new Date());
    this.maxAttempts = Math.max(1, Math.floor(options.maxAttempts));
    this.intervalSeconds = Math.max(MIN_INTERVAL_SECONDS, options.intervalSeconds);
  }

  async run(targetDate?: string): Promise<DailyRunReport> {
    const today = this.now();
    if (!targetDate && (this.options.mode ?? 'workday') === 'workday' && isWeekend(today)) {
      this.logger.info('Weekend detected (UTC); skipping scrape and sending reminder');
      const reminded = await this.sendWeekendReminder(formatDay(today));
      return { status: 'weekend', attempts: 0, reminded };
    }

    let last: RunResult | null = null;
    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      this.logger.info(`Attempt ${attempt}/${this.maxAttempts} started at ${this.now().toISOString()}`);
      last = await this.options.supervisor.run({ targetDate });
      this.logger.info(last.summary, { status: last.status, date: last.date });

      if (last.status === 'completed' || last.status === 'already_completed') {
        return { status: 'completed', attempts: attempt, result: last };
      }
      if (attempt < this.maxAttempts) {
        this.logger.info(`Sleeping ${this.intervalSeconds} seconds before next attempt`);
        await this.sleep(this.intervalSeconds * 1000);
      }
    }

    this.logger.warn('All attempts exhausted without a successful run');
    return { status: 'exhausted', attempts: this.maxAttempts, result: last };
  }

  private async sendWeekendReminder(day: string): Promise<boolean> {
    if (this.options.notifiers.length === 0) {
      this.logger.warn('Weekend reminder skipped: no notification channel configured');
      return false;
    }

    const text = WEEKEND_REMINDER[this.options.language ?? 'en'](day);
    let sent = true;
    for (const notifier of this.options.notifiers) {
      try {
        await notifier.sendText(text);
        this.logger.info(`Weekend reminder sent via ${notifier.channel}`);
      } catch (error) {
        sent = false;
        this.logger.error(`Failed to send weekend reminder via ${notifier.channel}: ${errorMessage(error)}`);
      }
    }
    return sent;
  }
}
