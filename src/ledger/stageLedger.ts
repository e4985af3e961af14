import * as path from 'path';
import { z } from 'zod';
import type { Stage } from '../pipeline/types';
import { readTextIfExists, writeJsonAtomic } from '../utils/jsonFile';
import { createLogger, type Logger } from '../utils/logger';

export const LEDGER_FILENAME = 'automation_status.json';

const StageRecordSchema = z
  .object({
    completed: z.boolean().optional(),
    timestamp: z.string().optional(),
    raw_files: z.array(z.string()).optional(),
    daily_file: z.string().optional(),
  })
  .passthrough();

const LedgerDocumentSchema = z.record(z.string(), z.record(z.string(), StageRecordSchema));

export type StageRecord = z.infer<typeof StageRecordSchema>;
export type DayStatus = Record<string, StageRecord>;
export type LedgerDocument = Record<string, DayStatus>;
export interface StageExtras {
  raw_files?: string[];
  daily_file?: string;
}

/**
 * Per-day, per-stage completion record kept in one JSON document.
 *
 * Every mutation re-reads the file, applies the change and replaces the
 * document atomically. There is no locking: one writer per file is assumed.
 */
export class StageLedger {
  constructor(
    readonly filePath: string,
    private readonly logger: Logger = createLogger('Ledger')
  ) {}

  static forDataRoot(dataRoot: string, logger?: Logger): StageLedger {
    return new StageLedger(path.join(dataRoot, LEDGER_FILENAME), logger);
  }

  async load(): Promise<LedgerDocument> {
    const text = await readTextIfExists(this.filePath);
    if (text === null) {
      return {};
    }

    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch {
      this.logger.warn(`Ledger at ${this.filePath} is not valid JSON; treating as empty`);
      return {};
    }

    const parsed = LedgerDocumentSchema.safeParse(data);
    if (!parsed.success) {
      this.logger.warn(`Ledger at ${this.filePath} has an unexpected shape; treating as empty`);
      return {};
    }
    return parsed.data;
  }

  async isStageDone(day: string, stage: Stage): Promise<boolean> {
    const info = await this.getStageInfo(day, stage);
    return info.completed === true;
  }

  async getStageInfo(day: string, stage: Stage): Promise<StageRecord> {
    const store = await this.load();
    return { ...(store[day]?.[stage] ?? {}) };
  }

  async markStage(day: string, stage: Stage, extra: StageExtras = {}): Promise<void> {
    const store = await this.load();
    const dayStatus = store[day] ?? {};
    dayStatus[stage] = {
      completed: true,
      timestamp: new Date().toISOString(),
      ...extra,
    };
    store[day] = dayStatus;
    await writeJsonAtomic(this.filePath, store);
  }

  async clearStage(day: string, stages: Stage[]): Promise<void> {
    const store = await this.load();
    const dayStatus = store[day] ?? {};
    for (const stage of stages) {
      delete dayStatus[stage];
    }
    store[day] = dayStatus;
    await writeJsonAtomic(this.filePath, store);
  }

  /** Entries for the `days` most recent UTC days, today included. */
  async recentDays(days: number, now: Date = new Date()): Promise<LedgerDocument> {
    const store = await this.load();
    const result: LedgerDocument = {};
    for (let i = 0; i < days; i++) {
      const day = new Date(now.getTime() - i * 86_400_000).toISOString().slice(0, 10);
      const entry = store[day];
      if (entry) {
        result[day] = entry;
      }
    }
    return result;
  }
}
