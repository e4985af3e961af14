import { createLogger, type Logger } from '../utils/logger';

export type PipelineEvent =
  | { type: 'day_resolved'; date: string }
  | { type: 'scraped'; paper_count: number; category_count: number; reused: boolean }
  | { type: 'classified'; paper_count: number; reused: boolean }
  | { type: 'sent'; channels: string[] }
  | { type: 'send_skipped'; reason: string };

export interface PipelineEventSink extends Logger {
  emit(event: PipelineEvent): void;
}

type Level = 'info' | 'warn' | 'error';

export interface LogLine {
  level: Level;
  message: string;
  context?: Record<string, unknown>;
}

/** Sink that logs events through a `Logger` and keeps nothing. */
export function loggingSink(logger: Logger = createLogger('Pipeline')): PipelineEventSink {
  return {
    error: (msg, ctx) => logger.error(msg, ctx),
    warn: (msg, ctx) => logger.warn(msg, ctx),
    info: (msg, ctx) => logger.info(msg, ctx),
    emit: (event) => logger.info(`event: ${event.type}`, { ...event }),
  };
}

/**
 * Collects one run's events and log lines for a supervisor to read back.
 * Lines are also forwarded when a logger is given.
 */
export class RunLog implements PipelineEventSink {
  readonly events: PipelineEvent[] = [];
  readonly lines: LogLine[] = [];

  constructor(private readonly forward?: Logger) {}

  emit(event: PipelineEvent): void {
    this.events.push(event);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.record('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.record('warn', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.record('error', message, context);
  }

  last<T extends PipelineEvent['type']>(type: T): Extract<PipelineEvent, { type: T }> | undefined {
    for (let i = this.events.length - 1; i >= 0; i--) {
      const event = this.events[i];
      if (event && isEventOfType(event, type)) {
        return event;
      }
    }
    return undefined;
  }

  formatLines(): string[] {
    return this.lines.map((line) => `[${line.level}] ${line.message}`);
  }

  private record(level: Level, message: string, context?: Record<string, unknown>): void {
    this.lines.push(context ? { level, message, context } : { level, message });
    this.forward?.[level](message, context);
  }
}

function isEventOfType<T extends PipelineEvent['type']>(
  event: PipelineEvent,
  type: T
): event is Extract<PipelineEvent, { type: T }> {
  return event.type === type;
}
