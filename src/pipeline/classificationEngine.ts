import { CLASSIFY_CONFIG, type Language } from '../agents/config';
import {
  ClassificationError,
  SchemaValidationError,
  TransportError,
} from '../agents/errors';
import {
  buildClassificationPrompt,
  RETRY_HINT,
  systemPrompt,
} from '../agents/prompts/classification';
import { parseClassificationResponse } from '../agents/responseParser';
import {
  InterestTagSchema,
  type ClassificationOutput,
  type ClassifiedPaper,
  type InterestTag,
  type InterestTagInput,
} from '../agents/schemas';
import type { Paper } from '../ingest/types';
import type { CompletionClient } from '../llm/completionClient';
import { toMirrorUrl } from '../utils/canonicalize';
import { Limiter } from '../utils/limiter';
import { createLogger, type Logger } from '../utils/logger';

export type ProgressCallback = (completed: number, total: number) => void;

export interface ClassifyOptions {
  interestTags?: InterestTagInput[];
  concurrency: number;
  language: Language;
  onProgress?: ProgressCallback;
  /** Receives retry lines; defaults to the engine's own logger. */
  logger?: Logger;
}

/**
 * Drops tags without a label, trims fields, and keeps the first entry
 * for a repeated label.
 */
export function normalizeInterestTags(tags: InterestTagInput[] | undefined): InterestTag[] {
  const normalized: InterestTag[] = [];
  const seen = new Set<string>();
  for (const tag of tags ?? []) {
    const parsed = InterestTagSchema.safeParse(tag);
    if (!parsed.success || seen.has(parsed.data.label)) continue;
    seen.add(parsed.data.label);
    normalized.push(parsed.data);
  }
  return normalized;
}

/**
 * Classifies a batch of papers against a completion backend.
 *
 * Every paper gets its own task up front; a semaphore of size `concurrency`
 * bounds how many are talking to the backend. A task holds its slot across
 * all of its attempts. Results come back in input order, each stamped with
 * its 1-based `order`, whatever order the tasks finish in.
 *
 * The first paper that exhausts its attempts fails the batch. Tasks still
 * waiting for a slot then give up without calling the backend, tasks in
 * flight stop before their next attempt, and progress is no longer reported.
 */
export class ClassificationEngine {
  constructor(
    private readonly client: CompletionClient,
    private readonly logger: Logger = createLogger('Classifier'),
    private readonly maxAttempts: number = CLASSIFY_CONFIG.maxAttempts
  ) {}

  async classify(papers: Paper[], options: ClassifyOptions): Promise<ClassifiedPaper[]> {
    const total = papers.length;
    const limiter = new Limiter(options.concurrency);
    const interestTags = normalizeInterestTags(options.interestTags);
    const logger = options.logger ?? this.logger;
    let completed = 0;
    let failure: unknown = null;
    const stopped = () => failure !== null;

    options.onProgress?.(0, total);

    const tasks = papers.map((paper, index) =>
      limiter.limit(async () => {
        if (failure !== null) {
          throw failure;
        }
        try {
          const enriched = await this.classifyOne(paper, index + 1, interestTags, options.language, logger, stopped);
          if (failure === null) {
            completed += 1;
            options.onProgress?.(completed, total);
          }
          return enriched;
        } catch (error) {
          if (failure === null) {
            failure = error;
          }
          throw error;
        }
      })
    );

    const results = await Promise.all(tasks);
    return results.sort((a, b) => a.order - b.order);
  }

  private async classifyOne(
    paper: Paper,
    order: number,
    interestTags: InterestTag[],
    language: Language,
    logger: Logger,
    stopped: () => boolean
  ): Promise<ClassifiedPaper> {
    const basePrompt = buildClassificationPrompt(paper, interestTags, language);
    const system = systemPrompt(language);
    const paperId = paper.arxiv_id || `#${order}`;
    let lastError: Error | null = null;
    let attempts = 0;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      if (stopped()) {
        break;
      }
      attempts = attempt;
      const userPrompt = attempt === 1 ? basePrompt : basePrompt + RETRY_HINT[language];

      try {
        const raw = await this.requestCompletion(system, userPrompt);
        const fields = parseClassificationResponse(raw);
        if (attempt > 1) {
          logger.info(`Classified ${paperId} on attempt ${attempt}/${this.maxAttempts}`);
        }
        return this.enrich(paper, order, fields);
      } catch (error) {
        if (!(error instanceof TransportError || error instanceof SchemaValidationError)) {
          throw error;
        }
        lastError = error;
        logger.warn(`Retry ${attempt}/${this.maxAttempts} failed for ${paperId}: ${error.message}`, {
          attempt,
          paper_id: paperId,
          error: error.name,
        });
      }
    }

    throw new ClassificationError(
      paperId,
      attempts,
      lastError ?? new Error('batch failed before this paper was attempted')
    );
  }

  private async requestCompletion(system: string, userPrompt: string): Promise<string> {
    try {
      return await this.client.complete({ systemPrompt: system, userPrompt });
    } catch (error) {
      if (error instanceof TransportError) {
        throw error;
      }
      throw new TransportError(
        'completion',
        error instanceof Error ? error.message : String(error),
        error
      );
    }
  }

  private enrich(paper: Paper, order: number, fields: ClassificationOutput): ClassifiedPaper {
    return {
      ...paper,
      ...fields,
      order,
      papers_cool_url: toMirrorUrl(paper.arxiv_url, 'papersCool'),
    };
  }
}
