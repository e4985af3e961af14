import { XMLParser } from 'fast-xml-parser';
import { z } from 'zod';
import { TransportError } from '../../agents/errors';
import { storeRawFiles } from '../../storage/artifacts';
import { defaultFetch, type HttpFetch } from '../../utils/http';
import { limit } from '../../utils/limiter';
import { createLogger, errorMessage, type Logger } from '../../utils/logger';
import { withRetry, type RetryOptions } from '../../utils/retry';
import type { GroupedPapers, Paper, Source } from '../types';
import { extractArxivId, formatDay, publishedDay, resolveTargetDate } from './util';

export const ARXIV_API_URLS = [
  'https://export.arxiv.org/api/query',
  'http://export.arxiv.org/api/query',
];

const PAGE_SIZE = 200;

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '',
  trimValues: true,
  parseTagValue: false,
  isArray: (name) => name === 'entry' || name === 'author',
});

const EntrySchema = z.object({
  id: z.unknown(),
  title: z.unknown(),
  summary: z.unknown(),
  published: z.unknown(),
  author: z.array(z.object({ name: z.unknown() }).passthrough()).optional(),
  'arxiv:primary_category': z.object({ term: z.string() }).passthrough().optional(),
});

const FeedSchema = z.object({
  feed: z
    .object({
      entry: z.array(EntrySchema).optional(),
    })
    .passthrough(),
});

type FeedEntry = z.infer<typeof EntrySchema>;

function textOf(value: unknown): string {
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number') return String(value);
  if (value && typeof value === 'object' && '#text' in value) {
    return textOf(value['#text']);
  }
  return '';
}

export function parseFeed(xml: string): FeedEntry[] {
  const parsed = FeedSchema.safeParse(parser.parse(xml));
  if (!parsed.success) {
    throw new TransportError('arxiv', 'response is not an Atom feed');
  }
  return parsed.data.feed.entry ?? [];
}

function toPaper(entry: FeedEntry, published: string, primaryCategory: string): Paper {
  const arxivId = extractArxivId(textOf(entry.id));
  return {
    arxiv_id: arxivId,
    title: textOf(entry.title).replace(/\s+/g, ' '),
    summary: textOf(entry.summary),
    authors: (entry.author ?? []).map((author) => textOf(author.name)).filter(Boolean),
    published,
    primary_category: primaryCategory,
    arxiv_url: arxivId ? `https://arxiv.org/abs/${arxivId}` : '',
  };
}

export interface ArxivSourceOptions {
  fetch?: HttpFetch;
  baseUrls?: string[];
  maxResults?: number;
  timeoutMs?: number;
  retry?: RetryOptions;
  logger?: Logger;
}

export class ArxivSource implements Source {
  private readonly http: HttpFetch;
  private readonly baseUrls: string[];
  private readonly logger: Logger;

  constructor(private readonly options: ArxivSourceOptions = {}) {
    this.http = options.fetch ?? defaultFetch;
    this.baseUrls = options.baseUrls ?? ARXIV_API_URLS;
    this.logger = options.logger ?? createLogger('arXiv');
  }

  resolveTargetDate(targetDate?: string): Date {
    return resolveTargetDate(targetDate);
  }

  async fetch(categories: string[], targetDate?: string): Promise<GroupedPapers> {
    const cats = categories.map((c) => c.trim()).filter(Boolean);
    if (cats.length === 0) {
      throw new RangeError('At least one arXiv category must be provided');
    }

    const day = formatDay(this.resolveTargetDate(targetDate));
    const results: GroupedPapers = {};
    for (const category of cats) {
      results[category] = await this.fetchCategory(category, day);
      this.logger.info(`Fetched ${results[category]?.length ?? 0} papers for ${category} on ${day}`);
    }
    return results;
  }

  saveRaw(grouped: GroupedPapers, dir: string): Promise<string[]> {
    return storeRawFiles(grouped, dir);
  }

  /**
   * Pages through `cat:<category>` newest first, keeping entries published on
   * `day` whose primary category is `category`, until an older entry shows up.
   */
  private async fetchCategory(category: string, day: string): Promise<Paper[]> {
    const maxResults = this.options.maxResults;
    const collected: Paper[] = [];
    let start = 0;
    let remaining = maxResults;

    while (remaining === undefined || remaining > 0) {
      const batchSize = remaining === undefined ? PAGE_SIZE : Math.min(PAGE_SIZE, remaining);
      const entries = parseFeed(
        await this.fetchFeed({
          search_query: `cat:${category}`,
          start: String(start),
          max_results: String(batchSize),
          sortBy: 'submittedDate',
          sortOrder: 'descending',
        })
      );
      if (entries.length === 0) break;

      let olderReached = false;
      for (const entry of entries) {
        const published = textOf(entry.published);
        const entryDay = publishedDay(published);
        if (!entryDay) continue;
        if (entryDay < day) {
          olderReached = true;
          break;
        }
        if (entryDay > day) continue;

        const primary = entry['arxiv:primary_category']?.term ?? '';
        if (primary !== category) continue;

        collected.push(toPaper(entry, published, primary));
      }

      start += entries.length;
      if (remaining !== undefined) {
        remaining -= entries.length;
      }
      if (olderReached || entries.length < batchSize) break;
    }

    return maxResults === undefined ? collected : collected.slice(0, maxResults);
  }

  private async fetchFeed(params: Record<string, string>): Promise<string> {
    const query = new URLSearchParams(params).toString();
    let lastError: unknown;

    for (const baseUrl of this.baseUrls) {
      try {
        return await limit('arxiv', () =>
          withRetry(
            async () => {
              const res = await this.http(`${baseUrl}?${query}`, {
                timeout: this.options.timeoutMs ?? 30_000,
              });
              if (!res.ok) {
                throw new TransportError('arxiv', `HTTP ${res.status} ${await res.text()}`, undefined, res.status);
              }
              return res.text();
            },
            {
              tries: 3,
              baseMs: 1000,
              maxMs: 5000,
              shouldRetry: () => true,
              onRetry: (error, attempt) =>
                this.logger.warn(`Retry ${attempt}/3 failed on ${baseUrl}: ${errorMessage(error)}`),
              ...this.options.retry,
            }
          )
        );
      } catch (error) {
        lastError = error;
        this.logger.warn(`Giving up on ${baseUrl}: ${errorMessage(error)}`);
      }
    }

    throw new TransportError('arxiv', `failed to query arXiv: ${errorMessage(lastError)}`, lastError);
  }
}
