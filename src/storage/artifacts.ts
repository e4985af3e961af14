import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { ClassifiedPaperSchema, type ClassifiedPaper } from '../agents/schemas';
import { dateTag, publishedDay } from '../ingest/arxiv/util';
import { PaperSchema, type GroupedPapers, type Paper } from '../ingest/types';
import { safeSegment } from '../utils/canonicalize';
import { readTextIfExists, writeJsonAtomic } from '../utils/jsonFile';
import { createLogger, errorMessage, type Logger } from '../utils/logger';

export const RawBatchSchema = z.object({
  generated_at: z.string(),
  paper_date: z.string(),
  categories: z.array(z.string()),
  paper_count: z.number().int().nonnegative(),
  papers: z.array(PaperSchema),
});

export type RawBatch = z.infer<typeof RawBatchSchema>;

export const DailyBatchSchema = z.object({
  generated_at: z.string(),
  source_raw_files: z.array(z.string()),
  source_raw_file: z.string().optional(),
  paper_count: z.number().int().nonnegative(),
  papers: z.array(ClassifiedPaperSchema),
});

export type DailyBatch = z.infer<typeof DailyBatchSchema>;

function isoTimestamp(now: Date): string {
  return now.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

/**
 * Writes one raw batch per (category, published day) under
 * `<rawDir>/<YYYYMMDD>/<cattag>/raw_<cattag>_<YYYYMMDD>.json`.
 */
export async function storeRawFiles(
  grouped: GroupedPapers,
  rawDir: string,
  now: Date = new Date()
): Promise<string[]> {
  const fallbackTag = dateTag(now);
  const created: string[] = [];

  for (const category of Object.keys(grouped).sort()) {
    const papers = grouped[category] ?? [];
    if (papers.length === 0) continue;

    const catTag = category.replace(/\./g, '');
    const byDate = new Map<string, Paper[]>();
    for (const paper of papers) {
      const day = publishedDay(paper.published);
      const tag = day ? day.replace(/-/g, '') : fallbackTag;
      const bucket = byDate.get(tag) ?? [];
      bucket.push(paper);
      byDate.set(tag, bucket);
    }

    for (const tag of [...byDate.keys()].sort()) {
      const datePapers = byDate.get(tag) ?? [];
      const filePath = path.join(rawDir, tag, catTag, `raw_${catTag}_${tag}.json`);
      const payload: RawBatch = {
        generated_at: isoTimestamp(now),
        paper_date: tag,
        categories: [category],
        paper_count: datePapers.length,
        papers: datePapers,
      };
      await writeJsonAtomic(filePath, payload);
      created.push(filePath);
    }
  }

  return created;
}

/** Papers from every readable raw batch, in file order. Missing or malformed files are skipped. */
export async function combinePapers(
  rawFiles: string[],
  logger: Logger = createLogger('Artifacts')
): Promise<Paper[]> {
  const combined: Paper[] = [];
  for (const rawFile of rawFiles) {
    const text = await readTextIfExists(rawFile);
    if (text === null) {
      logger.warn(`Raw file ${rawFile} is missing; skipping`);
      continue;
    }
    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (error) {
      logger.warn(`Raw file ${rawFile} is not valid JSON; skipping`, { error: errorMessage(error) });
      continue;
    }
    const parsed = RawBatchSchema.safeParse(data);
    if (!parsed.success) {
      logger.warn(`Raw file ${rawFile} does not look like a raw batch; skipping`);
      continue;
    }
    combined.push(...parsed.data.papers);
  }
  return combined;
}

export async function storeDailyFile(
  papers: ClassifiedPaper[],
  rawSources: string[],
  dailyDir: string,
  now: Date = new Date()
): Promise<string> {
  const tag = dateTag(now);
  const time = now.toISOString().slice(11, 19).replace(/:/g, '');
  const dailyPath = path.join(dailyDir, tag, `daily_${tag}_${time}.json`);

  const payload: DailyBatch = {
    generated_at: isoTimestamp(now),
    source_raw_files: rawSources,
    paper_count: papers.length,
    papers,
  };
  if (rawSources.length === 1) {
    payload.source_raw_file = rawSources[0];
  }

  await writeJsonAtomic(dailyPath, payload);
  return dailyPath;
}

export async function loadDailyFile(dailyPath: string): Promise<DailyBatch> {
  const text = await fs.readFile(dailyPath, 'utf8');
  return DailyBatchSchema.parse(JSON.parse(text));
}

function paperFilename(paper: ClassifiedPaper): string {
  const slug = paper.arxiv_id.trim()
    ? safeSegment(paper.arxiv_id, '')
    : safeSegment(paper.title, '');
  return `${slug || `paper-${paper.order}`}.json`;
}

/** One JSON file per paper under `<archive>/<primary_area>/<secondary_focus>/<application_domain>/`. */
export async function storeArchiveFiles(
  papers: ClassifiedPaper[],
  archiveRoot: string
): Promise<string[]> {
  const stored: string[] = [];
  for (const paper of papers) {
    const destPath = path.join(
      archiveRoot,
      safeSegment(paper.primary_area, 'uncategorised'),
      safeSegment(paper.secondary_focus, 'general'),
      safeSegment(paper.application_domain, 'general'),
      paperFilename(paper)
    );
    await writeJsonAtomic(destPath, paper);
    stored.push(destPath);
  }
  return stored;
}

async function listDirectory(dir: string): Promise<string[]> {
  try {
    return await fs.readdir(dir);
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return [];
    }
    throw error;
  }
}

async function papersInDateDir(dir: string): Promise<ClassifiedPaper[]> {
  const files = (await listDirectory(dir))
    .filter((name) => name.startsWith('daily_') && name.endsWith('.json'))
    .sort();
  const papers: ClassifiedPaper[] = [];
  for (const file of files) {
    const batch = await loadDailyFile(path.join(dir, file));
    papers.push(...batch.papers);
  }
  return papers;
}

export interface PaperQuery {
  keyword?: string;
  /** `YYYY-MM-DD`; defaults to the newest day that has any papers. */
  date?: string;
}

export async function queryPapers(dailyDir: string, query: PaperQuery = {}): Promise<ClassifiedPaper[]> {
  let papers: ClassifiedPaper[] = [];

  if (query.date) {
    papers = await papersInDateDir(path.join(dailyDir, query.date.replace(/-/g, '')));
  } else {
    const dateDirs = (await listDirectory(dailyDir)).filter((name) => /^\d{8}$/.test(name)).sort().reverse();
    for (const dir of dateDirs) {
      papers = await papersInDateDir(path.join(dailyDir, dir));
      if (papers.length > 0) break;
    }
  }

  const keyword = query.keyword?.trim().toLowerCase();
  if (!keyword) {
    return papers;
  }
  return papers.filter((paper) =>
    [paper.title, paper.summary, paper.tldr, paper.primary_area, paper.secondary_focus].some((field) =>
      field.toLowerCase().includes(keyword)
    )
  );
}
