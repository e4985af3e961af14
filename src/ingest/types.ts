import { z } from 'zod';

export const PaperSchema = z.object({
  arxiv_id: z.string(),
  title: z.string(),
  summary: z.string(),
  authors: z.array(z.string()),
  published: z.string(),
  primary_category: z.string(),
  arxiv_url: z.string(),
});

export type Paper = z.infer<typeof PaperSchema>;

export type GroupedPapers = Record<string, Paper[]>;

export interface Source {
  fetch(categories: string[], targetDate?: string): Promise<GroupedPapers>;
  /** Persists non-empty groups as raw batch files and returns their paths. */
  saveRaw(grouped: GroupedPapers, dir: string): Promise<string[]>;
  /** Parses an explicit YYYY-MM-DD, or picks the most recent weekday before today (UTC). */
  resolveTargetDate(targetDate?: string): Date;
}
