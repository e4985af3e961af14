import { z } from 'zod';
import { PaperSchema } from '../ingest/types';
import { uniqueTokens } from '../utils/canonicalize';

const LabelSchema = z
  .union([z.string(), z.number(), z.boolean()])
  .transform((value) => String(value).trim());

/**
 * `interest_tags` arrives as a list, a single string, or not at all.
 * Each shape is tagged first, then normalised to a de-duplicated list.
 */
type RawInterestTags =
  | { kind: 'absent' }
  | { kind: 'single'; value: string }
  | { kind: 'list'; values: unknown[] };

const RawInterestTagsSchema: z.ZodType<RawInterestTags, z.ZodTypeDef, unknown> = z.union([
  z.string().transform((value): RawInterestTags => ({ kind: 'single', value })),
  z.array(z.unknown()).transform((values): RawInterestTags => ({ kind: 'list', values })),
  z.unknown().transform((): RawInterestTags => ({ kind: 'absent' })),
]);

export function normalizeInterestTagField(raw: RawInterestTags): string[] {
  switch (raw.kind) {
    case 'absent':
      return [];
    case 'single':
      return uniqueTokens([raw.value]);
    case 'list':
      return uniqueTokens(
        raw.values.filter(
          (value) =>
            typeof value === 'string' ||
            typeof value === 'number' ||
            typeof value === 'boolean'
        )
      );
  }
}

export const InterestTagsFieldSchema = RawInterestTagsSchema.transform(normalizeInterestTagField);

export const ClassificationSchema = z
  .object({
    primary_area: LabelSchema,
    secondary_focus: LabelSchema,
    application_domain: LabelSchema,
    tldr: LabelSchema.optional(),
    tldr_zh: LabelSchema.optional(),
    interest_tags: InterestTagsFieldSchema,
  })
  .refine((data) => data.tldr !== undefined || data.tldr_zh !== undefined, {
    message: 'Required',
    path: ['tldr'],
  })
  .transform((data) => ({
    primary_area: data.primary_area,
    secondary_focus: data.secondary_focus,
    application_domain: data.application_domain,
    tldr: data.tldr ?? data.tldr_zh ?? '',
    interest_tags: data.interest_tags,
  }));

export type ClassificationOutput = z.infer<typeof ClassificationSchema>;

export const ClassifiedPaperSchema = PaperSchema.extend({
  primary_area: z.string(),
  secondary_focus: z.string(),
  application_domain: z.string(),
  tldr: z.string(),
  interest_tags: z.array(z.string()),
  order: z.number().int().positive(),
  papers_cool_url: z.string(),
});

export type ClassifiedPaper = z.infer<typeof ClassifiedPaperSchema>;

const KeywordsSchema = z
  .union([z.string(), z.array(z.unknown()), z.null(), z.undefined()])
  .transform((value) => {
    if (typeof value === 'string') return uniqueTokens([value]);
    if (Array.isArray(value)) return uniqueTokens(value);
    return [];
  });

export const InterestTagSchema = z.object({
  label: z.string().trim().min(1),
  description: z.string().trim().default(''),
  keywords: KeywordsSchema.default([]),
});

export type InterestTag = z.infer<typeof InterestTagSchema>;
export type InterestTagInput = z.input<typeof InterestTagSchema>;
