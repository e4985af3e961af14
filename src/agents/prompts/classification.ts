import { z } from 'zod';
import type { Language } from '../config';
import type { InterestTag } from '../schemas';
import type { Paper } from '../../ingest/types';
import taxonomyData from './taxonomy.json';

const DIMENSIONS = ['primary_area', 'secondary_focus', 'application_domain'] as const;

const TaxonomyEntrySchema = z.object({ id: z.string(), description: z.string() });
const TaxonomySchema = z.object({
  primary_area: z.array(TaxonomyEntrySchema),
  secondary_focus: z.array(TaxonomyEntrySchema),
  application_domain: z.array(TaxonomyEntrySchema),
});

export type Taxonomy = z.infer<typeof TaxonomySchema>;

export const TAXONOMY: Record<Language, Taxonomy> = z
  .object({ en: TaxonomySchema, zh: TaxonomySchema })
  .parse(taxonomyData);

const SUMMARY_LANGUAGE: Record<Language, string> = {
  en: 'English',
  zh: 'Chinese',
};

export function systemPrompt(language: Language): string {
  return (
    'You are an expert research analyst. ' +
    'Classify each arXiv paper using the reference taxonomy ' +
    '(you may also suggest new labels when needed) and summarise it in ' +
    `${SUMMARY_LANGUAGE[language]}.`
  );
}

const INTEREST_TAGS_HEADER: Record<Language, string> = {
  en:
    'Interest tags (only include a tag ID in the `interest_tags` JSON array ' +
    'when the paper strongly matches its description/keywords; otherwise leave it empty):',
  zh: '兴趣标签（仅在论文与描述/关键词高度匹配时，才在 JSON 的 `interest_tags` 数组中返回对应标签 ID；否则留空）：',
};

const KEYWORDS_LABEL: Record<Language, string> = { en: 'Keywords:', zh: '关键词:' };

export const RETRY_HINT: Record<Language, string> = {
  en: '\n\nWARNING: The previous response failed to parse. Return ONLY a strict JSON object without Markdown code fences or extra text.',
  zh: '\n\nWARNING: 上一次响应解析失败，请仅返回严格的 JSON 对象，不要包含 Markdown 代码块或额外说明。',
};

export function formatTaxonomyReference(language: Language): string {
  const taxonomy = TAXONOMY[language];
  const lines: string[] = [];
  for (const dimension of DIMENSIONS) {
    lines.push(`${dimension}:`);
    for (const entry of taxonomy[dimension]) {
      lines.push(`  - ${entry.id}: ${entry.description}`);
    }
  }
  return lines.join('\n');
}

export function formatInterestTagsReference(tags: InterestTag[], language: Language): string {
  if (tags.length === 0) return '';

  const lines = [INTEREST_TAGS_HEADER[language]];
  for (const tag of tags) {
    const description = tag.description ? ` — ${tag.description}` : '';
    const keywords =
      tag.keywords.length > 0 ? ` | ${KEYWORDS_LABEL[language]} ${tag.keywords.join(', ')}` : '';
    lines.push(`  - ${tag.label}${description}${keywords}`);
  }
  return lines.join('\n');
}

function responseInstructions(includeInterestTags: boolean, language: Language): string {
  let instructions =
    'Return a compact JSON object with keys: primary_area, secondary_focus, ' +
    'application_domain, and tldr. Prefer labels from the reference list, ' +
    'but you may propose new labels if they better describe the paper. ' +
    `Always write the tldr in ${SUMMARY_LANGUAGE[language]}.`;
  if (includeInterestTags) {
    instructions +=
      ' Interest tags are optional hints for downstream delivery. Only include a label ID in the ' +
      '`interest_tags` array when the paper strongly matches its description or keywords; otherwise ' +
      'return an empty array.';
  }
  return instructions;
}

export function buildClassificationPrompt(
  paper: Paper,
  interestTags: InterestTag[],
  language: Language
): string {
  const interestBlock = formatInterestTagsReference(interestTags, language);
  const extraReference = interestBlock ? `\n\n${interestBlock}` : '';

  return (
    'Paper metadata:\n' +
    `- Title: ${paper.title.trim()}\n` +
    `- arXiv category: ${paper.primary_category}\n` +
    `- Published at: ${paper.published}\n\n` +
    `Abstract:\n${paper.summary.trim()}\n\n` +
    `Reference taxonomy (IDs with brief descriptions):\n${formatTaxonomyReference(language)}` +
    `${extraReference}\n\n` +
    responseInstructions(interestBlock !== '', language)
  );
}
