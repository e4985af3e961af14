import type { ClassifiedPaper } from '../agents/schemas';
import { TransportError } from '../agents/errors';
import type { ChannelConfig } from '../config/profile';
import { normalizeTag, normalizeText, toMirrorUrl, uniqueTokens } from '../utils/canonicalize';
import { defaultFetch, type HttpFetch } from '../utils/http';
import { limit } from '../utils/limiter';
import type { Notifier } from './types';

export type PostElement =
  | { tag: 'text'; text: string }
  | { tag: 'a'; text: string; href: string };

export interface PostMessage {
  title: string;
  content: PostElement[][];
  label: string;
}

type ClusterKey = [category: string, area: string, focus: string, domain: string];

const EMOJI_BY_PRIMARY: Record<string, string> = {
  text_models: '📝',
  multimodal_models: '🖼️',
  audio_models: '🎧',
  video_models: '🎬',
  vla_models: '🤖',
  diffusion_models: '🌫️',
};

function clusterKey(paper: ClassifiedPaper): ClusterKey {
  return [
    normalizeText(paper.primary_category, 'unknown_category'),
    normalizeText(paper.primary_area, 'uncategorised'),
    normalizeText(paper.secondary_focus, 'general'),
    normalizeText(paper.application_domain, 'general'),
  ];
}

export function formatClusterLabel(key: ClusterKey): string {
  const [category, area, focus, domain] = key;
  const emoji = EMOJI_BY_PRIMARY[area] ?? '📌';
  return `📂 ${category} | ${emoji} ${area} · ${focus} · ${domain}`;
}

function paperTags(paper: ClassifiedPaper): string[] {
  return [paper.primary_category, paper.primary_area, paper.secondary_focus, paper.application_domain]
    .map(normalizeTag)
    .filter((tag): tag is string => tag !== null);
}

/** Drops papers whose category or labels match any excluded tag (case-insensitive). */
export function filterPapersByTags(
  papers: ClassifiedPaper[],
  excludedTags: string[] | undefined
): ClassifiedPaper[] {
  const excluded = new Set(
    (excludedTags ?? []).map(normalizeTag).filter((tag): tag is string => tag !== null)
  );
  if (excluded.size === 0) {
    return [...papers];
  }
  return papers.filter((paper) => !paperTags(paper).some((tag) => excluded.has(tag)));
}

function hasInterestTags(paper: ClassifiedPaper): boolean {
  return uniqueTokens(paper.interest_tags).length > 0;
}

function paperBlock(
  paper: ClassifiedPaper,
  index: number,
  classification: string,
  primaryLink: { text: string; href: string }
): PostElement[][] {
  const rows: PostElement[][] = [];
  const title = normalizeText(paper.title, '(untitled paper)');
  const link = paper.papers_cool_url || toMirrorUrl(paper.arxiv_url, 'papersCool');
  const displayTitle = `${index}. ✨ ${title}`;
  rows.push([link ? { tag: 'a', text: displayTitle, href: link } : { tag: 'text', text: displayTitle }]);

  const authors = paper.authors.filter(Boolean).join(', ');
  if (authors) {
    rows.push([{ tag: 'text', text: `👥 Authors: ${authors}` }]);
  }
  rows.push([{ tag: 'text', text: `🏷️ Labels: ${classification}` }]);
  rows.push([{ tag: 'text', text: `🧠 TL;DR: ${normalizeText(paper.tldr, 'No TL;DR')}` }]);

  const interest = uniqueTokens(paper.interest_tags);
  if (interest.length > 0) {
    rows.push([{ tag: 'text', text: `⭐ Interest tags: ${interest.join(', ')}` }]);
  }

  const links: PostElement[] = [];
  if (primaryLink.href) {
    links.push({ tag: 'a', ...primaryLink });
  }
  if (link && link !== primaryLink.href) {
    if (links.length > 0) links.push({ tag: 'text', text: ' | ' });
    links.push({ tag: 'a', text: '📄 Papers.Cool', href: link });
  }
  if (links.length > 0) {
    rows.push(links);
  }
  rows.push([{ tag: 'text', text: ' ' }]);
  return rows;
}

function summaryPost(groups: Map<string, ClassifiedPaper[]>, total: number, interestCount: number): PostMessage {
  const content: PostElement[][] = [
    [{ tag: 'text', text: `📚 ${total} papers | ${interestCount} interest matches | ${groups.size} groups` }],
  ];
  for (const [label, papers] of groups) {
    content.push([{ tag: 'text', text: `${label}: ${papers.length}` }]);
  }
  return { title: "📌 Today's papers", content, label: 'summary' };
}

function interestPost(papers: ClassifiedPaper[]): PostMessage {
  const ordered = [...papers].sort((a, b) => a.order - b.order);
  const header = `⭐ Interest matches (${ordered.length})`;
  const content: PostElement[][] = [[{ tag: 'text', text: header }]];
  ordered.forEach((paper, i) => {
    const classification = clusterKey(paper).join(' | ');
    content.push(...paperBlock(paper, i + 1, classification, { text: '🔗 arXiv', href: paper.arxiv_url }));
  });
  return { title: header, content, label: 'interest_batch' };
}

function categoryPost(label: string, key: ClusterKey, papers: ClassifiedPaper[]): PostMessage {
  const header = `${label} (${papers.length})`;
  const content: PostElement[][] = [[{ tag: 'text', text: header }]];
  const [category, , focus, domain] = key;
  papers.forEach((paper, i) => {
    content.push(
      ...paperBlock(paper, i + 1, `${category} | ${focus} | ${domain}`, {
        text: '🔗 alphaXiv',
        href: toMirrorUrl(paper.arxiv_url, 'alphaxiv'),
      })
    );
  });
  return { title: header, content, label };
}

function compareKeys(a: ClusterKey, b: ClusterKey): number {
  for (let i = 0; i < a.length; i++) {
    const left = a[i] ?? '';
    const right = b[i] ?? '';
    if (left !== right) return left < right ? -1 : 1;
  }
  return 0;
}

/**
 * Summary post, then interest matches (if any), then one post per
 * (category, area, focus, domain) group in sorted order.
 */
export function buildPostMessages(papers: ClassifiedPaper[]): PostMessage[] {
  const interest = papers.filter(hasInterestTags);
  const regular = papers
    .filter((paper) => !hasInterestTags(paper))
    .map((paper) => ({ paper, key: clusterKey(paper) }))
    .sort((a, b) => compareKeys(a.key, b.key) || a.paper.order - b.paper.order);

  const groups = new Map<string, { key: ClusterKey; papers: ClassifiedPaper[] }>();
  for (const { paper, key } of regular) {
    const label = formatClusterLabel(key);
    const group = groups.get(label) ?? { key, papers: [] };
    group.papers.push(paper);
    groups.set(label, group);
  }

  const byLabel = new Map([...groups].map(([label, group]) => [label, group.papers]));
  const messages: PostMessage[] = [summaryPost(byLabel, papers.length, interest.length)];
  if (interest.length > 0) {
    messages.push(interestPost(interest));
  }
  for (const [label, group] of groups) {
    messages.push(categoryPost(label, group.key, group.papers));
  }
  return messages;
}

export function formatSeparator(template: string, values: { label: string; current: number; total: number }): string {
  return template
    .replace(/\{label\}/g, values.label)
    .replace(/\{current\}/g, String(values.current))
    .replace(/\{total\}/g, String(values.total));
}

export interface FeishuNotifierOptions {
  webhookUrl: string;
  delaySeconds?: number;
  separatorText?: string;
  excludeTags?: string[];
  fetch?: HttpFetch;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export class FeishuNotifier implements Notifier {
  readonly channel = 'feishu';
  private readonly http: HttpFetch;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly options: FeishuNotifierOptions) {
    if (!options.webhookUrl) {
      throw new RangeError('Feishu channel requires a webhook_url');
    }
    this.http = options.fetch ?? defaultFetch;
    this.sleep = options.sleep ?? defaultSleep;
  }

  static fromChannelConfig(config: ChannelConfig, overrides: Pick<FeishuNotifierOptions, 'fetch' | 'sleep'> = {}): FeishuNotifier {
    return new FeishuNotifier({
      webhookUrl: config.webhook_url,
      delaySeconds: config.delay_seconds,
      separatorText: config.separator_text,
      excludeTags: config.exclude_tags,
      ...overrides,
    });
  }

  async sendDigest(papers: ClassifiedPaper[], excludeTags: string[] = []): Promise<void> {
    const filtered = filterPapersByTags(papers, [...(this.options.excludeTags ?? []), ...excludeTags]);
    const messages = buildPostMessages(filtered);
    const delayMs = (this.options.delaySeconds ?? 0) * 1000;

    for (let idx = 0; idx < messages.length; idx++) {
      const message = messages[idx];
      if (!message) continue;
      await this.postJson({
        msg_type: 'post',
        content: { post: { zh_cn: { title: message.title, content: message.content } } },
      });

      const next = messages[idx + 1];
      if (!next) continue;
      if (this.options.separatorText) {
        await this.sendText(
          formatSeparator(this.options.separatorText, {
            label: next.label,
            current: idx + 1,
            total: messages.length,
          })
        );
      }
      if (delayMs > 0) {
        await this.sleep(delayMs);
      }
    }
  }

  async sendText(text: string): Promise<void> {
    await this.postJson({ msg_type: 'text', content: { text } });
  }

  private async postJson(payload: Record<string, unknown>): Promise<void> {
    const res = await limit('webhook', () =>
      this.http(this.options.webhookUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(payload),
        timeout: 10_000,
      })
    ).catch((error: unknown) => {
      throw new TransportError('feishu', error instanceof Error ? error.message : String(error), error);
    });

    const body = await res.text();
    if (!res.ok) {
      throw new TransportError('feishu', `webhook error: ${res.status} ${body}`, undefined, res.status);
    }

    let data: unknown = null;
    try {
      data = JSON.parse(body);
    } catch {
      return;
    }
    if (data && typeof data === 'object') {
      const status = 'StatusCode' in data ? data.StatusCode : 'code' in data ? data.code : 0;
      if (status !== undefined && status !== 0) {
        throw new TransportError('feishu', `webhook rejected message: ${body}`);
      }
    }
  }
}
