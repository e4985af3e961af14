import type { ClassifiedPaper } from '../agents/schemas';

export interface Notifier {
  /** Channel type, e.g. `feishu`. */
  readonly channel: string;
  sendDigest(papers: ClassifiedPaper[], excludeTags?: string[]): Promise<void>;
  sendText(text: string): Promise<void>;
}
