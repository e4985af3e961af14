import type { Profile } from '../config/profile';
import { formatDay } from '../ingest/arxiv/util';
import type { Source } from '../ingest/types';
import type { LedgerDocument, StageLedger } from '../ledger/stageLedger';
import type { Notifier } from '../notifiers/types';
import {
  combinePapers,
  loadDailyFile,
  queryPapers,
  storeArchiveFiles,
  storeDailyFile,
  type PaperQuery,
} from '../storage/artifacts';
import { pathExists } from '../utils/jsonFile';
import type { ClassifiedPaper } from '../agents/schemas';
import type { ClassificationEngine, ProgressCallback } from './classificationEngine';
import { NoWorkError } from './errors';
import { loggingSink, type PipelineEventSink } from './events';
import type { PipelineOutcome, RunOptions, StageCallback } from './types';

export interface OrchestratorDeps {
  profile: Profile;
  ledger: StageLedger;
  source: Source;
  engine: ClassificationEngine;
  notifiers: Notifier[];
}

export interface PipelineRunOptions extends RunOptions {
  /** Receives this run's events and log lines. */
  sink?: PipelineEventSink;
}

/**
 * Runs scrape -> classify -> send for one day, consulting the ledger before
 * each stage so an interrupted day resumes at the stage that did not finish.
 * A stage is only trusted as done while the artifact it recorded still exists.
 */
export class PipelineOrchestrator {
  private readonly profile: Profile;
  private readonly ledger: StageLedger;
  private readonly source: Source;
  private readonly engine: ClassificationEngine;
  private readonly notifiers: Notifier[];

  constructor(deps: OrchestratorDeps) {
    this.profile = deps.profile;
    this.ledger = deps.ledger;
    this.source = deps.source;
    this.engine = deps.engine;
    this.notifiers = deps.notifiers;
  }

  get channels(): string[] {
    return this.notifiers.map((notifier) => notifier.channel);
  }

  async runFullPipeline(options: PipelineRunOptions = {}): Promise<PipelineOutcome> {
    const sink = options.sink ?? loggingSink();
    const onStage: StageCallback = options.onStage ?? (() => undefined);
    const day = formatDay(this.source.resolveTargetDate(options.targetDate));
    sink.emit({ type: 'day_resolved', date: day });
    sink.info(`Running pipeline for target date ${day}`);

    if (await this.ledger.isStageDone(day, 'send')) {
      sink.info('Send stage already completed; nothing to do');
      return { status: 'already_completed', date: day };
    }

    onStage('scrape', 'start');
    const rawFiles = await this.stageScrape(day, options.targetDate, sink);
    onStage('scrape', 'done');
    if (rawFiles.length === 0) {
      return { status: 'no_papers', date: day };
    }

    onStage('classify', 'start');
    const dailyFile = await this.stageClassify(day, rawFiles, sink, options.onClassifyProgress);
    onStage('classify', 'done');

    onStage('send', 'start');
    await this.stageSend(day, dailyFile, sink);
    onStage('send', 'done');

    return { status: 'completed', date: day, daily_file: dailyFile };
  }

  /** Runs only the acquire stage, with the same reuse rules as a full run. */
  async runScrapeOnly(targetDate?: string, sink: PipelineEventSink = loggingSink()): Promise<string[]> {
    const day = formatDay(this.source.resolveTargetDate(targetDate));
    return this.stageScrape(day, targetDate, sink);
  }

  queryStatus(days = 7): Promise<LedgerDocument> {
    return this.ledger.recentDays(days);
  }

  queryPapers(query: PaperQuery = {}): Promise<ClassifiedPaper[]> {
    return queryPapers(this.profile.data_dirs.daily, query);
  }

  private async existing(paths: string[]): Promise<string[]> {
    const found: string[] = [];
    for (const candidate of paths) {
      if (await pathExists(candidate)) {
        found.push(candidate);
      }
    }
    return found;
  }

  private async stageScrape(
    day: string,
    targetDate: string | undefined,
    sink: PipelineEventSink
  ): Promise<string[]> {
    const info = await this.ledger.getStageInfo(day, 'scrape');
    if (info.completed) {
      const rawFiles = await this.existing(info.raw_files ?? []);
      if (rawFiles.length > 0) {
        sink.info('Scrape stage already completed; reusing stored raw files');
        const papers = await combinePapers(rawFiles, sink);
        sink.emit({
          type: 'scraped',
          paper_count: papers.length,
          category_count: this.profile.subscriptions.categories.length,
          reused: true,
        });
        return rawFiles;
      }
      sink.warn('Stored raw files are missing; scraping again');
      await this.ledger.clearStage(day, ['scrape', 'classify', 'send']);
    }

    const categories = this.profile.subscriptions.categories;
    if (categories.length === 0) {
      sink.warn('No categories configured; skipping scrape');
      return [];
    }

    const grouped = await this.source.fetch(categories, targetDate);
    const rawFiles = await this.source.saveRaw(grouped, this.profile.data_dirs.raw);
    const total = Object.values(grouped).reduce((sum, papers) => sum + papers.length, 0);
    sink.info(`Scraped ${total} papers across ${Object.keys(grouped).length} categories`);
    sink.emit({ type: 'scraped', paper_count: total, category_count: categories.length, reused: false });

    if (rawFiles.length > 0) {
      await this.ledger.markStage(day, 'scrape', { raw_files: rawFiles });
      await this.ledger.clearStage(day, ['classify', 'send']);
    }
    return rawFiles;
  }

  private async stageClassify(
    day: string,
    rawFiles: string[],
    sink: PipelineEventSink,
    onProgress?: ProgressCallback
  ): Promise<string> {
    const info = await this.ledger.getStageInfo(day, 'classify');
    if (info.completed) {
      if (info.daily_file && (await pathExists(info.daily_file))) {
        sink.info('Classification stage already completed; reusing daily file');
        const batch = await loadDailyFile(info.daily_file);
        sink.emit({ type: 'classified', paper_count: batch.paper_count, reused: true });
        return info.daily_file;
      }
      sink.warn('Stored daily file is missing; classifying again');
      await this.ledger.clearStage(day, ['classify', 'send']);
    }

    const papers = await combinePapers(rawFiles, sink);
    if (papers.length === 0) {
      throw new NoWorkError('classify');
    }

    const classified = await this.engine.classify(papers, {
      interestTags: this.profile.subscriptions.interest_tags,
      concurrency: this.profile.llm.max_concurrency,
      language: this.profile.language,
      onProgress,
      logger: sink,
    });

    const archivePaths = await storeArchiveFiles(classified, this.profile.data_dirs.archive);
    const dailyFile = await storeDailyFile(classified, rawFiles, this.profile.data_dirs.daily);
    sink.info(`Classified ${classified.length} papers`, {
      daily_file: dailyFile,
      archive_files: archivePaths.length,
    });
    sink.emit({ type: 'classified', paper_count: classified.length, reused: false });

    await this.ledger.markStage(day, 'classify', { daily_file: dailyFile });
    await this.ledger.clearStage(day, ['send']);
    return dailyFile;
  }

  private async stageSend(day: string, dailyFile: string, sink: PipelineEventSink): Promise<void> {
    if (await this.ledger.isStageDone(day, 'send')) {
      sink.info('Send stage already completed; skipping');
      return;
    }

    const batch = await loadDailyFile(dailyFile);
    if (batch.papers.length === 0) {
      sink.warn('No papers in daily file; skipping send');
      sink.emit({ type: 'send_skipped', reason: 'no papers to send' });
      return;
    }
    if (this.notifiers.length === 0) {
      sink.warn('No notification channels configured; skipping send');
      sink.emit({ type: 'send_skipped', reason: 'no notification channel configured' });
      return;
    }

    for (const notifier of this.notifiers) {
      await notifier.sendDigest(batch.papers);
      sink.info(`Digest sent via ${notifier.channel}`);
    }

    await this.ledger.markStage(day, 'send');
    sink.emit({ type: 'sent', channels: this.channels });
  }
}
