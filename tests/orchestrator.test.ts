import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'fs/promises';
import * as path from 'path';
import { ClassificationError, TransportError } from '../src/agents/errors';
import type { ProfileInput } from '../src/config/profile';
import { StageLedger } from '../src/ledger/stageLedger';
import type { Notifier } from '../src/notifiers/types';
import { ClassificationEngine } from '../src/pipeline/classificationEngine';
import { NoWorkError } from '../src/pipeline/errors';
import { RunLog } from '../src/pipeline/events';
import { PipelineOrchestrator } from '../src/pipeline/orchestrator';
import type { Stage, StageEvent } from '../src/pipeline/types';
import { pathExists } from '../src/utils/jsonFile';
import { silentLogger } from '../src/utils/logger';
import {
  classificationJson,
  FakeSource,
  makePaper,
  makeProfile,
  makeTempDir,
  RecordingNotifier,
  removeTempDir,
  ScriptedCompletionClient,
  TEST_DAY,
} from './utils/fakes';

describe('PipelineOrchestrator', () => {
  let root: string;
  let ledger: StageLedger;
  let source: FakeSource;
  let client: ScriptedCompletionClient;
  let notifier: RecordingNotifier;
  let failClassification: boolean;

  function build(options: { profile?: ProfileInput; notifiers?: Notifier[] } = {}) {
    return new PipelineOrchestrator({
      profile: makeProfile(root, options.profile),
      ledger,
      source,
      engine: new ClassificationEngine(client, silentLogger),
      notifiers: options.notifiers ?? [notifier],
    });
  }

  beforeEach(async () => {
    root = await makeTempDir();
    ledger = StageLedger.forDataRoot(root, silentLogger);
    source = new FakeSource({ 'cs.CL': [makePaper(1), makePaper(2)] });
    failClassification = false;
    client = new ScriptedCompletionClient(() => {
      if (failClassification) {
        throw new Error('backend unavailable');
      }
      return classificationJson();
    });
    notifier = new RecordingNotifier();
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  it('runs every stage and records them in the ledger', async () => {
    const stages: Array<[Stage, StageEvent]> = [];
    const sink = new RunLog();

    const outcome = await build().runFullPipeline({
      sink,
      onStage: (stage, event) => stages.push([stage, event]),
    });

    expect(outcome.status).toBe('completed');
    expect(outcome.date).toBe(TEST_DAY);
    expect(stages).toEqual([
      ['scrape', 'start'],
      ['scrape', 'done'],
      ['classify', 'start'],
      ['classify', 'done'],
      ['send', 'start'],
      ['send', 'done'],
    ]);
    expect(sink.events.map((event) => event.type)).toEqual(['day_resolved', 'scraped', 'classified', 'sent']);
    expect(sink.last('scraped')).toEqual({ type: 'scraped', paper_count: 2, category_count: 1, reused: false });

    const rawFile = path.join(root, 'raw', '20250115', 'csCL', 'raw_csCL_20250115.json');
    expect((await ledger.getStageInfo(TEST_DAY, 'scrape')).raw_files).toEqual([rawFile]);
    expect(await ledger.isStageDone(TEST_DAY, 'classify')).toBe(true);
    expect(await ledger.isStageDone(TEST_DAY, 'send')).toBe(true);

    if (outcome.status !== 'completed') throw new Error('expected a completed run');
    expect((await ledger.getStageInfo(TEST_DAY, 'classify')).daily_file).toBe(outcome.daily_file);
    expect(outcome.daily_file.startsWith(path.join(root, 'daily'))).toBe(true);
    expect(await pathExists(path.join(root, 'paper_database', 'nlp', 'reasoning', 'general', '2501-00001.json'))).toBe(true);

    expect(notifier.digests).toHaveLength(1);
    expect(notifier.digests[0]?.map((paper) => paper.arxiv_id)).toEqual(['2501.00001', '2501.00002']);
  });

  it('does nothing on a second run for the same day', async () => {
    const orchestrator = build();
    await orchestrator.runFullPipeline({ sink: new RunLog() });

    const stages: Stage[] = [];
    const outcome = await orchestrator.runFullPipeline({
      sink: new RunLog(),
      onStage: (stage) => stages.push(stage),
    });

    expect(outcome).toEqual({ status: 'already_completed', date: TEST_DAY });
    expect(stages).toEqual([]);
    expect(source.fetchCalls).toBe(1);
    expect(client.calls).toBe(2);
    expect(notifier.digests).toHaveLength(1);
  });

  it('resumes at send without re-fetching or re-classifying', async () => {
    const orchestrator = build();
    notifier.failWith = new TransportError('feishu', 'webhook error: 500');

    await expect(orchestrator.runFullPipeline({ sink: new RunLog() })).rejects.toThrow(
      'feishu request failed: webhook error: 500'
    );
    expect(await ledger.isStageDone(TEST_DAY, 'classify')).toBe(true);
    expect(await ledger.isStageDone(TEST_DAY, 'send')).toBe(false);

    notifier.failWith = null;
    const sink = new RunLog();
    const outcome = await orchestrator.runFullPipeline({ sink });

    expect(outcome.status).toBe('completed');
    expect(source.fetchCalls).toBe(1);
    expect(client.calls).toBe(2);
    expect(notifier.digests).toHaveLength(1);
    expect(sink.last('scraped')?.reused).toBe(true);
    expect(sink.last('classified')).toEqual({ type: 'classified', paper_count: 2, reused: true });
  });

  it('resumes at classify after a classification failure', async () => {
    const orchestrator = build();
    failClassification = true;

    await expect(orchestrator.runFullPipeline({ sink: new RunLog() })).rejects.toBeInstanceOf(ClassificationError);
    expect(await ledger.isStageDone(TEST_DAY, 'scrape')).toBe(true);
    expect(await ledger.isStageDone(TEST_DAY, 'classify')).toBe(false);

    failClassification = false;
    const outcome = await orchestrator.runFullPipeline({ sink: new RunLog() });

    expect(outcome.status).toBe('completed');
    expect(source.fetchCalls).toBe(1);
    expect(notifier.digests).toHaveLength(1);
  });

  it('re-acquires when the recorded raw files are gone', async () => {
    await ledger.markStage(TEST_DAY, 'scrape', { raw_files: [path.join(root, 'gone.json')] });
    await ledger.markStage(TEST_DAY, 'classify', { daily_file: path.join(root, 'gone-daily.json') });

    const outcome = await build().runFullPipeline({ sink: new RunLog() });

    expect(outcome.status).toBe('completed');
    expect(source.fetchCalls).toBe(1);
    expect(client.calls).toBe(2);
    expect((await ledger.getStageInfo(TEST_DAY, 'scrape')).raw_files).toEqual([
      path.join(root, 'raw', '20250115', 'csCL', 'raw_csCL_20250115.json'),
    ]);
  });

  it('re-classifies when the recorded daily file is gone', async () => {
    const orchestrator = build();
    notifier.failWith = new Error('offline');
    await expect(orchestrator.runFullPipeline({ sink: new RunLog() })).rejects.toThrow('offline');

    const dailyFile = (await ledger.getStageInfo(TEST_DAY, 'classify')).daily_file ?? '';
    await fs.rm(dailyFile);
    notifier.failWith = null;

    const outcome = await orchestrator.runFullPipeline({ sink: new RunLog() });
    expect(outcome.status).toBe('completed');
    expect(source.fetchCalls).toBe(1);
    expect(client.calls).toBe(4);
  });

  it('reports no_papers without touching later stages', async () => {
    source = new FakeSource({ 'cs.CL': [] });
    await ledger.markStage(TEST_DAY, 'classify', { daily_file: 'kept.json' });

    const outcome = await build().runFullPipeline({ sink: new RunLog() });

    expect(outcome).toEqual({ status: 'no_papers', date: TEST_DAY });
    expect(await ledger.isStageDone(TEST_DAY, 'scrape')).toBe(false);
    expect((await ledger.getStageInfo(TEST_DAY, 'classify')).daily_file).toBe('kept.json');
    expect(client.calls).toBe(0);
    expect(notifier.digests).toHaveLength(0);
  });

  it('skips fetching when no categories are configured', async () => {
    const outcome = await build({ profile: { subscriptions: { categories: [] } } }).runFullPipeline({
      sink: new RunLog(),
    });

    expect(outcome.status).toBe('no_papers');
    expect(source.fetchCalls).toBe(0);
  });

  it('fails with NoWorkError when the raw files hold no papers', async () => {
    const badRaw = path.join(root, 'raw', 'broken.json');
    await fs.mkdir(path.dirname(badRaw), { recursive: true });
    await fs.writeFile(badRaw, JSON.stringify({ unexpected: true }));
    await ledger.markStage(TEST_DAY, 'scrape', { raw_files: [badRaw] });

    await expect(build().runFullPipeline({ sink: new RunLog() })).rejects.toBeInstanceOf(NoWorkError);
    expect(await ledger.isStageDone(TEST_DAY, 'classify')).toBe(false);
  });

  it('leaves send unmarked when no notifier is configured', async () => {
    const sink = new RunLog();
    const outcome = await build({ notifiers: [] }).runFullPipeline({ sink });

    expect(outcome.status).toBe('completed');
    expect(await ledger.isStageDone(TEST_DAY, 'send')).toBe(false);
    expect(sink.last('send_skipped')).toEqual({
      type: 'send_skipped',
      reason: 'no notification channel configured',
    });
  });

  it('scrapes only when asked to', async () => {
    const rawFiles = await build().runScrapeOnly(undefined, new RunLog());

    expect(rawFiles).toEqual([path.join(root, 'raw', '20250115', 'csCL', 'raw_csCL_20250115.json')]);
    expect(await ledger.isStageDone(TEST_DAY, 'scrape')).toBe(true);
    expect(await ledger.isStageDone(TEST_DAY, 'classify')).toBe(false);
    expect(client.calls).toBe(0);
  });

  it('answers status and paper queries from stored artifacts', async () => {
    const orchestrator = build();
    await orchestrator.runFullPipeline({ sink: new RunLog() });

    const papers = await orchestrator.queryPapers({ keyword: 'paper 2' });
    expect(papers.map((paper) => paper.arxiv_id)).toEqual(['2501.00002']);

    const status = await ledger.recentDays(1, new Date(`${TEST_DAY}T18:00:00Z`));
    expect(Object.keys(status[TEST_DAY] ?? {}).sort()).toEqual(['classify', 'scrape', 'send']);
  });
});
