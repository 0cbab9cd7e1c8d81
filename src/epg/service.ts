import cron, { type ScheduledTask } from 'node-cron';
import { DateTime } from 'luxon';
import { buildGuideDocument, countNodes, dedupeProgrammes, mergeFragments } from './document';
import { parseFeed } from './feed';
import { fetchFeed, fetchFragments, readFeedFile } from './sources';
import { synthesize } from './timeline';
import { compressGuide, serializeGuide, writeGuideFiles } from './xmltv';
import { log } from '../log';
import type { BuildSnapshot, EPGServiceOptions, GuideFragment } from './types';

export class EPGService {
  private opts: EPGServiceOptions;
  private snapshot?: BuildSnapshot;
  private running?: Promise<BuildSnapshot>;
  private schedule?: ScheduledTask;

  constructor(opts: EPGServiceOptions) {
    this.opts = opts;
    if (opts.refreshCron) {
      this.schedule = cron.schedule(opts.refreshCron, () => {
        this.refresh().catch((err: unknown) => log.error('scheduled refresh failed: %s', err instanceof Error ? err.message : String(err)));
      }, { timezone: 'Europe/Rome' });
    }
  }

  public getSnapshot(): BuildSnapshot | undefined { return this.snapshot; }

  /** Builds a fresh guide. A refresh requested while one is running shares its result. */
  public refresh(): Promise<BuildSnapshot> {
    if (!this.running) {
      this.running = this.build().finally(() => { this.running = undefined; });
    }
    return this.running;
  }

  public stop(): void {
    this.schedule?.stop();
    this.schedule = undefined;
  }

  private now(): DateTime {
    return this.opts.clock ? this.opts.clock() : DateTime.now();
  }

  private async loadFeed(): Promise<unknown> {
    if (this.opts.loadFeed) return this.opts.loadFeed();
    if (this.opts.feedFile) return readFeedFile(this.opts.feedFile);
    if (this.opts.feedUrl) return fetchFeed(this.opts.feedUrl, this.opts.fetchTimeoutMs);
    log.warn('no feed configured, the guide will only carry external fragments');
    return {};
  }

  private async loadFragments(): Promise<GuideFragment[]> {
    if (this.opts.loadFragments) return this.opts.loadFragments();
    return fetchFragments(this.opts.fragments, { concurrency: this.opts.fetchConcurrency, timeoutMs: this.opts.fetchTimeoutMs });
  }

  private async build(): Promise<BuildSnapshot> {
    const now = this.now();
    let feedJson: unknown = {};
    try {
      feedJson = await this.loadFeed();
    } catch (err) {
      // A missing feed still yields a guide from the fragments.
      log.error('feed load failed: %s', err instanceof Error ? err.message : String(err));
    }

    const parsed = parseFeed(feedJson);
    const result = synthesize(parsed.feed, { ...this.opts.synthesis, now }, parsed.skipped);
    const local = buildGuideDocument(result, this.opts.synthesis.lang);

    const fragments = await this.loadFragments();
    let doc = mergeFragments(local, fragments);
    if (this.opts.dedupe) doc = dedupeProgrammes(doc);

    const xml = serializeGuide(doc, { pretty: true });
    const gzip = compressGuide(xml);
    const snapshot: BuildSnapshot = { xml, gzip, report: result.report, fragments: fragments.length, builtAt: Date.now() };

    if (this.opts.outputDir) {
      snapshot.written = await writeGuideFiles(this.opts.outputDir, xml, gzip);
      if (snapshot.written.ok) log.info('guide written: %s', snapshot.written.files.join(', '));
      else log.error('guide write failed: %s', snapshot.written.error.message);
    }

    log.info(
      'guide built: %d local channels, %d local programmes, %d fragments, %d programmes total, %d events skipped',
      result.report.channels, result.report.programmes, fragments.length, countNodes(doc, 'programme'), result.report.skipped,
    );
    this.snapshot = snapshot;
    return snapshot;
  }
}
