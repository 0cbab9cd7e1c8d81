import { DEFAULT_KEYWORDS } from './epg/admission';
import { DEFAULT_FETCH_TIMEOUT_MS } from './epg/sources';
import type { EPGServiceOptions, FragmentSource } from './epg/types';

type Env = Record<string, string | undefined>;

export type EpgConfig = {
  feedUrl?: string;
  feedFile?: string;
  fragments: FragmentSource[];
  outputDir: string;
  keywords: string[];
  timezoneOffsetHours: number;
  graceWindowHours: number;
  mainDurationHours: number;
  lang: string;
  refreshCron?: string;
  dedupe: boolean;
  fetchConcurrency: number;
  fetchTimeoutMs: number;
  port: number;
};

export function envBool(val?: string): boolean {
  if (!val) return false;
  const v = val.toLowerCase();
  return v === '1' || v === 'true' || v === 'yes' || v === 'on';
}

export function envNumber(val: string | undefined, fallback: number): number {
  if (val === undefined || !val.trim()) return fallback;
  const n = Number(val);
  return Number.isFinite(n) ? n : fallback;
}

export function envList(val?: string): string[] {
  return (val || '').split(',').map((s) => s.trim()).filter(Boolean);
}

function envString(val?: string): string | undefined {
  const v = (val || '').trim();
  return v || undefined;
}

export function getConfig(env: Env = process.env): EpgConfig {
  const fragments: FragmentSource[] = [
    ...envList(env.EPG_FRAGMENT_URLS).map((url) => ({ url })),
    ...envList(env.EPG_FRAGMENT_PROGRAMMES_ONLY_URLS).map((url) => ({ url, programmesOnly: true })),
  ];
  const keywords = envList(env.EPG_KEYWORDS);
  return {
    feedUrl: envString(env.EPG_FEED_URL),
    feedFile: envString(env.EPG_FEED_FILE),
    fragments,
    outputDir: envString(env.EPG_OUTPUT_DIR) ?? 'output',
    keywords: keywords.length ? keywords : DEFAULT_KEYWORDS,
    timezoneOffsetHours: envNumber(env.EPG_TZ_OFFSET_HOURS, 2),
    graceWindowHours: envNumber(env.EPG_GRACE_HOURS, 2),
    mainDurationHours: envNumber(env.EPG_DURATION_HOURS, 2),
    lang: envString(env.EPG_LANG) ?? 'it',
    refreshCron: envString(env.EPG_REFRESH_CRON),
    dedupe: envBool(env.EPG_DEDUPE),
    fetchConcurrency: Math.max(1, Math.floor(envNumber(env.EPG_FETCH_CONCURRENCY, 4))),
    fetchTimeoutMs: envNumber(env.EPG_FETCH_TIMEOUT_MS, DEFAULT_FETCH_TIMEOUT_MS),
    port: envNumber(env.PORT, 7000),
  };
}

export function toServiceOptions(cfg: EpgConfig): EPGServiceOptions {
  return {
    feedUrl: cfg.feedUrl,
    feedFile: cfg.feedFile,
    fragments: cfg.fragments,
    outputDir: cfg.outputDir,
    synthesis: {
      keywords: cfg.keywords,
      timezoneOffsetHours: cfg.timezoneOffsetHours,
      graceWindowHours: cfg.graceWindowHours,
      mainDurationHours: cfg.mainDurationHours,
      lang: cfg.lang,
    },
    dedupe: cfg.dedupe,
    fetchConcurrency: cfg.fetchConcurrency,
    fetchTimeoutMs: cfg.fetchTimeoutMs,
    refreshCron: cfg.refreshCron,
  };
}
