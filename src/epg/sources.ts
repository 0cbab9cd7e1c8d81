import fs from 'fs';
import fetch from 'node-fetch';
import { gunzipSync } from 'zlib';
import { FeedFormatError } from './feed';
import { parseGuideXml } from './xmltv';
import { log } from '../log';
import type { FragmentSource, GuideFragment } from './types';

export type Fetcher = (url: string, timeoutMs: number) => Promise<Buffer>;

export const DEFAULT_FETCH_TIMEOUT_MS = 30_000;

export const fetchBuffer: Fetcher = async (url, timeoutMs) => {
  const res = await fetch(url, { timeout: timeoutMs });
  if (!res.ok) throw new Error(`fetch failed: ${res.status} ${url}`);
  return res.buffer();
};

function isGzip(buf: Buffer): boolean {
  return buf.length > 2 && buf[0] === 0x1f && buf[1] === 0x8b;
}

// Sources publish both plain .xml and .xml.gz under either extension; sniff the magic bytes instead.
export function decodeGuideBytes(buf: Buffer): string {
  return (isGzip(buf) ? gunzipSync(buf) : buf).toString('utf8');
}

function parseJson(text: string, origin: string): unknown {
  try {
    return JSON.parse(text);
  } catch (e) {
    throw new FeedFormatError(`${origin}: ${e instanceof Error ? e.message : String(e)}`);
  }
}

export async function readFeedFile(file: string): Promise<unknown> {
  const raw = await fs.promises.readFile(file, 'utf8');
  return parseJson(raw, file);
}

export async function fetchFeed(url: string, timeoutMs = DEFAULT_FETCH_TIMEOUT_MS, fetcher: Fetcher = fetchBuffer): Promise<unknown> {
  const buf = await fetcher(url, timeoutMs);
  return parseJson(decodeGuideBytes(buf), url);
}

/** Downloads and parses one guide fragment; any failure leaves the fragment out (null). */
export async function fetchFragment(source: FragmentSource, timeoutMs = DEFAULT_FETCH_TIMEOUT_MS, fetcher: Fetcher = fetchBuffer): Promise<GuideFragment | null> {
  try {
    const buf = await fetcher(source.url, timeoutMs);
    const tree = parseGuideXml(decodeGuideBytes(buf));
    log.debug('fragment %s: %d nodes', source.url, tree.children.length);
    return { source: source.url, tree, programmesOnly: source.programmesOnly };
  } catch (e) {
    log.warn('fragment %s skipped: %s', source.url, e instanceof Error ? e.message : String(e));
    return null;
  }
}

/** Runs `fn` over `items` with at most `limit` calls in flight; results keep input order. */
export async function mapLimit<T, R>(items: T[], limit: number, fn: (item: T, index: number) => Promise<R>): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;
  const worker = async () => {
    while (next < items.length) {
      const i = next++;
      results[i] = await fn(items[i], i);
    }
  };
  const workers = Math.max(1, Math.min(limit, items.length));
  await Promise.all(Array.from({ length: workers }, worker));
  return results;
}

export interface FetchFragmentsOptions {
  concurrency?: number;
  timeoutMs?: number;
  fetcher?: Fetcher;
}

export async function fetchFragments(sources: FragmentSource[], opts: FetchFragmentsOptions = {}): Promise<GuideFragment[]> {
  const fetched = await mapLimit(sources, opts.concurrency ?? 4, (s) => fetchFragment(s, opts.timeoutMs, opts.fetcher));
  return fetched.filter((f): f is GuideFragment => f !== null);
}
