import type { ChannelRef, FeedCategory, FeedEvent, FeedSection, RawFeed, SkippedEvent } from './types';

export const UNKNOWN_EVENT_TITLE = 'Evento Sconosciuto';
export const DEFAULT_EVENT_TIME = '00:00';

export class FeedFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FeedFormatError';
  }
}

export interface ParsedFeed {
  feed: RawFeed;
  skipped: SkippedEvent[];
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function asString(v: unknown): string | undefined {
  if (typeof v === 'string') return v;
  if (typeof v === 'number') return String(v);
  return undefined;
}

function parseChannel(raw: unknown): ChannelRef | null {
  if (!isRecord(raw)) return null;
  const displayName = asString(raw.channel_name);
  if (displayName === undefined) return null;
  return { displayName, externalId: asString(raw.channel_id) ?? '' };
}

type EventParse = { ok: true; event: FeedEvent } | { ok: false; detail: string; title: string; time?: string };

// A record without a title or time still airs: it gets the placeholder title and local midnight.
function parseEvent(raw: unknown): EventParse {
  if (!isRecord(raw)) return { ok: false, detail: 'event record is not an object', title: '' };
  const title = asString(raw.event) ?? UNKNOWN_EVENT_TITLE;
  const time = typeof raw.time === 'string' ? raw.time : DEFAULT_EVENT_TIME;
  if (!Array.isArray(raw.channels)) return { ok: false, detail: 'missing channels list', title, time };

  // Single malformed channel entries are dropped, the event survives on the rest.
  const channels: ChannelRef[] = [];
  for (const c of raw.channels) {
    const ch = parseChannel(c);
    if (ch) channels.push(ch);
  }
  const description = asString(raw.description);
  const event: FeedEvent = { time, title, channels };
  if (description !== undefined && description.trim()) event.description = description;
  return { ok: true, event };
}

/**
 * Maps the schedule JSON (`dateKey -> category -> [event]`) into a {@link RawFeed}.
 * Structural problems skip the single record and are reported, never thrown.
 */
export function parseFeed(json: unknown): ParsedFeed {
  const skipped: SkippedEvent[] = [];
  const sections: FeedSection[] = [];
  if (!isRecord(json)) return { feed: { sections }, skipped };

  for (const [dateKey, rawCategories] of Object.entries(json)) {
    const categories: FeedCategory[] = [];
    if (isRecord(rawCategories)) {
      for (const [name, rawEvents] of Object.entries(rawCategories)) {
        const events: FeedEvent[] = [];
        const list: unknown[] = Array.isArray(rawEvents) ? rawEvents : [];
        for (const rawEvent of list) {
          const parsed = parseEvent(rawEvent);
          if (parsed.ok) {
            events.push(parsed.event);
          } else {
            skipped.push({
              location: { dateKey, category: name, title: parsed.title, time: parsed.time },
              reason: { kind: 'malformed-event', detail: parsed.detail },
            });
          }
        }
        categories.push({ name, events });
      }
    }
    sections.push({ dateKey, categories });
  }
  return { feed: { sections }, skipped };
}

export function parseFeedText(text: string): ParsedFeed {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (e) {
    throw new FeedFormatError(`feed is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
  }
  if (!isRecord(json)) throw new FeedFormatError('feed root must be an object keyed by date');
  return parseFeed(json);
}
