import type { DateTime } from 'luxon';
import { cleanTitle } from './channelId';
import { calendarDateOf, feedStart, isoDate, localZone, parseClock, parseDateKey, sameDate } from './dates';
import { log } from '../log';
import type {
  CalendarDate,
  ChannelRef,
  EventLocation,
  FeedEvent,
  RawFeed,
  SkippedEvent,
  SkipReason,
  SynthesisOptions,
} from './types';

export const DEFAULT_KEYWORDS = ['italy', 'rai', 'italia', 'it', 'uk', 'tnt', 'usa', 'tennis channel', 'tennis stream', 'la'];

const EXCLUDED_CATEGORY = 'tv shows';
// Events filed under yesterday's section that really aired after local midnight.
const EARLY_WINDOW_END_MINUTES = 4 * 60;

export interface AdmittedEvent {
  dateKey: string;
  date: CalendarDate;
  category: string;
  event: FeedEvent;
  channels: ChannelRef[]; // the ones that passed the keyword filter
  start: DateTime;        // adjusted local start
}

export interface AdmissionResult {
  admitted: AdmittedEvent[];
  skipped: SkippedEvent[];
}

export type AdmissionOptions = Pick<SynthesisOptions, 'now' | 'keywords' | 'timezoneOffsetHours' | 'graceWindowHours'>;

function words(s: string): string[] {
  return cleanTitle(s).toLowerCase().match(/[\p{L}\p{N}_]+/gu) ?? [];
}

/** Builds a whole-word (or whole-phrase) matcher over channel display names. */
export function keywordMatcher(keywords: string[]): (displayName: string) => boolean {
  const phrases = keywords.map((k) => words(k).join(' ')).filter(Boolean);
  return (displayName: string) => {
    const hay = ` ${words(displayName).join(' ')} `;
    return phrases.some((p) => hay.includes(` ${p} `));
  };
}

function locate(dateKey: string, category: string, event: FeedEvent): EventLocation {
  return { dateKey, category, title: cleanTitle(event.title), time: event.time };
}

/**
 * Picks the events that are live enough to schedule: today's events that started at most
 * `graceWindowHours` ago (or have not started yet), and yesterday's events filed between 00:00 and 04:00.
 */
export function admit(feed: RawFeed, options: AdmissionOptions): AdmissionResult {
  const zone = localZone(options.timezoneOffsetHours);
  const localNow = options.now.setZone(zone);
  const today = calendarDateOf(localNow);
  const yesterday = calendarDateOf(localNow.minus({ days: 1 }));
  const graceMs = options.graceWindowHours * 3600_000;
  const matches = keywordMatcher(options.keywords);

  const admitted: AdmittedEvent[] = [];
  const skipped: SkippedEvent[] = [];
  const skip = (location: EventLocation, reason: SkipReason) => skipped.push({ location, reason });

  for (const section of feed.sections) {
    const date = parseDateKey(section.dateKey, localNow.toJSDate());
    if (!date) log.warn('unparseable date key "%s", section dropped', section.dateKey);
    const isToday = !!date && sameDate(date, today);
    const isYesterday = !!date && sameDate(date, yesterday);

    for (const category of section.categories) {
      for (const event of category.events) {
        const location = locate(section.dateKey, category.name, event);
        if (category.name.trim().toLowerCase() === EXCLUDED_CATEGORY) {
          skip(location, { kind: 'excluded-category' });
          continue;
        }
        if (!date) {
          skip(location, { kind: 'unparseable-date', dateKey: section.dateKey });
          continue;
        }
        if (!isToday && !isYesterday) {
          skip(location, { kind: 'date-out-of-window', date: isoDate(date) });
          continue;
        }

        const clock = parseClock(event.time);
        if (!clock) {
          log.warn('unparseable time "%s" for event "%s" (%s), event dropped', event.time, location.title, section.dateKey);
          skip(location, { kind: 'unparseable-time', time: event.time });
          continue;
        }
        const start = feedStart(date, clock, zone);

        if (isToday) {
          if (localNow.toMillis() - start.toMillis() > graceMs) {
            skip(location, { kind: 'stale', start: start.toISO() ?? event.time });
            continue;
          }
        } else if (clock.hour * 60 + clock.minute > EARLY_WINDOW_END_MINUTES) {
          skip(location, { kind: 'outside-early-window', time: event.time });
          continue;
        }

        const channels = event.channels.filter((c) => matches(c.displayName));
        if (!channels.length) {
          skip(location, { kind: 'no-matching-channels' });
          continue;
        }
        admitted.push({ dateKey: section.dateKey, date, category: category.name, event, channels, start });
      }
    }
  }
  log.debug('admission: %d admitted, %d skipped', admitted.length, skipped.length);
  return { admitted, skipped };
}
