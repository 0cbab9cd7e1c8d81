import { describe, it, expect } from 'vitest';
import { DateTime, FixedOffsetZone } from 'luxon';
import { admit, DEFAULT_KEYWORDS, keywordMatcher } from './admission';
import type { RawFeed } from './types';

const zone = FixedOffsetZone.instance(120);
const at = (iso: string) => DateTime.fromISO(iso, { zone });

function feedOf(dateKey: string, times: string[], category = 'Football'): RawFeed {
  return {
    sections: [{
      dateKey,
      categories: [{
        name: category,
        events: times.map((time) => ({ time, title: `Match ${time}`, channels: [{ displayName: 'Rai Sport', externalId: '1' }] })),
      }],
    }],
  };
}

function admittedTimes(feed: RawFeed, now: DateTime): string[] {
  const { admitted } = admit(feed, { now, keywords: DEFAULT_KEYWORDS, timezoneOffsetHours: 2, graceWindowHours: 2 });
  return admitted.map((a) => a.event.time);
}

describe('admit', () => {
  it('treats the grace window boundary as inclusive', () => {
    // 16:00 in the feed is 18:00 locally, exactly two hours before now
    const feed = feedOf('Saturday 15 Nov 2025', ['15:59', '16:00', '23:00']);
    expect(admittedTimes(feed, at('2025-11-15T20:00'))).toEqual(['16:00', '23:00']);
  });

  it('reports stale events with their adjusted start', () => {
    const feed = feedOf('Saturday 15 Nov 2025', ['10:00']);
    const { skipped } = admit(feed, { now: at('2025-11-15T20:00'), keywords: DEFAULT_KEYWORDS, timezoneOffsetHours: 2, graceWindowHours: 2 });
    expect(skipped).toEqual([{
      location: { dateKey: 'Saturday 15 Nov 2025', category: 'Football', title: 'Match 10:00', time: '10:00' },
      reason: { kind: 'stale', start: '2025-11-15T12:00:00.000+02:00' },
    }]);
  });

  it('admits only yesterday events filed between 00:00 and 04:00', () => {
    const feed = feedOf('Saturday 15 Nov 2025', ['00:00', '03:59', '04:00', '04:01', '23:59']);
    expect(admittedTimes(feed, at('2025-11-16T10:00'))).toEqual(['00:00', '03:59', '04:00']);
  });

  it('adds the offset to the feed time', () => {
    const feed = feedOf('Saturday 15 Nov 2025', ['18:00']);
    const { admitted } = admit(feed, { now: at('2025-11-15T19:30'), keywords: DEFAULT_KEYWORDS, timezoneOffsetHours: 2, graceWindowHours: 2 });
    expect(admitted[0].start.toFormat('yyyy-LL-dd HH:mm ZZZ')).toBe('2025-11-15 20:00 +0200');
  });

  it('ignores dates other than today and yesterday', () => {
    const feed = feedOf('Thursday 13 Nov 2025', ['18:00']);
    const { admitted, skipped } = admit(feed, { now: at('2025-11-15T19:30'), keywords: DEFAULT_KEYWORDS, timezoneOffsetHours: 2, graceWindowHours: 2 });
    expect(admitted).toEqual([]);
    expect(skipped[0].reason).toEqual({ kind: 'date-out-of-window', date: '2025-11-13' });
  });

  it('reads only the part of the date key before " - "', () => {
    const feed = feedOf('Saturday 15th Nov 2025 - Schedule Time UK GMT', ['18:00']);
    expect(admittedTimes(feed, at('2025-11-15T19:30'))).toEqual(['18:00']);
  });

  it('drops sections whose date key cannot be parsed', () => {
    const feed = feedOf('Schedule TBA', ['18:00']);
    const { admitted, skipped } = admit(feed, { now: at('2025-11-15T19:30'), keywords: DEFAULT_KEYWORDS, timezoneOffsetHours: 2, graceWindowHours: 2 });
    expect(admitted).toEqual([]);
    expect(skipped[0].reason).toEqual({ kind: 'unparseable-date', dateKey: 'Schedule TBA' });
  });

  it('excludes the TV Shows category in any casing', () => {
    const feed = feedOf('Saturday 15 Nov 2025', ['18:00'], 'TV Shows');
    expect(admittedTimes(feed, at('2025-11-15T19:30'))).toEqual([]);
    expect(admittedTimes(feedOf('Saturday 15 Nov 2025', ['18:00'], 'tv shows'), at('2025-11-15T19:30'))).toEqual([]);
  });

  it('keeps only channels matching a keyword', () => {
    const feed: RawFeed = {
      sections: [{
        dateKey: 'Saturday 15 Nov 2025',
        categories: [{
          name: 'Football',
          events: [{
            time: '18:00',
            title: 'Team A vs Team B',
            channels: [
              { displayName: 'Sky Sport Uno', externalId: '1' },
              { displayName: 'Italy Sports 1', externalId: '2' },
            ],
          }],
        }],
      }],
    };
    const { admitted } = admit(feed, { now: at('2025-11-15T19:30'), keywords: DEFAULT_KEYWORDS, timezoneOffsetHours: 2, graceWindowHours: 2 });
    expect(admitted[0].channels).toEqual([{ displayName: 'Italy Sports 1', externalId: '2' }]);
  });
});

describe('keywordMatcher', () => {
  const matches = keywordMatcher(DEFAULT_KEYWORDS);

  it('matches whole words only', () => {
    expect(matches('Italy Sports 1')).toBe(true);
    expect(matches('Italian Sports')).toBe(false);
    expect(matches('LaLiga TV')).toBe(false);
    expect(matches('Fox Sports (USA)')).toBe(true);
  });

  it('matches multi-word keywords as a phrase', () => {
    expect(matches('Tennis Channel 2')).toBe(true);
    expect(matches('Channel Tennis')).toBe(false);
  });

  it('ignores markup in channel names', () => {
    expect(matches('<span>beIN USA</span>')).toBe(true);
  });
});
