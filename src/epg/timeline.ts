import type { DateTime } from 'luxon';
import { admit, type AdmittedEvent } from './admission';
import { cleanTitle, resolveChannelId } from './channelId';
import { UNKNOWN_EVENT_TITLE } from './feed';
import { isoDate } from './dates';
import { log } from '../log';
import type {
  ChannelDeclaration,
  ChannelId,
  EventLocation,
  EventOutcome,
  ProgrammeBlock,
  ProgrammeContribution,
  RawFeed,
  SkippedEvent,
  SynthesisOptions,
  SynthesisResult,
} from './types';

export const ANNOUNCEMENT_CATEGORY = 'Annuncio';
export const DEFAULT_EVENT_DESCRIPTION = 'Trasmesso in diretta.';

/** Registries owned by one synthesis run. */
export interface TimelineState {
  declared: Map<ChannelId, ChannelDeclaration>;
  dayLanes: Map<ChannelId, ProgrammeBlock[]>; // blocks of the current calendar date, cleared per date
  lanes: Map<ChannelId, ProgrammeBlock[]>;
  programmes: ProgrammeBlock[];
  owners: Map<ProgrammeBlock, ProgrammeContribution>;
  outcomes: EventOutcome[];
}

export function createTimelineState(): TimelineState {
  return { declared: new Map(), dayLanes: new Map(), lanes: new Map(), programmes: [], owners: new Map(), outcomes: [] };
}

function groupBy<T>(items: T[], key: (item: T) => string): T[][] {
  const groups = new Map<string, T[]>();
  for (const item of items) {
    const k = key(item);
    const g = groups.get(k);
    if (g) g.push(item);
    else groups.set(k, [item]);
  }
  return [...groups.values()];
}

function pushTo<K, V>(map: Map<K, V[]>, key: K, value: V): void {
  const list = map.get(key);
  if (list) list.push(value);
  else map.set(key, [value]);
}

function dropFrom<T>(list: T[] | undefined, value: T): void {
  if (!list) return;
  const i = list.indexOf(value);
  if (i >= 0) list.splice(i, 1);
}

function append(state: TimelineState, block: ProgrammeBlock, owner: ProgrammeContribution): void {
  state.programmes.push(block);
  pushTo(state.lanes, block.channelId, block);
  pushTo(state.dayLanes, block.channelId, block);
  state.owners.set(block, owner);
}

function remove(state: TimelineState, block: ProgrammeBlock): void {
  dropFrom(state.programmes, block);
  dropFrom(state.lanes.get(block.channelId), block);
  dropFrom(state.dayLanes.get(block.channelId), block);
  const owner = state.owners.get(block);
  state.owners.delete(block);
  if (owner && owner.announcement === block) {
    delete owner.announcement;
    owner.note = { kind: 'zero-length' };
  }
}

const ms = (dt: DateTime) => dt.toMillis();

function fmt(dt: DateTime): string {
  return dt.toFormat("yyyy-LL-dd'T'HH:mm");
}

/**
 * Places one admitted event on its lane: an optional announcement filling the gap since the
 * previous block, then the main block. Blocks on a lane never overlap:
 *
 * - a main block starting inside another main block is pushed back to that block's stop, and one
 *   that runs into a later main block is cut where that block starts;
 * - an announcement already on the lane gives way to the new main block and now starts at its stop;
 * - an event left with no time at all is skipped as an overlap.
 */
export function placeEvent(state: TimelineState, item: AdmittedEvent, options: SynthesisOptions): EventOutcome {
  const title = cleanTitle(item.event.title) || UNKNOWN_EVENT_TITLE;
  const location: EventLocation = { dateKey: item.dateKey, category: item.category, title, time: item.event.time };
  // Lane identity is derived from the title, so every surviving channel of the event resolves to
  // the same lane: the first one places the blocks, the rest are recorded as collapsed.
  const channelId = resolveChannelId(item.event.title);
  const [, ...collapsed] = item.channels;

  if (!state.declared.has(channelId)) {
    state.declared.set(channelId, { channelId, displayName: title });
  }

  const start = item.start;
  const stop = start.plus({ hours: options.mainDurationHours });
  const day = state.dayLanes.get(channelId) ?? [];
  const mains = day.filter((b) => b.kind === 'event').sort((a, b) => ms(a.start) - ms(b.start));

  let mainStart = start;
  for (const m of mains) {
    if (ms(m.start) <= ms(mainStart) && ms(mainStart) < ms(m.stop)) mainStart = m.stop;
  }
  if (ms(mainStart) >= ms(stop)) {
    log.warn('event "%s" on "%s" at %s falls inside main blocks already on the lane (ending %s), skipped', title, channelId, fmt(start), fmt(mainStart));
    return { ok: false, location, reason: { kind: 'overlap', previousStop: fmt(mainStart) } };
  }
  let mainStop = stop;
  for (const m of mains) {
    if (ms(m.start) >= ms(mainStart) && ms(m.start) < ms(mainStop)) mainStop = m.start;
  }

  const description = item.event.description ? cleanTitle(item.event.description) : '';
  const contribution: ProgrammeContribution = {
    channelId,
    main: {
      channelId,
      start: mainStart,
      stop: mainStop,
      kind: 'event',
      title: description || DEFAULT_EVENT_DESCRIPTION,
      description: title,
      category: cleanTitle(item.category),
    },
    collapsed,
  };
  if (ms(mainStop) < ms(stop)) {
    log.info('event "%s" on "%s" cut at %s where the next main block starts', title, channelId, fmt(mainStop));
    contribution.truncatedAt = fmt(mainStop);
  }

  // Announcements reaching into the new main block belong to later events; they now start at its stop.
  for (const a of day.filter((b) => b.kind === 'announcement')) {
    if (ms(a.start) >= ms(mainStop) || ms(a.stop) <= ms(mainStart)) continue;
    if (ms(a.stop) <= ms(mainStop)) {
      log.info('announcement "%s" on "%s" dropped, covered by "%s"', a.title, channelId, title);
      remove(state, a);
    } else {
      log.info('announcement "%s" on "%s" now starts at %s', a.title, channelId, fmt(mainStop));
      a.start = mainStop;
    }
  }

  let previousStop: DateTime | undefined;
  for (const b of state.dayLanes.get(channelId) ?? []) {
    if (ms(b.stop) <= ms(mainStart) && (!previousStop || ms(b.stop) > ms(previousStop))) previousStop = b.stop;
  }
  const announcementStart = previousStop ?? start.startOf('day');
  if (ms(announcementStart) < ms(start)) {
    contribution.announcement = {
      channelId,
      start: announcementStart,
      stop: start,
      kind: 'announcement',
      title: `Inizia alle ${start.toFormat('HH:mm')}.`,
      description: `${title}.`,
      category: ANNOUNCEMENT_CATEGORY,
    };
  } else if (ms(announcementStart) === ms(start)) {
    log.info('zero-length announcement skipped for "%s" on "%s"', title, channelId);
    contribution.note = { kind: 'zero-length' };
  } else {
    log.warn('announcement for "%s" on "%s" would start after the event (previous block ends %s), skipped', title, channelId, fmt(announcementStart));
    contribution.note = { kind: 'overlap', previousStop: fmt(announcementStart) };
  }

  if (contribution.announcement) append(state, contribution.announcement, contribution);
  append(state, contribution.main, contribution);
  return { ok: true, location, value: contribution };
}

/**
 * Turns a raw feed into per-channel timelines. Admission runs first; admitted events are then
 * placed date by date, category by category, each category sorted by adjusted start. Output keeps
 * that emission order and is not re-sorted.
 *
 * `preSkipped` carries records dropped before synthesis (e.g. by feed parsing) into the report.
 */
export function synthesize(feed: RawFeed, options: SynthesisOptions, preSkipped: SkippedEvent[] = []): SynthesisResult {
  const state = createTimelineState();
  const { admitted, skipped } = admit(feed, options);
  for (const s of [...preSkipped, ...skipped]) {
    state.outcomes.push({ ok: false, location: s.location, reason: s.reason });
  }

  for (const day of groupBy(admitted, (a) => isoDate(a.date))) {
    state.dayLanes.clear();
    for (const category of groupBy(day, (a) => a.category)) {
      const ordered = [...category].sort((a, b) => a.start.toMillis() - b.start.toMillis());
      for (const item of ordered) {
        state.outcomes.push(placeEvent(state, item, options));
      }
    }
  }

  const skippedCount = state.outcomes.filter((o) => !o.ok).length;
  return {
    channels: [...state.declared.values()],
    programmes: state.programmes,
    lanes: state.lanes,
    report: {
      outcomes: state.outcomes,
      admitted: admitted.length,
      skipped: skippedCount,
      channels: state.declared.size,
      programmes: state.programmes.length,
    },
  };
}
