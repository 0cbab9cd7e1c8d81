import type { DateTime } from 'luxon';

export interface ChannelRef {
  displayName: string; // the only field synthesis trusts
  externalId: string;  // opaque, passed through for collaborators
}

export interface FeedEvent {
  time: string; // wall clock "HH:MM", as filed by the feed (UTC)
  title: string;
  description?: string;
  channels: ChannelRef[];
}

export interface FeedCategory {
  name: string;
  events: FeedEvent[];
}

export interface FeedSection {
  dateKey: string; // e.g. "Saturday 15th Nov 2025 - Schedule Time UK GMT"
  categories: FeedCategory[];
}

export interface RawFeed {
  sections: FeedSection[];
}

export type ChannelId = string;

export type BlockKind = 'announcement' | 'event';

export interface ProgrammeBlock {
  channelId: ChannelId;
  start: DateTime;
  stop: DateTime;
  kind: BlockKind;
  title: string;
  description: string;
  category: string;
}

export interface ChannelDeclaration {
  channelId: ChannelId;
  displayName: string;
}

export interface CalendarDate {
  year: number;
  month: number;
  day: number;
}

// Where a skipped or contributed event came from in the feed.
export interface EventLocation {
  dateKey: string;
  category: string;
  title: string;
  time?: string;
}

export type SkipReason =
  | { kind: 'malformed-event'; detail: string }
  | { kind: 'unparseable-date'; dateKey: string }
  | { kind: 'date-out-of-window'; date: string }
  | { kind: 'excluded-category' }
  | { kind: 'unparseable-time'; time: string }
  | { kind: 'stale'; start: string }
  | { kind: 'outside-early-window'; time: string }
  | { kind: 'no-matching-channels' }
  | { kind: 'overlap'; previousStop: string };

export interface SkippedEvent {
  location: EventLocation;
  reason: SkipReason;
}

export type AnnouncementNote =
  | { kind: 'zero-length' }
  | { kind: 'overlap'; previousStop: string };

export interface ProgrammeContribution {
  channelId: ChannelId;
  announcement?: ProgrammeBlock;
  main: ProgrammeBlock;
  // channels beyond the first that resolved onto the same lane
  collapsed: ChannelRef[];
  note?: AnnouncementNote;
  // set when the main block was cut short where a later main block on the lane begins
  truncatedAt?: string;
}

export type EventOutcome =
  | { ok: true; location: EventLocation; value: ProgrammeContribution }
  | { ok: false; location: EventLocation; reason: SkipReason };

export interface SynthesisReport {
  outcomes: EventOutcome[];
  admitted: number;
  skipped: number;
  channels: number;
  programmes: number;
}

export interface SynthesisResult {
  channels: ChannelDeclaration[];
  programmes: ProgrammeBlock[];
  lanes: Map<ChannelId, ProgrammeBlock[]>;
  report: SynthesisReport;
}

export interface SynthesisOptions {
  now: DateTime;              // fixed for the whole run
  keywords: string[];         // channel display-name allow-list
  timezoneOffsetHours: number;
  graceWindowHours: number;
  mainDurationHours: number;
  lang: string;               // language tag on every text element
}

export interface GuideNode {
  name: string;
  attributes: Record<string, string>;
  children: GuideNode[];
  text?: string;
}

export interface GuideDocument {
  root: GuideNode; // <tv>
}

export interface FragmentSource {
  url: string;
  // Only <programme> nodes are taken from this source, its <channel> nodes are ignored.
  programmesOnly?: boolean;
}

export interface GuideFragment {
  source: string;
  tree: GuideNode;
  programmesOnly?: boolean;
}

export type WriteResult =
  | { ok: true; files: string[]; bytes: number }
  | { ok: false; error: Error };

export interface EPGServiceOptions {
  feedUrl?: string;
  feedFile?: string;
  fragments: FragmentSource[];
  outputDir?: string; // when unset, builds stay in memory
  synthesis: Omit<SynthesisOptions, 'now'>;
  dedupe?: boolean;
  fetchConcurrency?: number;
  fetchTimeoutMs?: number;
  refreshCron?: string; // cron schedule, no schedule when unset
  // Overrides used by tests and by callers that already hold the inputs.
  clock?: () => DateTime;
  loadFeed?: () => Promise<unknown>;
  loadFragments?: () => Promise<GuideFragment[]>;
}

export interface BuildSnapshot {
  xml: Buffer;
  gzip: Buffer;
  report: SynthesisReport;
  fragments: number;
  builtAt: number; // epoch ms
  written?: WriteResult;
}
