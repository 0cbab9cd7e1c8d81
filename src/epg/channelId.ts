import type { ChannelId } from './types';

export const UNKNOWN_CHANNEL_ID = 'unknownchannel';

const MARKUP_RE = /<[^>]*>/g;
// ASCII alphanumerics plus the accented Latin-1 letters used by Italian titles
const NOT_ID_CHAR_RE = /[^a-z0-9à-öø-ÿ]/g;

/** Removes tag-like `<...>` sequences the feed sometimes leaves in titles and names. */
export function cleanTitle(text: string): string {
  return text.replace(MARKUP_RE, '').trim();
}

/**
 * Derives the lane key for a synthesized channel from an event title.
 *
 * The key comes from the event title, not from the broadcasting channel, so every channel airing
 * "Team A vs Team B" shares one lane. Two unrelated events that happen to share a title also
 * collapse onto one lane; guide consumers currently rely on that grouping, keep it unless they change.
 */
export function resolveChannelId(title: string): ChannelId {
  const id = cleanTitle(title).toLowerCase().replace(NOT_ID_CHAR_RE, '');
  return id || UNKNOWN_CHANNEL_ID;
}

/** Weaker normalization applied to ids of externally built guide fragments. */
export function normalizeFragmentId(id: string): string {
  return id.replace(/\s+/g, '').toLowerCase();
}
