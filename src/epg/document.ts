import { normalizeFragmentId } from './channelId';
import { formatXmltvTime } from './xmltv';
import type { GuideDocument, GuideFragment, GuideNode, ProgrammeBlock, SynthesisResult } from './types';

export const GENERATOR_NAME = 'live-epg';

function el(name: string, attributes: Record<string, string> = {}, children: GuideNode[] = [], text?: string): GuideNode {
  const node: GuideNode = { name, attributes, children };
  if (text !== undefined) node.text = text;
  return node;
}

export function programmeNode(block: ProgrammeBlock, lang: string): GuideNode {
  return el(
    'programme',
    { start: formatXmltvTime(block.start), stop: formatXmltvTime(block.stop), channel: block.channelId },
    [
      el('title', { lang }, [], block.title),
      el('desc', { lang }, [], block.description),
      el('category', { lang }, [], block.category),
    ],
  );
}

/** Channel declarations first, then programme blocks in emission order. */
export function buildGuideDocument(result: Pick<SynthesisResult, 'channels' | 'programmes'>, lang: string): GuideDocument {
  const channels = result.channels.map((c) =>
    el('channel', { id: c.channelId }, [el('display-name', { lang }, [], c.displayName)]),
  );
  const programmes = result.programmes.map((p) => programmeNode(p, lang));
  return { root: el('tv', { 'generator-info-name': GENERATOR_NAME }, [...channels, ...programmes]) };
}

function withNormalizedAttr(node: GuideNode, attr: string): GuideNode {
  const value = node.attributes[attr];
  if (value === undefined) return node;
  return { ...node, attributes: { ...node.attributes, [attr]: normalizeFragmentId(value) } };
}

/**
 * Appends the channel and programme nodes of every fragment, in fragment order, ahead of the
 * local content. Fragment ids only get whitespace stripped and lowercased. Programmes that two
 * sources both describe stay duplicated; see {@link dedupeProgrammes}.
 */
export function mergeFragments(local: GuideDocument, fragments: GuideFragment[]): GuideDocument {
  const children: GuideNode[] = [];
  for (const fragment of fragments) {
    for (const node of fragment.tree.children) {
      if (node.name === 'programme') {
        children.push(withNormalizedAttr(node, 'channel'));
      } else if (node.name === 'channel' && !fragment.programmesOnly) {
        children.push(withNormalizedAttr(node, 'id'));
      }
    }
  }
  children.push(...local.root.children);
  return { root: { ...local.root, children } };
}

function childText(node: GuideNode, name: string): string {
  return node.children.find((c) => c.name === name)?.text ?? '';
}

/** Drops programmes repeating an earlier one's channel, start, stop and title. Other nodes are untouched. */
export function dedupeProgrammes(doc: GuideDocument): GuideDocument {
  const seen = new Set<string>();
  const children = doc.root.children.filter((node) => {
    if (node.name !== 'programme') return true;
    const { channel = '', start = '', stop = '' } = node.attributes;
    const key = [channel, start, stop, childText(node, 'title')].join('\u0000');
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
  return { root: { ...doc.root, children } };
}

export function countNodes(doc: GuideDocument, name: string): number {
  return doc.root.children.filter((c) => c.name === name).length;
}
