import fs from 'fs';
import os from 'os';
import path from 'path';
import { gunzipSync } from 'zlib';
import { describe, it, expect } from 'vitest';
import { DateTime, FixedOffsetZone } from 'luxon';
import { buildGuideDocument } from './document';
import {
  compressGuide,
  formatXmltvTime,
  GUIDE_FILE,
  GUIDE_GZ_FILE,
  GuideParseError,
  parseGuideXml,
  serializeGuide,
  writeGuide,
} from './xmltv';

const zone = FixedOffsetZone.instance(120);

const doc = buildGuideDocument({
  channels: [{ channelId: 'teamaandb', displayName: 'Team A & B' }],
  programmes: [{
    channelId: 'teamaandb',
    start: DateTime.fromISO('2025-11-15T20:00', { zone }),
    stop: DateTime.fromISO('2025-11-15T22:00', { zone }),
    kind: 'event',
    title: 'Trasmesso in diretta.',
    description: 'Team A & B',
    category: 'Football',
  }],
}, 'it');

describe('formatXmltvTime', () => {
  it('renders the local time with its offset', () => {
    expect(formatXmltvTime(DateTime.fromISO('2025-11-15T20:00', { zone }))).toBe('20251115200000 +0200');
    expect(formatXmltvTime(DateTime.fromISO('2025-01-02T03:04:05', { zone: FixedOffsetZone.instance(-300) }))).toBe('20250102030405 -0500');
  });
});

describe('serializeGuide', () => {
  const text = serializeGuide(doc).toString('utf8');

  it('starts with the XML declaration', () => {
    expect(text.startsWith('<?xml version="1.0" encoding="UTF-8"?>')).toBe(true);
  });

  it('escapes text and renders channel declarations', () => {
    expect(text).toContain('<channel id="teamaandb"><display-name lang="it">Team A &amp; B</display-name></channel>');
  });

  it('renders programmes with their attributes and children', () => {
    expect(text).toContain(
      '<programme start="20251115200000 +0200" stop="20251115220000 +0200" channel="teamaandb">'
      + '<title lang="it">Trasmesso in diretta.</title>'
      + '<desc lang="it">Team A &amp; B</desc>'
      + '<category lang="it">Football</category>'
      + '</programme>',
    );
  });

  it('reads back into the same tree', () => {
    expect(parseGuideXml(text)).toEqual(doc.root);
  });

  it('produces only the root element for an empty guide', () => {
    const empty = serializeGuide(buildGuideDocument({ channels: [], programmes: [] }, 'it'));
    expect(parseGuideXml(empty.toString('utf8'))).toEqual({ name: 'tv', attributes: { 'generator-info-name': 'live-epg' }, children: [] });
  });
});

describe('compressGuide', () => {
  it('gzips the serialized bytes', () => {
    const bytes = serializeGuide(doc);
    expect(gunzipSync(compressGuide(bytes)).equals(bytes)).toBe(true);
  });
});

describe('parseGuideXml', () => {
  it('parses an XMLTV fragment', () => {
    const tree = parseGuideXml(`<?xml version="1.0" encoding="UTF-8"?>
<!DOCTYPE tv SYSTEM "xmltv.dtd">
<tv source-info-name="example">
  <channel id="Rai 1.it"><display-name lang="it">Rai 1</display-name></channel>
  <programme start="20251115060000 +0100" stop="20251115063000 +0100" channel="Rai 1.it">
    <title lang="it">Tg1 &amp; Meteo</title>
    <desc><![CDATA[Edizione <mattino>]]></desc>
  </programme>
</tv>`);

    expect(tree.attributes).toEqual({ 'source-info-name': 'example' });
    expect(tree.children.map((c) => c.name)).toEqual(['channel', 'programme']);
    const [, programme] = tree.children;
    expect(programme.attributes.channel).toBe('Rai 1.it');
    expect(programme.children.map((c) => c.text)).toEqual(['Tg1 & Meteo', 'Edizione <mattino>']);
  });

  it('throws on malformed XML', () => {
    expect(() => parseGuideXml('<tv><channel></tv>')).toThrow(GuideParseError);
    expect(() => parseGuideXml('')).toThrow(GuideParseError);
  });
});

describe('writeGuide', () => {
  it('writes the XML and its gzip copy', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'live-epg-'));
    const result = await writeGuide(doc, dir);

    expect(result).toEqual({ ok: true, files: [path.join(dir, GUIDE_FILE), path.join(dir, GUIDE_GZ_FILE)], bytes: serializeGuide(doc).length });
    const written = fs.readFileSync(path.join(dir, GUIDE_FILE));
    expect(gunzipSync(fs.readFileSync(path.join(dir, GUIDE_GZ_FILE))).equals(written)).toBe(true);
  });

  it('reports I/O failures instead of throwing', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'live-epg-'));
    const file = path.join(dir, 'not-a-dir');
    fs.writeFileSync(file, 'x');

    const result = await writeGuide(doc, path.join(file, 'out'));
    expect(result.ok).toBe(false);
  });
});
