import fs from 'fs';
import path from 'path';
import { gzipSync } from 'zlib';
import sax from 'sax';
import xml from 'xml';
import type { DateTime } from 'luxon';
import type { GuideDocument, GuideNode, WriteResult } from './types';

export const GUIDE_FILE = 'epg.xml';
export const GUIDE_GZ_FILE = 'epg.xml.gz';

export class GuideParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GuideParseError';
  }
}

// XMLTV style: 20251115200000 +0200
export function formatXmltvTime(dt: DateTime): string {
  return dt.toFormat('yyyyLLddHHmmss ZZZ');
}

function toXmlObject(node: GuideNode): xml.XmlObject {
  const attrs = { _attr: { ...node.attributes } };
  if (!node.children.length) {
    const content: xml.XmlDesc[] = [attrs, node.text ?? ''];
    return { [node.name]: content };
  }
  const content: xml.XmlDescArray = [attrs, ...node.children.map(toXmlObject)];
  return { [node.name]: content };
}

export function serializeGuide(doc: GuideDocument, opts: { pretty?: boolean } = {}): Buffer {
  const out = xml(toXmlObject(doc.root), { declaration: true, indent: opts.pretty ? '  ' : undefined });
  return Buffer.from(out, 'utf8');
}

export function compressGuide(bytes: Buffer): Buffer {
  return gzipSync(bytes);
}

export async function writeGuideFiles(outputDir: string, xmlBytes: Buffer, gzBytes: Buffer): Promise<WriteResult> {
  const xmlPath = path.join(outputDir, GUIDE_FILE);
  const gzPath = path.join(outputDir, GUIDE_GZ_FILE);
  try {
    await fs.promises.mkdir(outputDir, { recursive: true });
    await fs.promises.writeFile(xmlPath, xmlBytes);
    await fs.promises.writeFile(gzPath, gzBytes);
    return { ok: true, files: [xmlPath, gzPath], bytes: xmlBytes.length };
  } catch (e) {
    return { ok: false, error: e instanceof Error ? e : new Error(String(e)) };
  }
}

/** Serializes, compresses and writes `epg.xml` and `epg.xml.gz`. Failures come back as a result, never thrown. */
export async function writeGuide(doc: GuideDocument, outputDir: string, opts: { pretty?: boolean } = {}): Promise<WriteResult> {
  const bytes = serializeGuide(doc, opts);
  return writeGuideFiles(outputDir, bytes, compressGuide(bytes));
}

/** Parses an XMLTV document into a {@link GuideNode} tree rooted at its document element. */
export function parseGuideXml(text: string): GuideNode {
  const parser = sax.parser(true, { trim: true });
  const stack: GuideNode[] = [];
  const doc: { root?: GuideNode } = {};

  const appendText = (t: string) => {
    const current = stack[stack.length - 1];
    if (current) current.text = (current.text ?? '') + t;
  };

  parser.onerror = (err: Error) => {
    throw new GuideParseError(err.message.split('\n')[0]);
  };
  parser.onopentag = (tag) => {
    const attributes: Record<string, string> = {};
    for (const [k, v] of Object.entries(tag.attributes)) {
      attributes[k] = typeof v === 'string' ? v : v.value;
    }
    const node: GuideNode = { name: tag.name, attributes, children: [] };
    const parent = stack[stack.length - 1];
    if (parent) parent.children.push(node);
    else if (!doc.root) doc.root = node;
    stack.push(node);
  };
  parser.ontext = appendText;
  parser.oncdata = appendText;
  parser.onclosetag = () => {
    stack.pop();
  };

  parser.write(text).close();
  if (!doc.root) throw new GuideParseError('document has no root element');
  return doc.root;
}
