/**
 * Material Dialect Parser
 *
 * Line scanner for the restricted YAML-like dialect of material files:
 * directives, tagged document markers, block mappings and sequences
 * (including sequences written at their parent key's indent), compact
 * "- key: value" items and single-line flow mappings. Scalars stay strings;
 * callers convert them.
 */

export interface DialectMapping {
  [key: string]: DialectValue;
}

export type DialectValue = string | DialectMapping | DialectValue[];

export interface DialectDocument {
  /** Class id from a "--- !u!<classId> &<fileId>" marker */
  readonly classId?: number | undefined;
  readonly fileId?: string | undefined;
  readonly root: DialectMapping;
}

interface Line {
  indent: number;
  text: string;
}

const DOCUMENT_MARKER = /^---(?:\s+!u!(\d+))?(?:\s+&(-?\d+))?/;
const KEY_LINE = /^([^\s:{}[\],"'#!&*-][^:]*?|-[^\s:][^:]*?)\s*:(?:\s+(.*))?$/;
const TAG_PREFIX = /^(?:[!&][^\s{}[\],]*\s*)+/;

export function isDialectMapping(value: DialectValue | undefined): value is DialectMapping {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Split text into documents and parse each one
 */
export function parseMaterialDocuments(text: string): DialectDocument[] {
  const documents: DialectDocument[] = [];
  let lines: Line[] = [];
  let classId: number | undefined;
  let fileId: string | undefined;
  let started = false;

  const flush = (): void => {
    if (!started && lines.length === 0) return;
    documents.push({ classId, fileId, root: parseRoot(lines) });
  };

  for (const rawLine of text.replace(/^\uFEFF/, '').split(/\r?\n/)) {
    if (rawLine.startsWith('%')) continue;

    const marker = DOCUMENT_MARKER.exec(rawLine);
    if (marker) {
      flush();
      lines = [];
      started = true;
      classId = marker[1] === undefined ? undefined : Number.parseInt(marker[1], 10);
      fileId = marker[2];
      continue;
    }

    const expanded = rawLine.replace(/\t/g, '  ');
    const trimmed = expanded.trim();
    if (trimmed.length === 0 || trimmed.startsWith('#')) continue;

    lines.push({ indent: expanded.length - expanded.trimStart().length, text: trimmed });
  }
  flush();

  return documents;
}

const MATERIAL_CLASS_ID = 21;
const MATERIAL_ROOT_KEY = 'Material';

/**
 * Body of the Material document: class id 21 when marked, otherwise the
 * first document with a Material root key
 */
export function parseMaterialDocument(text: string): DialectMapping | undefined {
  const documents = parseMaterialDocuments(text);
  const chosen =
    documents.find(doc => doc.classId === MATERIAL_CLASS_ID && isDialectMapping(doc.root[MATERIAL_ROOT_KEY])) ??
    documents.find(doc => isDialectMapping(doc.root[MATERIAL_ROOT_KEY]));
  const body = chosen?.root[MATERIAL_ROOT_KEY];
  return isDialectMapping(body) ? body : undefined;
}

function parseRoot(lines: Line[]): DialectMapping {
  if (lines.length === 0) return {};
  const [value] = parseBlock(lines, 0, lines[0].indent);
  return isDialectMapping(value) ? value : {};
}

function isSequenceItem(text: string): boolean {
  return text === '-' || text.startsWith('- ');
}

function parseBlock(lines: Line[], start: number, indent: number): [DialectValue, number] {
  return isSequenceItem(lines[start].text)
    ? parseSequence(lines, start, indent)
    : parseMapping(lines, start, indent);
}

function parseMapping(lines: Line[], start: number, indent: number): [DialectMapping, number] {
  const mapping: DialectMapping = {};
  let i = start;

  while (i < lines.length && lines[i].indent >= indent) {
    const line = lines[i];
    if (line.indent > indent || isSequenceItem(line.text)) {
      // Stray deeper line or a sequence with no owning key
      i++;
      continue;
    }

    const match = KEY_LINE.exec(line.text);
    if (!match) {
      i++;
      continue;
    }

    const key = match[1];
    const rest = match[2]?.trim() ?? '';
    i++;

    let value: DialectValue;
    if (rest.length > 0 && stripTags(rest).length > 0) {
      value = parseInline(rest);
      // Wrapped long scalars continue on deeper lines
      while (i < lines.length && lines[i].indent > indent && typeof value === 'string') {
        value = `${value} ${lines[i].text}`;
        i++;
      }
    } else if (i < lines.length && lines[i].indent > indent) {
      [value, i] = parseBlock(lines, i, lines[i].indent);
    } else if (i < lines.length && lines[i].indent === indent && isSequenceItem(lines[i].text)) {
      [value, i] = parseSequence(lines, i, indent);
    } else {
      value = '';
    }

    mapping[key] = value;
  }

  return [mapping, i];
}

function parseSequence(lines: Line[], start: number, indent: number): [DialectValue[], number] {
  const items: DialectValue[] = [];
  let i = start;

  while (i < lines.length && lines[i].indent === indent && isSequenceItem(lines[i].text)) {
    const line = lines[i];
    const content = line.text.slice(1).trimStart();

    if (content.length === 0) {
      i++;
      if (i < lines.length && lines[i].indent > indent) {
        let value: DialectValue;
        [value, i] = parseBlock(lines, i, lines[i].indent);
        items.push(value);
      } else {
        items.push('');
      }
      continue;
    }

    if (KEY_LINE.test(content) || isSequenceItem(content)) {
      // Compact item: re-read the content as the first line of a nested block
      const itemIndent = line.indent + (line.text.length - content.length);
      lines[i] = { indent: itemIndent, text: content };
      let value: DialectValue;
      [value, i] = parseBlock(lines, i, itemIndent);
      items.push(value);
      continue;
    }

    items.push(parseInline(content));
    i++;
  }

  return [items, i];
}

function stripTags(text: string): string {
  return text.replace(TAG_PREFIX, '');
}

function unquote(text: string): string {
  if (text.length >= 2) {
    const first = text[0];
    const last = text[text.length - 1];
    if ((first === '"' || first === "'") && first === last) {
      const inner = text.slice(1, -1);
      return first === "'" ? inner.replace(/''/g, "'") : inner.replace(/\\"/g, '"').replace(/\\\\/g, '\\');
    }
  }
  return text;
}

/**
 * Inline value after "key:" or "- "
 */
function parseInline(text: string): DialectValue {
  const value = stripTags(text.trim());
  if (value.startsWith('{') || value.startsWith('[')) {
    return new FlowScanner(value).parse();
  }
  return unquote(value);
}

/**
 * Cursor over one flow collection, e.g. {fileID: 0, guid: abc, type: 3}
 */
class FlowScanner {
  private pos = 0;

  constructor(private readonly text: string) {}

  parse(): DialectValue {
    return this.readValue();
  }

  private skipSpace(): void {
    while (this.pos < this.text.length && /\s/.test(this.text[this.pos])) {
      this.pos++;
    }
  }

  /**
   * Index of the first stop character at or after the cursor, stepping over
   * a token that opens with a quote. The text length when there is none.
   */
  private scanTo(stops: string): number {
    const first = this.text[this.pos];
    let index = first === '"' || first === "'" ? this.skipQuoted(this.pos) : this.pos;
    while (index < this.text.length) {
      if (stops.includes(this.text[index])) return index;
      index++;
    }
    return this.text.length;
  }

  private skipQuoted(open: number): number {
    const quote = this.text[open];
    let index = open + 1;
    while (index < this.text.length) {
      const char = this.text[index];
      if (quote === '"' && char === '\\') {
        index += 2;
        continue;
      }
      if (char === quote) {
        if (quote === "'" && this.text[index + 1] === "'") {
          index += 2;
          continue;
        }
        return index + 1;
      }
      index++;
    }
    return index;
  }

  private readValue(): DialectValue {
    this.skipSpace();
    const char = this.text[this.pos];
    if (char === '{') return this.readMapping();
    if (char === '[') return this.readSequence();
    return this.readScalar();
  }

  private readMapping(): DialectMapping {
    const mapping: DialectMapping = {};
    this.pos++;

    while (this.pos < this.text.length) {
      this.skipSpace();
      if (this.text[this.pos] === '}') {
        this.pos++;
        break;
      }
      if (this.text[this.pos] === ',') {
        this.pos++;
        continue;
      }

      const colon = this.scanTo(':');
      if (colon === this.text.length) {
        this.pos = this.text.length;
        break;
      }
      const key = unquote(this.text.slice(this.pos, colon).trim());
      this.pos = colon + 1;
      const value = this.readValue();
      if (key.length > 0) {
        mapping[key] = value;
      }
    }

    return mapping;
  }

  private readSequence(): DialectValue[] {
    const items: DialectValue[] = [];
    this.pos++;

    while (this.pos < this.text.length) {
      this.skipSpace();
      if (this.text[this.pos] === ']') {
        this.pos++;
        break;
      }
      if (this.text[this.pos] === ',') {
        this.pos++;
        continue;
      }
      items.push(this.readValue());
    }

    return items;
  }

  private readScalar(): string {
    const start = this.pos;
    this.pos = this.scanTo(',}]');
    return unquote(stripTags(this.text.slice(start, this.pos).trim()));
  }
}
