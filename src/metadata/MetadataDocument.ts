import { WheelError } from '../errors.js';
import { FieldBlockReader, METADATA_GRAMMAR, isValidFieldName } from './fieldBlock.js';

/** One `Name: value` pair. Names keep their original spelling. */
export type MetadataField = {
  name: string;
  value: string;
};

const CONTINUATION_INDENT = '        ';
const LINE_BREAK = /\r\n|\r|\n/;

/**
 * Ordered, duplicate-preserving field list with an optional free-text body,
 * as used by `METADATA` and `WHEEL`.
 *
 * Field names compare case-insensitively. A body is present (possibly empty)
 * when the source had a blank line after the field block.
 */
export class MetadataDocument {
  private readonly entries: MetadataField[];
  body: string | undefined;

  constructor(fields: Iterable<MetadataField | readonly [string, string]> = [], body?: string) {
    this.entries = [];
    for (const field of fields) {
      const [name, value] = isFieldTuple(field) ? field : [field.name, field.value];
      assertFieldName(name);
      this.entries.push({ name, value });
    }
    this.body = body;
  }

  /**
   * Parse the field block and optional body.
   *
   * @throws WheelError `WHEEL_MALFORMED_METADATA` naming the 1-based line.
   */
  static parse(text: string): MetadataDocument {
    const reader = new FieldBlockReader(METADATA_GRAMMAR);
    const breaks = /\r\n|\r|\n/g;
    let body: string | undefined;
    let cursor = 0;
    let lineNumber = 0;

    while (cursor < text.length) {
      breaks.lastIndex = cursor;
      const match = breaks.exec(text);
      const lineEnd = match ? match.index : text.length;
      const next = match ? lineEnd + match[0].length : text.length;
      const line = text.slice(cursor, lineEnd);
      lineNumber += 1;
      cursor = next;

      if (line.trim().length === 0) {
        body = text.slice(next);
        break;
      }
      reader.push(line, lineNumber);
    }

    return new MetadataDocument(
      reader.fields().map(({ name, value }) => ({ name, value })),
      body
    );
  }

  /** All values for a field, in document order. */
  getAll(name: string): string[] {
    const key = name.toLowerCase();
    return this.entries.filter((field) => field.name.toLowerCase() === key).map((field) => field.value);
  }

  /** First value for a field, if present. */
  getFirst(name: string): string | undefined {
    const key = name.toLowerCase();
    return this.entries.find((field) => field.name.toLowerCase() === key)?.value;
  }

  has(name: string): boolean {
    return this.getFirst(name) !== undefined;
  }

  /** Append a field, keeping any existing occurrences. */
  add(name: string, value: string): this {
    assertFieldName(name);
    this.entries.push({ name, value });
    return this;
  }

  /**
   * Replace every occurrence of a field with a single value, kept at the
   * position of the first occurrence (or appended when absent).
   */
  set(name: string, value: string): this {
    assertFieldName(name);
    const key = name.toLowerCase();
    const first = this.entries.findIndex((field) => field.name.toLowerCase() === key);
    if (first < 0) {
      this.entries.push({ name, value });
      return this;
    }
    this.remove(name);
    this.entries.splice(first, 0, { name, value });
    return this;
  }

  /** Remove every occurrence of a field; returns how many were removed. */
  remove(name: string): number {
    const key = name.toLowerCase();
    let removed = 0;
    for (let i = this.entries.length - 1; i >= 0; i -= 1) {
      if (this.entries[i]?.name.toLowerCase() === key) {
        this.entries.splice(i, 1);
        removed += 1;
      }
    }
    return removed;
  }

  fields(): MetadataField[] {
    return this.entries.map((field) => ({ ...field }));
  }

  /** Distinct field names in first-seen order, spelled as first seen. */
  names(): string[] {
    const seen = new Map<string, string>();
    for (const field of this.entries) {
      const key = field.name.toLowerCase();
      if (!seen.has(key)) seen.set(key, field.name);
    }
    return [...seen.values()];
  }

  clone(): MetadataDocument {
    return new MetadataDocument(this.fields(), this.body);
  }

  /** Serialize with `\n` line endings, folding multi-line values. */
  toString(): string {
    let out = '';
    for (const field of this.entries) {
      out += `${field.name}: ${foldForOutput(field.value)}\n`;
    }
    if (this.body !== undefined) {
      out += `\n${this.body}`;
    }
    return out;
  }
}

/** Parse a metadata document. */
export function parseMetadata(text: string): MetadataDocument {
  return MetadataDocument.parse(text);
}

/** Serialize a metadata document. */
export function serializeMetadata(document: MetadataDocument): string {
  return document.toString();
}

/**
 * The value a field reads back as after a serialize/parse round trip:
 * lines trimmed at the start, empty continuation lines dropped, joined by
 * single spaces. An empty first line adds no separator.
 */
export function foldValue(value: string): string {
  const [first = '', ...rest] = value.split(LINE_BREAK);
  const continuations = rest.map((line) => line.trimStart()).filter((line) => line.length > 0);
  const head = first.trimStart();
  return (head.length > 0 ? [head, ...continuations] : continuations).join(' ');
}

function foldForOutput(value: string): string {
  const [first = '', ...rest] = value.split(LINE_BREAK);
  const continuations = rest.map((line) => line.trimStart()).filter((line) => line.length > 0);
  return [first.trimStart(), ...continuations.map((line) => `${CONTINUATION_INDENT}${line}`)].join('\n');
}

function assertFieldName(name: string): void {
  if (!isValidFieldName(name)) {
    throw new WheelError('WHEEL_MALFORMED_METADATA', `Invalid field name ${JSON.stringify(name)}`, {
      context: { field: name }
    });
  }
}

function isFieldTuple(field: MetadataField | readonly [string, string]): field is readonly [string, string] {
  return Array.isArray(field);
}
