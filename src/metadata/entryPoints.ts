import { WheelError } from '../errors.js';
import { FieldBlockReader, type FieldGrammar } from './fieldBlock.js';

/** A parsed `module:attr [extra, ...]` reference. */
export type EntryPointTarget = {
  module: string;
  attribute?: string;
  extras: string[];
};

export type EntryPoint = {
  name: string;
  value: string;
  target: EntryPointTarget;
};

export type EntryPointSection = {
  name: string;
  entries: EntryPoint[];
};

const SECTION_HEADER = /^\[([^\]]+)\]\s*$/;
const TARGET = /^([\w.]+)\s*(?::\s*([\w.]+))?\s*(?:\[\s*([^\]]*)\])?$/;
const ENTRY_POINT_GRAMMAR: FieldGrammar = { separator: '=', trimWhitespace: true, source: 'entry_points.txt' };

/**
 * Parse `entry_points.txt`.
 *
 * Each section body is read with the same field-block grammar as METADATA,
 * using `=` in place of `:`; blank lines and `#`/`;` comments are skipped.
 */
export function parseEntryPoints(text: string): EntryPointSection[] {
  const sections: Array<{ name: string; reader: FieldBlockReader }> = [];
  let current: { name: string; reader: FieldBlockReader } | undefined;

  text.split(/\r\n|\r|\n/).forEach((line, index) => {
    const lineNumber = index + 1;
    const trimmed = line.trim();
    if (trimmed.length === 0 || trimmed.startsWith('#') || trimmed.startsWith(';')) return;

    const header = /^\s/.test(line) ? null : SECTION_HEADER.exec(trimmed);
    if (header) {
      const name = (header[1] ?? '').trim();
      if (sections.some((section) => section.name === name)) {
        throw malformed(`Duplicate section [${name}]`, lineNumber);
      }
      current = { name, reader: new FieldBlockReader(ENTRY_POINT_GRAMMAR) };
      sections.push(current);
      return;
    }
    if (!current) {
      throw malformed('Entry appears before any [section] header', lineNumber);
    }
    current.reader.push(line, lineNumber);
  });

  return sections.map(({ name, reader }) => {
    const entries: EntryPoint[] = [];
    for (const field of reader.fields()) {
      if (entries.some((entry) => entry.name === field.name)) {
        throw malformed(`Duplicate entry point ${field.name} in [${name}]`, field.line);
      }
      entries.push({ name: field.name, value: field.value, target: parseEntryPointTarget(field.value, field.line) });
    }
    return { name, entries };
  });
}

/** Parse an entry point value such as `pkg.cli:main [color]`. */
export function parseEntryPointTarget(value: string, line?: number): EntryPointTarget {
  const match = TARGET.exec(value.trim());
  if (!match || match[1] === undefined) {
    throw malformed(`Invalid entry point reference ${JSON.stringify(value)}`, line);
  }
  const extras = (match[3] ?? '')
    .split(',')
    .map((extra) => extra.trim())
    .filter((extra) => extra.length > 0);
  return match[2] !== undefined ? { module: match[1], attribute: match[2], extras } : { module: match[1], extras };
}

export function serializeEntryPoints(sections: readonly EntryPointSection[]): string {
  return sections
    .map((section) => {
      const lines = section.entries.map((entry) => `${entry.name} = ${entry.value}`);
      return [`[${section.name}]`, ...lines].join('\n') + '\n';
    })
    .join('\n');
}

/** Look up one entry point group, e.g. `console_scripts`. */
export function findEntryPointGroup(sections: readonly EntryPointSection[], group: string): EntryPoint[] {
  return sections.find((section) => section.name === group)?.entries.map((entry) => ({ ...entry })) ?? [];
}

function malformed(message: string, line?: number): WheelError {
  return new WheelError('WHEEL_MALFORMED_METADATA', line !== undefined ? `${message} (line ${line})` : message, {
    line,
    entryName: 'entry_points.txt'
  });
}
