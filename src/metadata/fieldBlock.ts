import { WheelError } from '../errors.js';

/** Field syntax shared by METADATA/WHEEL (`Name: value`) and entry_points.txt (`name = value`). */
export type FieldGrammar = {
  separator: ':' | '=';
  /**
   * Trim whitespace around names and values. Without it, whitespace in a
   * name makes the line invalid and trailing whitespace stays in the value.
   */
  trimWhitespace: boolean;
  /** Document name used in error reports. */
  source?: string;
};

export type FieldLine = {
  name: string;
  value: string;
  line: number;
};

export const METADATA_GRAMMAR: FieldGrammar = { separator: ':', trimWhitespace: false };

/**
 * Accumulates field lines, folding indented continuation lines into the
 * previous value with a single space (none when the value is still empty).
 */
export class FieldBlockReader {
  private readonly collected: FieldLine[] = [];

  constructor(private readonly grammar: FieldGrammar) {}

  /** Feed one non-blank line. */
  push(line: string, lineNumber: number): void {
    if (line.startsWith(' ') || line.startsWith('\t')) {
      const previous = this.collected[this.collected.length - 1];
      if (!previous) {
        throw this.malformed('Continuation line has no preceding field', lineNumber);
      }
      const continuation = this.grammar.trimWhitespace ? line.trim() : line.trimStart();
      previous.value = previous.value.length === 0 ? continuation : `${previous.value} ${continuation}`;
      return;
    }

    const at = line.indexOf(this.grammar.separator);
    if (at < 0) {
      throw this.malformed(`Expected a "${this.grammar.separator}" separating name and value`, lineNumber);
    }
    const rawName = line.slice(0, at);
    const name = this.grammar.trimWhitespace ? rawName.trim() : rawName;
    if (!isValidFieldName(name, this.grammar)) {
      throw this.malformed(`Invalid field name ${JSON.stringify(rawName)}`, lineNumber);
    }
    const rawValue = line.slice(at + 1).trimStart();
    this.collected.push({
      name,
      value: this.grammar.trimWhitespace ? rawValue.trimEnd() : rawValue,
      line: lineNumber
    });
  }

  fields(): FieldLine[] {
    return this.collected.map((field) => ({ ...field }));
  }

  private malformed(message: string, line: number): WheelError {
    return new WheelError('WHEEL_MALFORMED_METADATA', `${message} (line ${line})`, {
      line,
      ...(this.grammar.source !== undefined ? { entryName: this.grammar.source } : {})
    });
  }
}

export function isValidFieldName(name: string, grammar: FieldGrammar = METADATA_GRAMMAR): boolean {
  if (name.length === 0) return false;
  if (name.includes(grammar.separator)) return false;
  return grammar.trimWhitespace ? !/[\r\n]/.test(name) : !/[\s:]/.test(name);
}
