import { WheelError, type Discrepancy } from '../errors.js';
import { encodeDigest, getDigester, type Digester } from '../digest.js';
import { assertSafePath, comparePaths, isDirectoryPath } from '../paths.js';

export type RecordDigest = {
  algorithm: string;
  /** Unpadded base64url digest value. */
  value: string;
};

/** One RECORD row. The self entry and directory markers carry no digest. */
export type RecordEntry = {
  path: string;
  digest?: RecordDigest;
  size?: number;
};

export type BuildRecordOptions = {
  /** Archive path of the RECORD file itself, appended last with empty digest and size. */
  recordPath: string;
};

export type VerifyRecordOptions = {
  /** Archive path of the RECORD file; defaults to the entry ending in `.dist-info/RECORD`. */
  recordPath?: string | undefined;
  /** Digesters consulted before the global registry. */
  digesters?: readonly Digester[] | undefined;
};

const SIGNATURE_SUFFIXES = ['.jws', '.p7s'] as const;
const DISCREPANCY_ORDER: Record<Discrepancy['kind'], number> = {
  MissingFile: 0,
  UnlistedFile: 1,
  SizeMismatch: 2,
  DigestMismatch: 3
};

/**
 * Parse RECORD text: one `path,algorithm=digest,size` row per line, with
 * minimal CSV quoting.
 *
 * @throws WheelError `WHEEL_MALFORMED_RECORD` or `WHEEL_INVALID_PATH`, naming the line.
 */
export function parseRecord(text: string): RecordEntry[] {
  const entries: RecordEntry[] = [];
  const seen = new Set<string>();

  for (const row of readRows(text)) {
    if (row.fields.length === 1 && row.fields[0] === '' && !row.quoted) continue;
    const [path, hash, size] = row.fields;
    if (row.fields.length !== 3 || path === undefined || hash === undefined || size === undefined) {
      throw malformedRow(`Expected 3 fields but found ${row.fields.length}`, row.line);
    }
    assertSafePath(path, row.line);
    if (seen.has(path)) {
      throw malformedRow(`Duplicate path ${path}`, row.line, path);
    }
    seen.add(path);

    const entry: RecordEntry = { path };
    if (hash.length > 0) {
      const separator = hash.indexOf('=');
      const algorithm = separator > 0 ? hash.slice(0, separator) : '';
      const value = separator > 0 ? stripPadding(hash.slice(separator + 1)) : '';
      if (algorithm.length === 0 || value.length === 0) {
        throw malformedRow(`Hash field ${JSON.stringify(hash)} is not "algorithm=digest"`, row.line, path);
      }
      entry.digest = { algorithm: algorithm.toLowerCase(), value };
    }
    if (size.length > 0) {
      if (!/^\d+$/.test(size)) {
        throw malformedRow(`Size field ${JSON.stringify(size)} is not a decimal integer`, row.line, path);
      }
      const parsed = Number(size);
      if (!Number.isSafeInteger(parsed)) {
        throw malformedRow(`Size field ${size} is too large`, row.line, path);
      }
      entry.size = parsed;
    }
    entries.push(entry);
  }

  return entries;
}

/** Serialize entries as RECORD text, one `\n`-terminated row each. */
export function serializeRecord(entries: readonly RecordEntry[]): string {
  return entries
    .map((entry) => {
      const hash = entry.digest ? `${entry.digest.algorithm}=${entry.digest.value}` : '';
      const size = entry.size !== undefined ? String(entry.size) : '';
      return `${quoteField(entry.path)},${quoteField(hash)},${size}\n`;
    })
    .join('');
}

/**
 * Digest every file, in the order given, and append the self entry.
 *
 * Directory markers (paths ending in `/`) are listed with no digest.
 */
export function buildRecord(
  files: Iterable<readonly [string, Uint8Array]>,
  digester: Digester,
  options: BuildRecordOptions
): RecordEntry[] {
  const entries: RecordEntry[] = [];
  const seen = new Set<string>([options.recordPath]);
  assertSafePath(options.recordPath);

  for (const [path, data] of files) {
    assertSafePath(path);
    if (seen.has(path)) {
      throw new WheelError('WHEEL_INVALID_PATH', `Duplicate or reserved RECORD path ${path}`, { entryName: path });
    }
    seen.add(path);
    if (isDirectoryPath(path)) {
      entries.push({ path, size: 0 });
      continue;
    }
    entries.push({
      path,
      digest: { algorithm: digester.algorithm, value: encodeDigest(digester, data) },
      size: data.length
    });
  }

  entries.push({ path: options.recordPath });
  return entries;
}

/**
 * Compare RECORD entries with actual contents. Never throws for a mismatch;
 * every difference is returned, ordered by path.
 *
 * @throws WheelError `WHEEL_UNSUPPORTED_DIGEST` when an entry uses an algorithm no digester handles.
 */
export function verifyRecord(
  entries: readonly RecordEntry[],
  actual: ReadonlyMap<string, Uint8Array>,
  options?: VerifyRecordOptions
): Discrepancy[] {
  const recordPath = options?.recordPath ?? entries.find((entry) => entry.path.endsWith('.dist-info/RECORD'))?.path;
  const exempt = new Set<string>();
  if (recordPath !== undefined) {
    exempt.add(recordPath);
    for (const suffix of SIGNATURE_SUFFIXES) exempt.add(`${recordPath}${suffix}`);
  }

  const discrepancies: Discrepancy[] = [];
  const listed = new Set<string>();

  for (const entry of entries) {
    listed.add(entry.path);
    if (entry.path === recordPath) continue;
    const data = actual.get(entry.path);
    if (data === undefined) {
      discrepancies.push({ kind: 'MissingFile', path: entry.path });
      continue;
    }
    if (entry.size !== undefined && entry.size !== data.length) {
      discrepancies.push({ kind: 'SizeMismatch', path: entry.path, expected: entry.size, actual: data.length });
    }
    if (entry.digest) {
      const digester = findDigester(entry.digest.algorithm, options?.digesters);
      if (!digester) {
        throw new WheelError('WHEEL_UNSUPPORTED_DIGEST', `No digester for ${entry.digest.algorithm}`, {
          entryName: entry.path,
          context: { algorithm: entry.digest.algorithm }
        });
      }
      const computed = encodeDigest(digester, data);
      if (computed !== stripPadding(entry.digest.value)) {
        discrepancies.push({
          kind: 'DigestMismatch',
          path: entry.path,
          algorithm: entry.digest.algorithm,
          expected: entry.digest.value,
          actual: computed
        });
      }
    }
  }

  for (const path of actual.keys()) {
    if (listed.has(path) || exempt.has(path) || isDirectoryPath(path)) continue;
    discrepancies.push({ kind: 'UnlistedFile', path });
  }

  return discrepancies.sort(
    (a, b) => comparePaths(a.path, b.path) || DISCREPANCY_ORDER[a.kind] - DISCREPANCY_ORDER[b.kind]
  );
}

function stripPadding(value: string): string {
  return value.replace(/=+$/, '');
}

function findDigester(algorithm: string, extra: readonly Digester[] | undefined): Digester | undefined {
  const key = algorithm.toLowerCase();
  return extra?.find((digester) => digester.algorithm.toLowerCase() === key) ?? getDigester(key);
}

function quoteField(value: string): string {
  if (!/[",\r\n]/.test(value)) return value;
  return `"${value.replace(/"/g, '""')}"`;
}

type Row = { fields: string[]; line: number; quoted: boolean };

function* readRows(text: string): Generator<Row> {
  let line = 1;
  let i = 0;

  while (i < text.length) {
    const rowLine = line;
    const fields: string[] = [];
    let quoted = false;

    for (;;) {
      let field = '';
      if (text[i] === '"') {
        quoted = true;
        i += 1;
        for (;;) {
          if (i >= text.length) {
            throw malformedRow('Unterminated quoted field', rowLine);
          }
          const ch = text[i];
          if (ch === '"') {
            if (text[i + 1] === '"') {
              field += '"';
              i += 2;
              continue;
            }
            i += 1;
            break;
          }
          if (ch === '\n') line += 1;
          field += ch;
          i += 1;
        }
        const next = text[i];
        if (next !== undefined && next !== ',' && next !== '\r' && next !== '\n') {
          throw malformedRow('Unexpected character after closing quote', rowLine);
        }
      } else {
        while (i < text.length && text[i] !== ',' && text[i] !== '\r' && text[i] !== '\n') {
          if (text[i] === '"') {
            throw malformedRow('Quote inside an unquoted field', rowLine);
          }
          field += text[i];
          i += 1;
        }
      }
      fields.push(field);
      if (text[i] === ',') {
        i += 1;
        continue;
      }
      break;
    }

    if (text[i] === '\r') i += 1;
    if (text[i] === '\n') i += 1;
    line += 1;
    yield { fields, line: rowLine, quoted };
  }
}

function malformedRow(message: string, line: number, path?: string): WheelError {
  return new WheelError('WHEEL_MALFORMED_RECORD', `Malformed RECORD row at line ${line}: ${message}`, {
    line,
    ...(path !== undefined ? { entryName: path } : {})
  });
}
