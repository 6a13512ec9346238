import { createHash, getHashes } from 'node:crypto';
import { toBase64Url } from './binary.js';
import { WheelError } from './errors.js';

/** A named pure digest function. */
export type Digester = {
  /** Name written before `=` in RECORD, e.g. `sha256`. */
  algorithm: string;
  digest(data: Uint8Array): Uint8Array;
};

// RECORD hashes must be sha256 or stronger; these may be read but never written.
const WEAK_ALGORITHMS = new Set(['md5', 'sha1']);

const digesters = new Map<string, Digester>();
let builtinsRegistered = false;

/** Digester backed by `node:crypto`. */
export function createNodeDigester(algorithm: string): Digester {
  const name = algorithm.toLowerCase();
  if (!getHashes().includes(name)) {
    throw new WheelError('WHEEL_UNSUPPORTED_DIGEST', `Digest algorithm ${algorithm} is not available`, {
      context: { algorithm }
    });
  }
  return {
    algorithm: name,
    digest(data) {
      return createHash(name).update(data).digest();
    }
  };
}

/** Register a digester by algorithm name, replacing any previous one. */
export function registerDigester(digester: Digester): void {
  digesters.set(digester.algorithm.toLowerCase(), digester);
}

/** Look up a registered digester by algorithm name. */
export function getDigester(algorithm: string): Digester | undefined {
  return digesters.get(algorithm.toLowerCase());
}

/** List all registered digesters. */
export function listDigesters(): Digester[] {
  return [...digesters.values()];
}

/**
 * Resolve the digester used to write RECORD.
 *
 * @throws WheelError `WHEEL_UNSUPPORTED_DIGEST` for unknown or weak algorithms.
 */
export function resolveDigester(choice: string | Digester | undefined): Digester {
  const digester = typeof choice === 'object' ? choice : getDigester(choice ?? 'sha256');
  const algorithm = typeof choice === 'object' ? choice.algorithm : choice ?? 'sha256';
  if (!digester) {
    throw new WheelError('WHEEL_UNSUPPORTED_DIGEST', `No digester registered for ${algorithm}`, {
      context: { algorithm }
    });
  }
  if (WEAK_ALGORITHMS.has(digester.algorithm.toLowerCase())) {
    throw new WheelError('WHEEL_UNSUPPORTED_DIGEST', `Digest algorithm ${digester.algorithm} is too weak for RECORD`, {
      context: { algorithm: digester.algorithm }
    });
  }
  if (!/^[a-z0-9_-]+$/i.test(digester.algorithm)) {
    throw new WheelError('WHEEL_UNSUPPORTED_DIGEST', `Invalid digest algorithm name ${JSON.stringify(digester.algorithm)}`, {
      context: { algorithm: digester.algorithm }
    });
  }
  return digester;
}

/** Digest bytes and encode them as RECORD expects (unpadded base64url). */
export function encodeDigest(digester: Digester, data: Uint8Array): string {
  return toBase64Url(digester.digest(data));
}

function registerBuiltins(): void {
  if (builtinsRegistered) return;
  builtinsRegistered = true;
  registerDigester(createNodeDigester('sha256'));
  registerDigester(createNodeDigester('sha384'));
  registerDigester(createNodeDigester('sha512'));
}

registerBuiltins();
