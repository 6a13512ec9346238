import { escapeFilenameComponent, escapeVersion } from '../tags/filename.js';
import type { DataCategory } from './types.js';

export const WHEEL_FORMAT_VERSION = '1.0';
export const GENERATOR = 'wheelwright (0.1.0)';
export const DATA_CATEGORIES: readonly DataCategory[] = ['purelib', 'platlib', 'scripts', 'headers', 'data'];

export const METADATA_FILE = 'METADATA';
export const WHEEL_FILE = 'WHEEL';
export const RECORD_FILE = 'RECORD';
export const ENTRY_POINTS_FILE = 'entry_points.txt';

export const FILE_MODE = 0o100644;
export const EXECUTABLE_MODE = 0o100755;
export const DIRECTORY_MODE = 0o40755;

/** `{name}-{version}` as it appears in `.dist-info` and `.data` directory names. */
export function archiveStem(distribution: string, version: string): string {
  return `${escapeFilenameComponent(distribution)}-${escapeVersion(version)}`;
}

export function distInfoDirectory(distribution: string, version: string): string {
  return `${archiveStem(distribution, version)}.dist-info`;
}

export function dataDirectory(distribution: string, version: string): string {
  return `${archiveStem(distribution, version)}.data`;
}

export function isDataCategory(value: string): value is DataCategory {
  return DATA_CATEGORIES.some((category) => category === value);
}
