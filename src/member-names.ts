import * as fs from 'fs';
import { MEMBER_COUNTS, MEMBER_EXTENSIONS } from './shader-constants.js';
import type { ArchiveType, ClientVersion } from './shader-constants.js';

/**
 * Member names for an archive, in member order. Without a names file every
 * member is named after its zero-padded index.
 */
export function getMemberNames(client: ClientVersion, type: ArchiveType, namesFile?: string): string[] {
  const count = MEMBER_COUNTS[type][client];

  if (namesFile === undefined) {
    const width = String(count - 1).length;
    return Array.from({ length: count }, (_, i) => String(i).padStart(width, '0'));
  }

  const names = parseNames(fs.readFileSync(namesFile, 'utf8'));
  if (names.length !== count) {
    throw new Error(`Names file ${namesFile} lists ${names.length} names, ${type} archives for ${client} have ${count} members`);
  }
  return names;
}

/**
 * One name per line. Blank lines and lines starting with `#` are skipped.
 */
export function parseNames(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0 && !line.startsWith('#'));
}

/**
 * Path of a member file. The prefix is prepended as is, so `fx/` names a
 * directory while `fx_` only prefixes the file name.
 */
export function memberPath(prefix: string, name: string, type: ArchiveType): string {
  return `${prefix}${name}.${MEMBER_EXTENSIONS[type]}`;
}
