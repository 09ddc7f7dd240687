import * as fs from 'fs';
import * as path from 'path';
import ProgressBar from 'progress';
import { CONTINUE, ShaderArchive, stop } from './archive.js';
import { CorruptArchiveError, CouldNotOpenError, NoDataError } from './errors.js';
import { readFileBytes, writeFileBytes } from './io.js';
import { Logger } from './logger.js';
import { getMemberNames, memberPath } from './member-names.js';
import type { ArchiveType, ClientVersion } from './shader-constants.js';

export interface OperationContext {
  client: ClientVersion;
  type: ArchiveType;
  /** Archive to read or write */
  file: string;
  /** Prepended to every member file name */
  prefix: string;
  /** Optional names file, see member-names.ts */
  namesFile?: string;
}

/**
 * An operation failed; the message is meant for the user.
 */
export class PackagerError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'PackagerError';
  }
}

export interface UnpackSummary {
  written: number;
  /** Members beyond the names table, left unwritten */
  extra: boolean;
}

export interface PackSummary {
  members: number;
  bytes: number;
}

function loadArchive(file: string): ShaderArchive {
  const archive = new ShaderArchive();
  try {
    archive.readFromFile(file);
  } catch (err) {
    if (err instanceof CouldNotOpenError) {
      throw new PackagerError('could not open file', { cause: err });
    }
    if (err instanceof CorruptArchiveError) {
      throw new PackagerError('archive is corrupt', { cause: err });
    }
    throw err;
  }
  return archive;
}

function createProgressBar(label: string, total: number): ProgressBar {
  return new ProgressBar(`${label}: [:bar] :current/:total :name`, { total, width: 30 });
}

type UnpackStop =
  | { kind: 'too-many-members' }
  | { kind: 'write-failed'; name: string };

/**
 * Writes each member of the archive to its own file.
 *
 * Members beyond the names table are ignored, as the game does; fewer members
 * than names is an error.
 */
export function unpackArchive(op: OperationContext): UnpackSummary {
  const names = getMemberNames(op.client, op.type, op.namesFile);
  const archive = loadArchive(op.file);

  const directory = path.dirname(memberPath(op.prefix, 'member', op.type));
  if (!fs.existsSync(directory)) {
    fs.mkdirSync(directory, { recursive: true });
  }

  const progressBar = createProgressBar('Unpacking', names.length);
  const outcome = archive.forEachUntil<UnpackStop>((data, index) => {
    if (index >= names.length) {
      return stop({ kind: 'too-many-members' });
    }

    const name = names[index];
    if (!writeFileBytes(memberPath(op.prefix, name, op.type), data)) {
      return stop({ kind: 'write-failed', name });
    }

    progressBar.tick({ name });
    return CONTINUE;
  });

  if (outcome.kind === 'stopped') {
    if (outcome.value.kind === 'write-failed') {
      Logger.warn(`failed to write member ${outcome.value.name}`);
      throw new PackagerError('failed to write member to corresponding file');
    }
    Logger.warn(`archive has more than ${names.length} members, the rest were skipped`);
    return { written: outcome.index, extra: true };
  }

  if (outcome.visited < names.length) {
    throw new PackagerError(`loaded archive has missing members (${outcome.visited} of ${names.length})`);
  }

  return { written: outcome.visited, extra: false };
}

/**
 * Builds an archive from the member files, in names table order.
 */
export function packArchive(op: OperationContext): PackSummary {
  const names = getMemberNames(op.client, op.type, op.namesFile);
  const members: Buffer[] = [];

  const progressBar = createProgressBar('Packing', names.length);
  for (const name of names) {
    const filePath = memberPath(op.prefix, name, op.type);
    const data = readFileBytes(filePath);
    if (data === undefined) {
      Logger.warn(`on file ${filePath}:`);
      throw new PackagerError('failed to read member file');
    }
    members.push(data);
    progressBar.tick({ name });
  }

  const archive = new ShaderArchive();
  archive.assemble(members);
  const bytes = archive.byteLength;

  try {
    archive.flushToFile(op.file);
  } catch (err) {
    if (err instanceof NoDataError) {
      throw new PackagerError('no data to write', { cause: err });
    }
    if (err instanceof CouldNotOpenError) {
      throw new PackagerError('could not open output file for writing', { cause: err });
    }
    throw err;
  }

  return { members: members.length, bytes };
}

/**
 * Validates an archive and reports the size of every member.
 */
export function inspectArchive(file: string): number[] {
  const archive = loadArchive(file);
  return Array.from(archive, data => data.length);
}
