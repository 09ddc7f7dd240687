import * as fs from 'fs';
import { ChunkEnumerator, validateChunks } from './chunk-enumerator.js';
import { SHADER_TEA, decryptBuffer, encryptBuffer } from './crypt.js';
import type { BlockScheme } from './crypt.js';
import { DIGEST_LENGTH, md5Hex, trailerFor } from './digest.js';
import type { DigestProvider } from './digest.js';
import { CorruptArchiveError, CouldNotOpenError, NoDataError } from './errors.js';
import { readFileBytes } from './io.js';
import { Logger } from './logger.js';
import { MEMBER_SIZE_FIELD, MIN_ARCHIVE_LENGTH, TRAILER_LENGTH } from './shader-constants.js';

/*
 SHADER ARCHIVES

 The whole file is encrypted with TEA (see crypt.ts). Once decrypted:

   member*  := [uint32 LE size][size bytes of data]
   trailer  := 32 lowercase hex characters of the MD5 of all members, then 0x00

 There is no header and no name table; the game knows which member is which by
 its position.
 */

export type VisitResult<T> =
  | { kind: 'continue' }
  | { kind: 'stop'; value: T };

export type ForEachOutcome<T> =
  | { kind: 'exhausted'; visited: number }
  | { kind: 'stopped'; value: T; index: number };

export const CONTINUE: VisitResult<never> = { kind: 'continue' };

export function stop<T>(value: T): VisitResult<T> {
  return { kind: 'stop', value };
}

export interface ShaderArchiveOptions {
  scheme?: BlockScheme;
  digest?: DigestProvider;
}

const EMPTY = Buffer.alloc(0);

class ShaderArchive implements Iterable<Buffer> {
  private readonly scheme: BlockScheme;
  private readonly digest: DigestProvider;
  /** Decrypted archive, trailer included */
  private fileBuffer: Buffer = EMPTY;
  /** Member data, i.e. fileBuffer without the trailer */
  private data: Buffer = EMPTY;

  constructor(options: ShaderArchiveOptions = {}) {
    this.scheme = options.scheme ?? SHADER_TEA;
    this.digest = options.digest ?? md5Hex;
  }

  get isLoaded(): boolean {
    return this.fileBuffer.length > 0;
  }

  /** Size of the held archive including the trailer, 0 when empty. */
  get byteLength(): number {
    return this.fileBuffer.length;
  }

  /** View of the member data. Invalidated by the next load or flush. */
  get chunkRegion(): Buffer {
    return this.data;
  }

  get memberCount(): number {
    const result = validateChunks(this.data);
    return result.ok ? result.count : 0;
  }

  /**
   * Loads an encrypted archive from a file.
   * On failure the previously held archive, if any, is kept.
   */
  readFromFile(filePath: string): void {
    const bytes = readFileBytes(filePath);
    if (bytes === undefined) {
      throw new CouldNotOpenError(filePath);
    }
    this.loadBytes(bytes, false);
  }

  /**
   * Loads an encrypted archive from memory. `bytes` is copied unless `copy` is
   * false, in which case the archive takes the buffer over and decrypts it in
   * place.
   * On failure the previously held archive, if any, is kept.
   */
  loadBytes(bytes: Buffer, copy = true): void {
    if (bytes.length < MIN_ARCHIVE_LENGTH) {
      throw new CorruptArchiveError(
        'too-small',
        `Archive is ${bytes.length} bytes, at least ${MIN_ARCHIVE_LENGTH} are required`,
      );
    }

    const buffer = copy ? Buffer.from(bytes) : bytes;
    const archiveData = buffer.subarray(0, buffer.length - TRAILER_LENGTH);
    const storedTrailer = buffer.subarray(buffer.length - TRAILER_LENGTH);

    decryptBuffer(this.scheme, buffer);

    const expectedTrailer = trailerFor(archiveData, this.digest);
    if (!expectedTrailer.equals(storedTrailer)) {
      const computedDigest = expectedTrailer.toString('latin1', 0, DIGEST_LENGTH);
      const storedDigest = storedTrailer.toString('latin1', 0, DIGEST_LENGTH);
      Logger.log('md5 did not match');
      Logger.log(`\tcomputed ${computedDigest}`);
      Logger.log(`\tneeded ${storedDigest}`);
      throw new CorruptArchiveError('digest-mismatch', 'Archive digest does not match its contents', {
        computedDigest,
        storedDigest,
      });
    }

    const validation = validateChunks(archiveData);
    if (!validation.ok) {
      Logger.log(`error at archive member ${validation.chunkIndex} (offset ${validation.offset})`);
      throw new CorruptArchiveError(
        'malformed-chunk',
        `Archive member ${validation.chunkIndex} at offset ${validation.offset} is malformed`,
        { chunkIndex: validation.chunkIndex, offset: validation.offset },
      );
    }

    Logger.log(`Loaded archive: ${buffer.length} bytes, ${validation.count} members`);
    this.fileBuffer = buffer;
    this.data = archiveData;
  }

  /**
   * Replaces the held archive with one built from `members`, in order.
   * Nothing is encrypted until the archive is flushed.
   */
  assemble(members: readonly Uint8Array[]): void {
    const totalSize = members.reduce((size, member) => size + member.length, 0)
      + MEMBER_SIZE_FIELD * members.length
      + TRAILER_LENGTH;

    const buffer = Buffer.alloc(totalSize);
    let cursor = 0;
    for (const member of members) {
      cursor = buffer.writeUInt32LE(member.length, cursor);
      buffer.set(member, cursor);
      cursor += member.length;
    }

    const archiveData = buffer.subarray(0, cursor);
    trailerFor(archiveData, this.digest).copy(buffer, cursor);

    this.fileBuffer = buffer;
    this.data = archiveData;
  }

  /**
   * Encrypts the held archive and hands it over, leaving this archive empty.
   */
  flushToBuffer(): Buffer {
    this.ensureWritable();

    const buffer = this.fileBuffer;
    encryptBuffer(this.scheme, buffer);
    this.reset();
    return buffer;
  }

  /**
   * Encrypts the held archive into `filePath`, leaving this archive empty.
   * Nothing changes if the file cannot be opened.
   */
  flushToFile(filePath: string): void {
    this.ensureWritable();

    let fd: number;
    try {
      fd = fs.openSync(filePath, 'w');
    } catch (err) {
      throw new CouldNotOpenError(filePath, { cause: err });
    }

    const buffer = this.fileBuffer;
    encryptBuffer(this.scheme, buffer);
    try {
      fs.writeFileSync(fd, buffer);
    } catch (err) {
      decryptBuffer(this.scheme, buffer);
      throw err;
    } finally {
      fs.closeSync(fd);
    }

    this.reset();
  }

  /** A fresh cursor over the members. */
  enumerate(): ChunkEnumerator {
    return new ChunkEnumerator(this.data);
  }

  *members(): Generator<Buffer> {
    yield* this.enumerate();
  }

  [Symbol.iterator](): Iterator<Buffer> {
    return this.members();
  }

  forEach(visit: (data: Buffer, index: number) => void): void {
    const enumerator = this.enumerate();
    for (; !enumerator.finished(); enumerator.advance()) {
      visit(enumerator.current(), enumerator.index);
    }
  }

  /**
   * Visits members in order until `visit` asks to stop.
   */
  forEachUntil<T>(visit: (data: Buffer, index: number) => VisitResult<T>): ForEachOutcome<T> {
    const enumerator = this.enumerate();
    for (; !enumerator.finished(); enumerator.advance()) {
      const result = visit(enumerator.current(), enumerator.index);
      if (result.kind === 'stop') {
        return { kind: 'stopped', value: result.value, index: enumerator.index };
      }
    }
    return { kind: 'exhausted', visited: enumerator.index };
  }

  private ensureWritable(): void {
    if (this.data.length < MEMBER_SIZE_FIELD) {
      throw new NoDataError();
    }
  }

  private reset(): void {
    this.fileBuffer = EMPTY;
    this.data = EMPTY;
  }
}

export { ShaderArchive };
