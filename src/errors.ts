export type ArchiveErrorKind = 'CouldNotOpen' | 'Corrupt' | 'NoData';

export abstract class ArchiveError extends Error {
  abstract readonly kind: ArchiveErrorKind;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class CouldNotOpenError extends ArchiveError {
  readonly kind = 'CouldNotOpen';
  readonly path: string;

  constructor(path: string, options?: ErrorOptions) {
    super(`Could not open ${path}`, options);
    this.path = path;
  }
}

export type CorruptReason = 'too-small' | 'digest-mismatch' | 'malformed-chunk';

export interface CorruptDetails {
  /** 1-based index of the first unreadable member */
  chunkIndex?: number;
  /** Byte offset of that member within the member data */
  offset?: number;
  computedDigest?: string;
  storedDigest?: string;
}

export class CorruptArchiveError extends ArchiveError {
  readonly kind = 'Corrupt';
  readonly reason: CorruptReason;
  readonly details: CorruptDetails;

  constructor(reason: CorruptReason, message: string, details: CorruptDetails = {}) {
    super(message);
    this.reason = reason;
    this.details = details;
  }
}

export class NoDataError extends ArchiveError {
  readonly kind = 'NoData';

  constructor() {
    super('Archive holds no member data to write');
  }
}
