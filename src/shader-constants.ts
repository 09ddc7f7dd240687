/**
 * Constants for the shader archives (effects and vertex shaders) shipped with
 * the retail and Custom Edition clients.
 */

/**
 * TEA key words used to obscure every shader archive on disk.
 */
export const SHADER_CRYPTO_KEY = [0x3FFFFFDD, 0x7FC3, 0xE5, 0x3FFFEF] as const;

/** Width of the little-endian length field in front of every member. */
export const MEMBER_SIZE_FIELD = 4;

/** Lowercase hex MD5 digest plus the NUL the game checks for. */
export const TRAILER_LENGTH = 33;

/**
 * The game refuses an archive without at least one byte ahead of the trailer,
 * so anything smaller than this is rejected as corrupt.
 */
export const MIN_ARCHIVE_LENGTH = TRAILER_LENGTH + 1;

export const CLIENT_VERSIONS = ['pc', 'ce'] as const;
export type ClientVersion = typeof CLIENT_VERSIONS[number];

export const ARCHIVE_TYPES = ['fx', 'vsh'] as const;
export type ArchiveType = typeof ARCHIVE_TYPES[number];

/**
 * Number of members the game expects in each archive.
 * Vertex shaders are shared between both clients.
 */
export const MEMBER_COUNTS = {
  fx: {
    /** Retail effects */
    pc: 122,
    /** Custom Edition effects */
    ce: 120,
  },
  vsh: {
    pc: 64,
    ce: 64,
  },
} as const satisfies Record<ArchiveType, Record<ClientVersion, number>>;

export const MEMBER_EXTENSIONS = {
  fx: 'fx',
  vsh: 'vsh',
} as const satisfies Record<ArchiveType, string>;

export const DEFAULT_PREFIXES = {
  fx: 'fx/',
  vsh: 'vsh/',
} as const satisfies Record<ArchiveType, string>;
