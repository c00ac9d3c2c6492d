// Nucleotide alphabet in digit order: A=0, T=1, G=2, C=3
export const ALPHABET = ['A', 'T', 'G', 'C'] as const;

export type Base = (typeof ALPHABET)[number];

// All parity arithmetic is modulo the alphabet size
export const PARITY = {
  MODULUS: ALPHABET.length,
} as const;

// Default layout used when protecting a long sequence
export const LAYOUT = {
  ROW_LENGTH: 9,            // Matches the 3x9 reference block
  ROWS_PER_BLOCK: 3,
  PAD_BASE: 'A',            // Fills the tail of the last row
} as const;

// Limits
export const LIMITS = {
  MAX_SEQUENCE_LENGTH: 10 * 1024 * 1024, // 10M bases per protect call
  MAX_ROW_LENGTH: 4096,
  MAX_ROWS_PER_BLOCK: 4096,
} as const;

// Metadata envelope (XChaCha20 stream cipher)
export const CIPHER = {
  KEY_SIZE: 32,
  NONCE_SIZE: 24,
  ENVELOPE_VERSION: 0x01,
  FLAG_DEFLATE: 0x01,
  HEADER_SIZE: 2,           // version + flags
} as const;

// Block file format
export const BLOCK_FILE = {
  COMMENT_PREFIX: '#',
  META_LENGTH: 'length',
  META_ROW_LENGTH: 'row-length',
  META_ROWS_PER_BLOCK: 'rows-per-block',
} as const;

// Byte <-> nucleotide packing for sealed tables: 2 bits per base, MSB first
export const BYTE_BASES = ['A', 'C', 'G', 'T'] as const;

// Sealed record table (tab-separated)
export const SEALED_TABLE = {
  COLUMNS: ['record_id', 'nonce_dna', 'ciphertext_dna'],
  RECORD_PREFIX: 'hotspot_',
} as const;

// SNP density scanning
export const HOTSPOTS = {
  WINDOW_SIZE: 10000,       // Fixed, non-overlapping windows
  THRESHOLD: 15,
  SLIDING_WINDOW_SIZE: 1000,
  SLIDING_MIN_SNPS: 10,
  SLIDING_STEP_DIVISOR: 10, // Step is a tenth of the window (90% overlap)
} as const;
