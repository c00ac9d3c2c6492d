/**
 * Metadata sealing with the XChaCha20 stream cipher
 *
 * Envelope: version (1) + flags (1) + nonce (24) + ciphertext
 * Flags bit 0: plaintext was DEFLATE-compressed before encryption.
 *
 * Records can also be sealed as nucleotide strings (nonce and ciphertext
 * packed four bases per byte), uncompressed and without a header.
 *
 * The stream cipher gives confidentiality only; a corrupted envelope opens
 * to garbage rather than failing.
 */
import { xchacha20 } from '@noble/ciphers/chacha.js';
import { getRandomValues } from 'crypto';
import pako from 'pako';
import { CIPHER } from '../utils/constants.js';
import { bytesToDna, concatBytes, dnaToBytes, hexToBytes } from '../utils/helpers.js';

export interface DnaSealedRecord {
  nonce: string;
  ciphertext: string;
}

/**
 * Generate cryptographically secure random bytes
 */
function getRandomBytes(size: number): Uint8Array {
  return getRandomValues(new Uint8Array(size));
}

/**
 * Parse a 32-byte key from hex text (whitespace allowed, e.g. a key file)
 */
export function parseHexKey(text: string): Uint8Array {
  const key = hexToBytes(text);
  if (key.length !== CIPHER.KEY_SIZE) {
    throw new Error(`Key must be ${CIPHER.KEY_SIZE} bytes (${CIPHER.KEY_SIZE * 2} hex characters), got ${key.length}`);
  }
  return key;
}

function checkKey(key: Uint8Array): void {
  if (key.length !== CIPHER.KEY_SIZE) {
    throw new Error(`Key must be ${CIPHER.KEY_SIZE} bytes, got ${key.length}`);
  }
}

function checkNonce(nonce: Uint8Array): void {
  if (nonce.length !== CIPHER.NONCE_SIZE) {
    throw new Error(`Nonce must be ${CIPHER.NONCE_SIZE} bytes, got ${nonce.length}`);
  }
}

/**
 * Compress only when it actually saves space
 */
function tryCompress(data: Uint8Array): { data: Uint8Array; compressed: boolean } {
  const compressed = pako.deflate(data, { level: 9 });
  if (compressed.length < data.length) {
    return { data: compressed, compressed: true };
  }
  return { data, compressed: false };
}

/**
 * Encrypt metadata
 * @param nonce Fixed nonce for reproducible output; random when omitted
 */
export function sealMetadata(plaintext: Uint8Array, key: Uint8Array, nonce?: Uint8Array): Uint8Array {
  checkKey(key);
  const iv = nonce ?? getRandomBytes(CIPHER.NONCE_SIZE);
  checkNonce(iv);

  const { data, compressed } = tryCompress(plaintext);
  const ciphertext = xchacha20(key, iv, data);
  const header = new Uint8Array([CIPHER.ENVELOPE_VERSION, compressed ? CIPHER.FLAG_DEFLATE : 0]);

  return concatBytes(header, iv, ciphertext);
}

/**
 * Split an envelope into its parts without decrypting
 */
export function readEnvelope(sealed: Uint8Array): { compressed: boolean; nonce: Uint8Array; ciphertext: Uint8Array } {
  const minSize = CIPHER.HEADER_SIZE + CIPHER.NONCE_SIZE;
  if (sealed.length < minSize) {
    throw new Error(`Envelope too short: ${sealed.length} bytes, need at least ${minSize}`);
  }
  if (sealed[0] !== CIPHER.ENVELOPE_VERSION) {
    throw new Error(`Unknown envelope version: ${sealed[0]}`);
  }

  return {
    compressed: (sealed[1] & CIPHER.FLAG_DEFLATE) !== 0,
    nonce: sealed.slice(CIPHER.HEADER_SIZE, minSize),
    ciphertext: sealed.slice(minSize),
  };
}

/**
 * Decrypt metadata sealed by sealMetadata
 */
export function openMetadata(sealed: Uint8Array, key: Uint8Array): Uint8Array {
  checkKey(key);
  const { compressed, nonce, ciphertext } = readEnvelope(sealed);
  const data = xchacha20(key, nonce, ciphertext);

  if (!compressed) {
    return data;
  }

  try {
    return pako.inflate(data);
  } catch (err) {
    throw new Error('Decompression failed - wrong key or corrupted envelope: ' +
      (err instanceof Error ? err.message : String(err)));
  }
}

/**
 * Encrypt a record into nucleotide strings
 * The ciphertext string holds four bases per plaintext byte.
 */
export function sealToDna(plaintext: Uint8Array, key: Uint8Array, nonce?: Uint8Array): DnaSealedRecord {
  checkKey(key);
  const iv = nonce ?? getRandomBytes(CIPHER.NONCE_SIZE);
  checkNonce(iv);

  return {
    nonce: bytesToDna(iv),
    ciphertext: bytesToDna(xchacha20(key, iv, plaintext)),
  };
}

/**
 * Decrypt a record sealed by sealToDna
 */
export function openFromDna(record: DnaSealedRecord, key: Uint8Array): Uint8Array {
  checkKey(key);
  const nonce = dnaToBytes(record.nonce);
  checkNonce(nonce);
  return xchacha20(key, nonce, dnaToBytes(record.ciphertext));
}
