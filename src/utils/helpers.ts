import { BYTE_BASES } from './constants.js';

/**
 * Convert a UTF-8 string to Uint8Array
 */
export function stringToBytes(str: string): Uint8Array {
  return new TextEncoder().encode(str);
}

/**
 * Convert a Uint8Array to UTF-8 string
 */
export function bytesToString(bytes: Uint8Array): string {
  return new TextDecoder().decode(bytes);
}

/**
 * Convert bytes to hex string
 */
export function bytesToHex(bytes: Uint8Array): string {
  return Array.from(bytes)
    .map(b => b.toString(16).padStart(2, '0'))
    .join('');
}

/**
 * Convert hex string to bytes
 * Whitespace is ignored; throws on odd length or non-hex characters
 */
export function hexToBytes(hex: string): Uint8Array {
  const clean = hex.replace(/\s+/g, '');
  if (clean.length % 2 !== 0) {
    throw new Error(`Hex string has odd length (${clean.length})`);
  }
  if (!/^[0-9a-fA-F]*$/.test(clean)) {
    throw new Error('Hex string contains non-hex characters');
  }

  const bytes = new Uint8Array(clean.length / 2);
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = parseInt(clean.slice(i * 2, i * 2 + 2), 16);
  }
  return bytes;
}

/**
 * Pack bytes into nucleotides, four bases per byte (A=00 C=01 G=10 T=11)
 */
export function bytesToDna(bytes: Uint8Array): string {
  let dna = '';
  for (const byte of bytes) {
    dna += BYTE_BASES[(byte >> 6) & 0x03] + BYTE_BASES[(byte >> 4) & 0x03] +
      BYTE_BASES[(byte >> 2) & 0x03] + BYTE_BASES[byte & 0x03];
  }
  return dna;
}

/**
 * Inverse of bytesToDna; lowercase is accepted
 */
export function dnaToBytes(dna: string): Uint8Array {
  if (dna.length % 4 !== 0) {
    throw new Error(`Nucleotide string length ${dna.length} is not a multiple of 4`);
  }

  const bytes = new Uint8Array(dna.length / 4);
  for (let i = 0; i < dna.length; i++) {
    const symbol = dna[i].toUpperCase();
    const value = BYTE_BASES.findIndex(base => base === symbol);
    if (value < 0) {
      throw new Error(`Invalid nucleotide "${dna[i]}" at position ${i}`);
    }
    bytes[i >> 2] = (bytes[i >> 2] << 2) | value;
  }
  return bytes;
}

/**
 * Read bit `index` of a byte stream (MSB first within each byte)
 */
export function getBit(bytes: Uint8Array, index: number): number {
  const byteIndex = Math.floor(index / 8);
  const bitOffset = 7 - (index % 8);
  return (bytes[byteIndex] >> bitOffset) & 1;
}

/**
 * Set bit `index` of a byte stream (MSB first within each byte)
 */
export function setBit(bytes: Uint8Array, index: number, bit: number): void {
  const byteIndex = Math.floor(index / 8);
  const bitOffset = 7 - (index % 8);
  if (bit & 1) {
    bytes[byteIndex] |= 1 << bitOffset;
  } else {
    bytes[byteIndex] &= ~(1 << bitOffset) & 0xFF;
  }
}

/**
 * Concatenate multiple Uint8Arrays
 */
export function concatBytes(...arrays: Uint8Array[]): Uint8Array {
  const totalLength = arrays.reduce((sum, arr) => sum + arr.length, 0);
  const result = new Uint8Array(totalLength);
  let offset = 0;
  for (const arr of arrays) {
    result.set(arr, offset);
    offset += arr.length;
  }
  return result;
}

/**
 * Parse a comma-separated list of non-negative integers ("1, 5,9")
 */
export function parseIndexList(text: string): number[] {
  const values = text
    .split(',')
    .map(token => token.trim())
    .filter(token => token.length > 0)
    .map(token => {
      if (!/^\d+$/.test(token)) {
        throw new Error(`Not a non-negative integer: "${token}"`);
      }
      return parseInt(token, 10);
    });

  if (values.length === 0) {
    throw new Error('Empty index list');
  }
  return values;
}
