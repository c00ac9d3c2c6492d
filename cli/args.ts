/**
 * Option value parsing shared by commands
 */

import type { GenomicRegion } from '../src/records/hotspot-scan.js';

/**
 * Parse a non-negative integer option, naming the option on failure
 */
export function parseIntegerOption(value: string | undefined, name: string, fallback?: number): number {
  if (value === undefined) {
    if (fallback === undefined) {
      throw new Error(`Missing required option ${name}`);
    }
    return fallback;
  }
  if (!/^\d+$/.test(value.trim())) {
    throw new Error(`${name} must be a non-negative integer, got "${value}"`);
  }
  return parseInt(value, 10);
}

/**
 * Parse a comma-separated region list: "start-end" or "chrom:start-end"
 */
export function parseRegionList(text: string): GenomicRegion[] {
  return text
    .split(',')
    .map(token => token.trim())
    .filter(token => token.length > 0)
    .map(token => {
      const match = token.match(/^(?:([^:]+):)?(\d+)-(\d+)$/);
      if (!match) {
        throw new Error(`Invalid region "${token}" (expected start-end or chrom:start-end)`);
      }
      const start = parseInt(match[2], 10);
      const end = parseInt(match[3], 10);
      if (end <= start) {
        throw new Error(`Region "${token}" ends before it starts`);
      }
      return match[1] === undefined ? { start, end } : { chrom: match[1], start, end };
    });
}
