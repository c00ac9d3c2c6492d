/**
 * Sequence protection pipeline
 *
 * Flow: Sequence → Validate → Chunk into rows → Group rows → Parity blocks
 */
import { findInvalidBase } from '../lib/bases.js';
import { LAYOUT, LIMITS, type Base } from '../utils/constants.js';
import { buildParityBlock } from './build.js';
import type { ParityBlock } from './parity-block.js';

export interface ProtectOptions {
  rowLength?: number;
  rowsPerBlock?: number;
  padBase?: Base;
}

export interface ProtectResult {
  blocks: ParityBlock[];
  stats: {
    length: number;
    rowLength: number;
    rowsPerBlock: number;
    padding: number;
    blockCount: number;
  };
}

/**
 * Split a sequence into rows of `rowLength`, padding the last row
 */
export function chunkSequence(
  sequence: string,
  rowLength: number,
  padBase: Base = LAYOUT.PAD_BASE
): { rows: string[]; padding: number } {
  if (!Number.isInteger(rowLength) || rowLength < 1) {
    throw new RangeError(`Row length must be a positive integer, got ${rowLength}`);
  }

  const rows: string[] = [];
  for (let offset = 0; offset < sequence.length; offset += rowLength) {
    rows.push(sequence.slice(offset, offset + rowLength));
  }

  let padding = 0;
  const last = rows.length - 1;
  if (last >= 0 && rows[last].length < rowLength) {
    padding = rowLength - rows[last].length;
    rows[last] = rows[last] + padBase.repeat(padding);
  }

  return { rows, padding };
}

function checkLayoutValue(name: string, value: number, max: number): void {
  if (!Number.isInteger(value) || value < 1 || value > max) {
    throw new RangeError(`${name} must be an integer between 1 and ${max}, got ${value}`);
  }
}

/**
 * Protect a sequence as a list of parity blocks
 * The final block may hold fewer rows than `rowsPerBlock`
 */
export function protectSequence(sequence: string, options?: ProtectOptions): ProtectResult {
  const rowLength = options?.rowLength ?? LAYOUT.ROW_LENGTH;
  const rowsPerBlock = options?.rowsPerBlock ?? LAYOUT.ROWS_PER_BLOCK;
  const padBase = options?.padBase ?? LAYOUT.PAD_BASE;

  checkLayoutValue('Row length', rowLength, LIMITS.MAX_ROW_LENGTH);
  checkLayoutValue('Rows per block', rowsPerBlock, LIMITS.MAX_ROWS_PER_BLOCK);

  if (sequence.length === 0) {
    throw new Error('Sequence is empty');
  }
  if (sequence.length > LIMITS.MAX_SEQUENCE_LENGTH) {
    throw new Error(`Sequence exceeds maximum length (${LIMITS.MAX_SEQUENCE_LENGTH} bases)`);
  }

  const invalidAt = findInvalidBase(sequence);
  if (invalidAt >= 0) {
    throw new Error(`Invalid base "${sequence[invalidAt]}" at position ${invalidAt}`);
  }

  const { rows, padding } = chunkSequence(sequence, rowLength, padBase);

  const blocks: ParityBlock[] = [];
  for (let start = 0; start < rows.length; start += rowsPerBlock) {
    const result = buildParityBlock(rows.slice(start, start + rowsPerBlock));
    if (!result.success) {
      // Rows are validated and padded above
      throw new Error(`Block ${blocks.length} could not be built: ${result.message}`);
    }
    blocks.push(result.block);
  }

  return {
    blocks,
    stats: {
      length: sequence.length,
      rowLength,
      rowsPerBlock,
      padding,
      blockCount: blocks.length,
    },
  };
}
