/**
 * Parity block construction
 *
 * Flow: validate sequences → copy data (uppercase) → row parity → column parity → corner
 */
import { codeToDigit, digitToBase, mod4 } from '../lib/bases.js';
import { ParityBlock } from './parity-block.js';

export type BuildError = 'empty_input' | 'row_length_mismatch' | 'invalid_symbol';

export type BuildResult =
  | { success: true; block: ParityBlock }
  | { success: false; error: BuildError; message: string; row?: number; col?: number };

/**
 * Check a set of sequences without building anything
 * @returns null when the sequences can form a block
 */
export function validateSequences(
  sequences: readonly string[]
): Extract<BuildResult, { success: false }> | null {
  if (sequences.length === 0) {
    return { success: false, error: 'empty_input', message: 'No sequences supplied' };
  }

  const emptyRow = sequences.findIndex(seq => seq.length === 0);
  if (emptyRow >= 0) {
    return {
      success: false,
      error: 'empty_input',
      message: `Sequence ${emptyRow} is empty`,
      row: emptyRow,
    };
  }

  const rowLength = sequences[0].length;
  const mismatch = sequences.findIndex(seq => seq.length !== rowLength);
  if (mismatch >= 0) {
    return {
      success: false,
      error: 'row_length_mismatch',
      message: `Sequence ${mismatch} has length ${sequences[mismatch].length}, expected ${rowLength}`,
      row: mismatch,
    };
  }

  for (let i = 0; i < sequences.length; i++) {
    for (let j = 0; j < rowLength; j++) {
      if (codeToDigit(sequences[i].charCodeAt(j)) < 0) {
        return {
          success: false,
          error: 'invalid_symbol',
          message: `Invalid base "${sequences[i][j]}" at sequence ${i}, position ${j}`,
          row: i,
          col: j,
        };
      }
    }
  }

  return null;
}

/**
 * Build a parity-augmented block from equal-length sequences
 *
 * The corner is taken from the running total of every data digit, so it
 * agrees with both the parity row and the parity column by construction.
 */
export function buildParityBlock(sequences: readonly string[]): BuildResult {
  const failure = validateSequences(sequences);
  if (failure) {
    return failure;
  }

  const dataRows = sequences.length;
  const dataCols = sequences[0].length;
  const block = new ParityBlock(dataRows + 1, dataCols + 1);
  const columnSums = new Array<number>(dataCols).fill(0);
  let totalSum = 0;

  // Data and row parity
  for (let i = 0; i < dataRows; i++) {
    let rowSum = 0;
    for (let j = 0; j < dataCols; j++) {
      const digit = codeToDigit(sequences[i].charCodeAt(j));
      block.set(i, j, digitToBase(digit));
      rowSum += digit;
      columnSums[j] += digit;
    }
    totalSum += rowSum;
    block.set(i, dataCols, digitToBase(mod4(rowSum)));
  }

  // Column parity
  for (let j = 0; j < dataCols; j++) {
    block.set(dataRows, j, digitToBase(mod4(columnSums[j])));
  }

  block.set(dataRows, dataCols, digitToBase(mod4(totalSum)));

  return { success: true, block };
}
