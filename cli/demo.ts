/**
 * CLI Demo Command
 * Builds the 3x9 reference block and walks through one data, one row parity
 * and one column parity correction.
 */

import { buildParityBlock } from '../src/encode/build.js';
import { detectAndCorrect } from '../src/decode/correct.js';
import type { ParityBlock } from '../src/encode/parity-block.js';
import { formatBlock } from '../src/format/block-text.js';
import { describeOutcome } from './check.js';
import { reportError, routeLibraryLogs } from './logging.js';

export const DEMO_ROWS = ['AACGGATGA', 'TTAGGCATA', 'CGTATTCGG'] as const;

function printBlock(title: string, block: ParityBlock): void {
  console.log(title);
  process.stdout.write(formatBlock(block));
}

function mutateAndCheck(block: ParityBlock, row: number, col: number, base: string, label: string): void {
  console.log(`Introducing mutation at (${row}, ${col}): ${block.get(row, col)} -> ${base}`);
  block.set(row, col, base);
  printBlock(`Block after ${label} mutation:`, block);

  const outcome = detectAndCorrect(block);
  console.log(`Parity check: ${describeOutcome(outcome)}`);
  printBlock('Block after correction:', block);
}

export function demoCommand(): void {
  const restoreLogs = routeLibraryLogs(true);

  try {
    const result = buildParityBlock(DEMO_ROWS);
    if (!result.success) {
      throw new Error(`Failed to construct parity block: ${result.message}`);
    }
    const { block } = result;
    const parityRow = block.dataRows;
    const parityCol = block.dataCols;

    printBlock('Initial block with parity nucleotides:', block);
    console.log('');

    mutateAndCheck(block, 0, 0, 'T', 'data');
    console.log('');
    mutateAndCheck(block, 1, parityCol, 'A', 'row parity');
    console.log('');
    mutateAndCheck(block, parityRow, 2, 'G', 'column parity');
  } catch (err) {
    reportError(err);
  } finally {
    restoreLogs();
  }
}
