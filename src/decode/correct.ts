/**
 * Single-symbol error detection and correction for parity blocks
 *
 * Flow: analyze (pure) → plan (pure) → apply (at most the target cell and the corner)
 *
 * Only a syndrome of exactly one row and one column is treated as correctable.
 * Everything else is rejected without touching the block. Any two errors are
 * detected, but three or more can reproduce a single-error syndrome; they are
 * corrected as whatever the syndrome points at.
 */
import { digitToBase, mod4, type Digit } from '../lib/bases.js';
import type { CellRegion, ParityBlock } from '../encode/parity-block.js';
import { analyzeBlock, type BlockAnalysis } from './syndrome.js';

export type UnrecoverableReason =
  | 'inconsistent_syndrome'    // Mismatch in one dimension only
  | 'multiple_errors'          // More than one row or column mismatches
  | 'conflicting_constraints'; // Row and column disagree on the data value

export type ParityOutcome =
  | { status: 'ok' }
  | {
      status: 'corrected';
      row: number;
      col: number;
      region: CellRegion;
      previous: string;
      replacement: string;
    }
  | { status: 'unrecoverable'; reason: UnrecoverableReason }
  | { status: 'invalid_input'; reason: string };

export type ParityStatus = ParityOutcome['status'];

export interface CellWrite {
  row: number;
  col: number;
  digit: Digit;
}

export type CorrectionPlan =
  | { kind: 'clean' }
  | { kind: 'reject'; reason: UnrecoverableReason }
  | { kind: 'fix'; row: number; col: number; region: CellRegion; digit: Digit; writes: CellWrite[] };

/**
 * Decide what to do from a syndrome
 */
export function planCorrection(analysis: BlockAnalysis): CorrectionPlan {
  const { rowSyndrome, colSyndrome, dataRows, dataCols } = analysis;

  if (rowSyndrome.length === 0 && colSyndrome.length === 0) {
    return { kind: 'clean' };
  }

  if (rowSyndrome.length === 0 || colSyndrome.length === 0) {
    return { kind: 'reject', reason: 'inconsistent_syndrome' };
  }

  if (rowSyndrome.length !== 1 || colSyndrome.length !== 1) {
    return { kind: 'reject', reason: 'multiple_errors' };
  }

  const row = rowSyndrome[0];
  const col = colSyndrome[0];

  // Data cell: both the row and the column must agree on the missing digit
  if (row < dataRows && col < dataCols) {
    const current = analysis.digits[row][col];
    const neededRow = mod4(analysis.storedRowParity[row] - (analysis.rowSums[row] - current));
    const neededCol = mod4(analysis.storedColParity[col] - (analysis.colSums[col] - current));
    if (neededRow !== neededCol) {
      return { kind: 'reject', reason: 'conflicting_constraints' };
    }
    return {
      kind: 'fix',
      row,
      col,
      region: 'data',
      digit: neededRow,
      writes: [{ row, col, digit: neededRow }],
    };
  }

  // Row parity cell: rewrite it and re-derive the corner from the parity column
  if (row < dataRows && col === dataCols) {
    const expected = mod4(analysis.rowSums[row]);
    const corner = mod4(analysis.rowParityTotal - analysis.storedRowParity[row] + expected);
    return {
      kind: 'fix',
      row,
      col,
      region: 'row_parity',
      digit: expected,
      writes: [
        { row, col, digit: expected },
        { row: dataRows, col: dataCols, digit: corner },
      ],
    };
  }

  // Column parity cell: symmetric, corner from the parity row
  if (row === dataRows && col < dataCols) {
    const expected = mod4(analysis.colSums[col]);
    const corner = mod4(analysis.colParityTotal - analysis.storedColParity[col] + expected);
    return {
      kind: 'fix',
      row,
      col,
      region: 'column_parity',
      digit: expected,
      writes: [
        { row, col, digit: expected },
        { row: dataRows, col: dataCols, digit: corner },
      ],
    };
  }

  // Corner: both parity vectors are consistent, recompute from the parity column
  const corner = mod4(analysis.rowParityTotal);
  return {
    kind: 'fix',
    row,
    col,
    region: 'corner',
    digit: corner,
    writes: [{ row, col, digit: corner }],
  };
}

function toOutcome(block: ParityBlock, plan: CorrectionPlan): ParityOutcome {
  switch (plan.kind) {
    case 'clean':
      return { status: 'ok' };
    case 'reject':
      return { status: 'unrecoverable', reason: plan.reason };
    case 'fix':
      return {
        status: 'corrected',
        row: plan.row,
        col: plan.col,
        region: plan.region,
        previous: block.get(plan.row, plan.col),
        replacement: digitToBase(plan.digit),
      };
  }
}

/**
 * Report what detectAndCorrect would do, without modifying the block
 */
export function checkBlock(block: ParityBlock): ParityOutcome {
  const result = analyzeBlock(block);
  if (!result.valid) {
    return { status: 'invalid_input', reason: result.reason };
  }
  return toOutcome(block, planCorrection(result.analysis));
}

/**
 * Detect and, for a single corrupted symbol, correct a block in place
 *
 * The caller must hold the only reference to `block` for the duration of the
 * call. Rejected and invalid blocks are left byte-for-byte unchanged.
 */
export function detectAndCorrect(block: ParityBlock): ParityOutcome {
  const result = analyzeBlock(block);
  if (!result.valid) {
    console.warn('[Parity] Invalid block:', result.reason);
    return { status: 'invalid_input', reason: result.reason };
  }

  const plan = planCorrection(result.analysis);
  const outcome = toOutcome(block, plan);

  if (plan.kind === 'fix') {
    for (const write of plan.writes) {
      block.set(write.row, write.col, digitToBase(write.digit));
    }
    console.log(`[Parity] Corrected ${plan.region} cell (${plan.row}, ${plan.col})`);
  } else if (plan.kind === 'reject') {
    console.warn('[Parity] Unrecoverable block:', plan.reason);
  }

  return outcome;
}
