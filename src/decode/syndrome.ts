/**
 * Syndrome computation for parity blocks
 *
 * Recomputes every sum from the stored cells without touching the block.
 * The corner is cross-checked twice: against the sum of the stored row
 * parities (contributes column index `dataCols`) and against the sum of the
 * stored column parities (contributes row index `dataRows`).
 */
import { codeToDigit, mod4, type Digit } from '../lib/bases.js';
import type { ParityBlock } from '../encode/parity-block.js';

export interface BlockAnalysis {
  dataRows: number;
  dataCols: number;
  /** Decoded digit of every cell, parity included */
  digits: Digit[][];
  /** Digit sum of each data row (not reduced) */
  rowSums: number[];
  /** Digit sum of each data column (not reduced) */
  colSums: number[];
  /** Stored row parity digits, one per data row */
  storedRowParity: Digit[];
  /** Stored column parity digits, one per data column */
  storedColParity: Digit[];
  storedCorner: Digit;
  /** Sum of the stored row parity digits (not reduced) */
  rowParityTotal: number;
  /** Sum of the stored column parity digits (not reduced) */
  colParityTotal: number;
  /** Mismatching row indices; `dataRows` stands for the corner */
  rowSyndrome: number[];
  /** Mismatching column indices; `dataCols` stands for the corner */
  colSyndrome: number[];
}

export type AnalysisResult =
  | { valid: true; analysis: BlockAnalysis }
  | { valid: false; reason: string };

/**
 * Validate a block and compute its syndrome
 */
export function analyzeBlock(block: ParityBlock): AnalysisResult {
  if (block.totalRows < 2 || block.totalCols < 2) {
    return {
      valid: false,
      reason: `Block must be at least 2x2, got ${block.totalRows}x${block.totalCols}`,
    };
  }

  // Decode every cell up front so the sums below only see valid digits
  const digits: Digit[][] = [];
  for (let i = 0; i < block.totalRows; i++) {
    const row: Digit[] = [];
    for (let j = 0; j < block.totalCols; j++) {
      const digit = codeToDigit(block.code(i, j));
      if (digit < 0) {
        return {
          valid: false,
          reason: `Invalid symbol "${block.get(i, j)}" at (${i}, ${j})`,
        };
      }
      row.push(mod4(digit));
    }
    digits.push(row);
  }

  const dataRows = block.dataRows;
  const dataCols = block.dataCols;
  const rowSums = new Array<number>(dataRows).fill(0);
  const colSums = new Array<number>(dataCols).fill(0);

  for (let i = 0; i < dataRows; i++) {
    for (let j = 0; j < dataCols; j++) {
      rowSums[i] += digits[i][j];
      colSums[j] += digits[i][j];
    }
  }

  const storedRowParity = digits.slice(0, dataRows).map(row => row[dataCols]);
  const storedColParity = digits[dataRows].slice(0, dataCols);
  const storedCorner = digits[dataRows][dataCols];
  const rowParityTotal = storedRowParity.reduce<number>((sum, d) => sum + d, 0);
  const colParityTotal = storedColParity.reduce<number>((sum, d) => sum + d, 0);

  const rowSyndrome: number[] = [];
  for (let i = 0; i < dataRows; i++) {
    if (storedRowParity[i] !== mod4(rowSums[i])) rowSyndrome.push(i);
  }

  const colSyndrome: number[] = [];
  for (let j = 0; j < dataCols; j++) {
    if (storedColParity[j] !== mod4(colSums[j])) colSyndrome.push(j);
  }

  // Corner vs. the parity column, reported as the extra column index
  if (storedCorner !== mod4(rowParityTotal)) colSyndrome.push(dataCols);
  // Corner vs. the parity row, reported as the extra row index
  if (storedCorner !== mod4(colParityTotal)) rowSyndrome.push(dataRows);

  return {
    valid: true,
    analysis: {
      dataRows,
      dataCols,
      digits,
      rowSums,
      colSums,
      storedRowParity,
      storedColParity,
      storedCorner,
      rowParityTotal,
      colParityTotal,
      rowSyndrome,
      colSyndrome,
    },
  };
}
