/**
 * Sequence recovery pipeline
 *
 * Flow: Blocks → Correct (batch) → Join data rows → Strip padding
 */
import type { ParityBlock } from '../encode/parity-block.js';
import { correctBatch, type BatchReport } from './batch.js';

export interface RecoverResult {
  success: boolean;
  sequence?: string;
  report: BatchReport;
  error?: string;
}

/**
 * Correct every block in place and reassemble the original sequence
 * @param length Original sequence length (before padding)
 */
export function recoverSequence(blocks: readonly ParityBlock[], length: number): RecoverResult {
  const report = correctBatch(blocks);

  if (report.failed.length > 0) {
    return {
      success: false,
      report,
      error: `Unrecoverable blocks: ${report.failed.join(', ')}`,
    };
  }

  const joined = blocks.map(block => block.dataSequences().join('')).join('');
  if (joined.length < length) {
    return {
      success: false,
      report,
      error: `Blocks hold ${joined.length} bases, expected at least ${length}`,
    };
  }

  return { success: true, sequence: joined.slice(0, length), report };
}
