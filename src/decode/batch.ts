/**
 * Batch correction over independent blocks
 *
 * Blocks share no state, so each one is corrected on its own; the report
 * keeps outcomes in input order.
 */
import type { ParityBlock } from '../encode/parity-block.js';
import { detectAndCorrect, type ParityOutcome, type ParityStatus } from './correct.js';

export interface BatchReport {
  outcomes: ParityOutcome[];
  counts: Record<ParityStatus, number>;
  /** Indices of blocks that were unrecoverable or invalid */
  failed: number[];
}

export function correctBatch(blocks: readonly ParityBlock[]): BatchReport {
  const counts: Record<ParityStatus, number> = {
    ok: 0,
    corrected: 0,
    unrecoverable: 0,
    invalid_input: 0,
  };
  const failed: number[] = [];

  const outcomes = blocks.map((block, index) => {
    const outcome = detectAndCorrect(block);
    counts[outcome.status]++;
    if (outcome.status === 'unrecoverable' || outcome.status === 'invalid_input') {
      failed.push(index);
    }
    return outcome;
  });

  if (counts.corrected > 0 || failed.length > 0) {
    console.log(
      `[Batch] ${blocks.length} blocks: ${counts.ok} ok, ${counts.corrected} corrected,`,
      `${counts.unrecoverable} unrecoverable, ${counts.invalid_input} invalid`
    );
  }

  return { outcomes, counts, failed };
}
