/**
 * CLI Check Command
 * Detects and corrects single-symbol errors in every block of a file
 */

import { checkBlock, detectAndCorrect, type ParityOutcome } from '../src/decode/correct.js';
import { readBlockFile, writeBlocks } from './block-io.js';
import { createLogger, reportError, routeLibraryLogs } from './logging.js';

interface CheckOptions {
  output?: string;
  dryRun?: boolean;
  quiet?: boolean;
  json?: boolean;
}

interface CheckSummary {
  success: boolean;
  blocks: Array<{ index: number } & ParityOutcome>;
  output?: string;
}

/**
 * One-line description of an outcome
 */
export function describeOutcome(outcome: ParityOutcome): string {
  switch (outcome.status) {
    case 'ok':
      return 'no errors detected';
    case 'corrected':
      return `corrected ${outcome.region.replace('_', ' ')} cell (${outcome.row}, ${outcome.col}): ` +
        `${outcome.previous} -> ${outcome.replacement}`;
    case 'unrecoverable':
      return `unrecoverable (${outcome.reason.replace(/_/g, ' ')})`;
    case 'invalid_input':
      return `invalid block: ${outcome.reason}`;
  }
}

export function checkCommand(filePath: string, options: CheckOptions): void {
  const silent = options.quiet || options.json;
  const log = createLogger(silent);
  const restoreLogs = routeLibraryLogs(silent);

  try {
    log(`Reading ${filePath}...`);
    const { blocks, meta } = readBlockFile(filePath);

    const outcomes = blocks.map(block => options.dryRun ? checkBlock(block) : detectAndCorrect(block));
    const failed = outcomes.filter(o => o.status === 'unrecoverable' || o.status === 'invalid_input').length;

    outcomes.forEach((outcome, index) => {
      log(`Block ${index}: ${describeOutcome(outcome)}`);
    });

    const writeResult = !options.dryRun && (options.output !== undefined || !options.json);
    if (writeResult) {
      writeBlocks(options.output, blocks, meta);
      if (options.output) {
        log(`Saved to ${options.output}`);
      }
    }

    if (options.json) {
      const summary: CheckSummary = {
        success: failed === 0,
        blocks: outcomes.map((outcome, index) => ({ index, ...outcome })),
        output: options.output,
      };
      console.log(JSON.stringify(summary, null, 2));
    }

    if (failed > 0) {
      log(`${failed} of ${blocks.length} block(s) could not be corrected`);
      process.exitCode = 1;
    }
  } catch (err) {
    reportError(err, options.json);
  } finally {
    restoreLogs();
  }
}
