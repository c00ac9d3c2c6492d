/**
 * CLI Build Command
 */

import { buildParityBlock } from '../src/encode/build.js';
import { readSequenceInput, writeBlocks } from './block-io.js';
import { createLogger, reportError } from './logging.js';

interface BuildOptions {
  file?: string;
  output?: string;
  quiet?: boolean;
  json?: boolean;
}

interface BuildSummary {
  success: boolean;
  rows: number;
  cols: number;
  block: string[];
  output?: string;
}

export function buildCommand(sequences: string[], options: BuildOptions): void {
  const log = createLogger(options.quiet || options.json);

  try {
    const input = readSequenceInput(sequences, options.file);
    log(`Building parity block from ${input.length} sequence(s)...`);

    const result = buildParityBlock(input);
    if (!result.success) {
      throw new Error(result.message);
    }

    const { block } = result;

    if (options.json) {
      if (options.output) {
        writeBlocks(options.output, [block]);
      }
      const summary: BuildSummary = {
        success: true,
        rows: block.totalRows,
        cols: block.totalCols,
        block: block.rows(),
        output: options.output,
      };
      console.log(JSON.stringify(summary, null, 2));
      return;
    }

    writeBlocks(options.output, [block]);
    log(`Block: ${block.totalRows}x${block.totalCols} (${block.dataRows}x${block.dataCols} data)`);
    if (options.output) {
      log(`Saved to ${options.output}`);
    }
  } catch (err) {
    reportError(err, options.json);
  }
}
