/**
 * CLI Mutate Command
 * Overwrites one cell to simulate a sequencing error
 */

import { normalizeBase } from '../src/lib/bases.js';
import { parseIntegerOption } from './args.js';
import { readBlockFile, writeBlocks } from './block-io.js';
import { createLogger, reportError } from './logging.js';

interface MutateOptions {
  row?: string;
  col?: string;
  base?: string;
  block?: string;
  output?: string;
  quiet?: boolean;
}

export function mutateCommand(filePath: string, options: MutateOptions): void {
  const log = createLogger(options.quiet);

  try {
    const row = parseIntegerOption(options.row, '--row');
    const col = parseIntegerOption(options.col, '--col');
    const blockIndex = parseIntegerOption(options.block, '--block', 0);
    // Any single character is allowed so invalid symbols can be injected too;
    // the block file refuses the few it cannot carry
    const symbol = options.base ?? '';
    if (symbol.length !== 1) {
      throw new Error(`--base must be a single character, got "${symbol}"`);
    }

    const { blocks, meta } = readBlockFile(filePath);
    const block = blocks[blockIndex];
    if (!block) {
      throw new Error(`Block ${blockIndex} not found (file has ${blocks.length})`);
    }

    const previous = block.get(row, col);
    const value = normalizeBase(symbol) ?? symbol;
    block.set(row, col, value);
    log(`Introducing mutation in block ${blockIndex} at (${row}, ${col}): ${previous} -> ${value}`);

    writeBlocks(options.output, blocks, meta);
    if (options.output) {
      log(`Saved to ${options.output}`);
    }
  } catch (err) {
    reportError(err);
  }
}
