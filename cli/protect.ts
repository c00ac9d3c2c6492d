/**
 * CLI Protect and Recover Commands
 */

import { protectSequence } from '../src/encode/index.js';
import { recoverSequence } from '../src/decode/index.js';
import { BLOCK_FILE, LAYOUT } from '../src/utils/constants.js';
import { parseIntegerOption } from './args.js';
import { readBlockFile, readSequenceInput, writeBlocks, writeText } from './block-io.js';
import { createLogger, reportError, routeLibraryLogs } from './logging.js';

interface ProtectOptions {
  file?: string;
  width?: string;
  rows?: string;
  output?: string;
  quiet?: boolean;
  json?: boolean;
}

interface RecoverOptions {
  output?: string;
  quiet?: boolean;
  json?: boolean;
}

export function protectCommand(sequence: string | undefined, options: ProtectOptions): void {
  const log = createLogger(options.quiet || options.json);

  try {
    const input = readSequenceInput(sequence === undefined ? [] : [sequence], options.file).join('');
    const rowLength = parseIntegerOption(options.width, '--width', LAYOUT.ROW_LENGTH);
    const rowsPerBlock = parseIntegerOption(options.rows, '--rows', LAYOUT.ROWS_PER_BLOCK);

    log(`Protecting ${input.length} bases (${rowsPerBlock} rows x ${rowLength} per block)...`);
    const { blocks, stats } = protectSequence(input, { rowLength, rowsPerBlock });

    const meta = {
      [BLOCK_FILE.META_LENGTH]: String(stats.length),
      [BLOCK_FILE.META_ROW_LENGTH]: String(stats.rowLength),
      [BLOCK_FILE.META_ROWS_PER_BLOCK]: String(stats.rowsPerBlock),
    };

    if (options.json) {
      if (options.output) {
        writeBlocks(options.output, blocks, meta);
      }
      console.log(JSON.stringify({
        success: true,
        ...stats,
        blocks: blocks.map(block => block.rows()),
        output: options.output,
      }, null, 2));
      return;
    }

    writeBlocks(options.output, blocks, meta);
    log(`Blocks: ${stats.blockCount}, padding: ${stats.padding}`);
    if (options.output) {
      log(`Saved to ${options.output}`);
    }
  } catch (err) {
    reportError(err, options.json);
  }
}

export function recoverCommand(filePath: string, options: RecoverOptions): void {
  const silent = options.quiet || options.json;
  const log = createLogger(silent);
  const restoreLogs = routeLibraryLogs(silent);

  try {
    log(`Reading ${filePath}...`);
    const { blocks, meta } = readBlockFile(filePath);
    const lengthValue = meta[BLOCK_FILE.META_LENGTH];
    if (lengthValue === undefined) {
      throw new Error(`Block file has no "${BLOCK_FILE.META_LENGTH}" header`);
    }
    const length = parseIntegerOption(lengthValue, `"${BLOCK_FILE.META_LENGTH}" header`);

    const result = recoverSequence(blocks, length);
    const { counts } = result.report;
    log(`Blocks: ${counts.ok} ok, ${counts.corrected} corrected, ` +
      `${counts.unrecoverable} unrecoverable, ${counts.invalid_input} invalid`);

    if (!result.success || result.sequence === undefined) {
      if (options.json) {
        console.log(JSON.stringify({ success: false, error: result.error, counts }, null, 2));
      } else {
        console.error('Error:', result.error);
      }
      process.exitCode = 1;
      return;
    }

    if (options.json) {
      if (options.output) {
        writeText(options.output, result.sequence);
      }
      console.log(JSON.stringify({
        success: true,
        sequence: result.sequence,
        length: result.sequence.length,
        counts,
        output: options.output,
      }, null, 2));
      return;
    }

    writeText(options.output, result.sequence);
    if (options.output) {
      log(`Saved to ${options.output}`);
    }
  } catch (err) {
    reportError(err, options.json);
  } finally {
    restoreLogs();
  }
}
