/**
 * File and stdin I/O for the CLI
 */

import { readFileSync, writeFileSync } from 'fs';
import { formatBlockFile, parseBlockFile, type BlockFile } from '../src/format/block-text.js';
import type { ParityBlock } from '../src/encode/parity-block.js';

/**
 * Read and parse a block file
 */
export function readBlockFile(filePath: string): BlockFile {
  return parseBlockFile(readFileSync(filePath, 'utf-8'));
}

/**
 * Write blocks to a file, or to stdout when no path is given
 */
export function writeBlocks(
  outputPath: string | undefined,
  blocks: readonly ParityBlock[],
  meta?: Record<string, string>
): void {
  const text = formatBlockFile(blocks, meta);
  if (outputPath) {
    writeFileSync(outputPath, text);
  } else {
    process.stdout.write(text);
  }
}

/**
 * Write text to a file, or to stdout with a trailing newline
 */
export function writeText(outputPath: string | undefined, text: string): void {
  if (outputPath) {
    writeFileSync(outputPath, text);
  } else {
    process.stdout.write(text.endsWith('\n') ? text : text + '\n');
  }
}

/**
 * Split sequence text into sequences
 * FASTA records (">" headers) are joined per record; otherwise one per line.
 * Lines starting with "#" or ";" are comments.
 */
export function parseSequenceText(text: string): string[] {
  const lines = text
    .replace(/\r\n?/g, '\n')
    .split('\n')
    .map(line => line.trim())
    .filter(line => line.length > 0 && !line.startsWith('#') && !line.startsWith(';'));

  if (!lines.some(line => line.startsWith('>'))) {
    return lines;
  }

  const records: string[] = [];
  for (const line of lines) {
    if (line.startsWith('>')) {
      records.push('');
    } else if (records.length === 0) {
      throw new Error('FASTA sequence data before the first ">" header');
    } else {
      records[records.length - 1] += line;
    }
  }
  return records;
}

/**
 * Resolve sequence input from arguments, a file, or piped stdin
 */
export function readSequenceInput(args: readonly string[], file: string | undefined): string[] {
  if (file) {
    return parseSequenceText(readFileSync(file, 'utf-8'));
  }
  if (args.length > 0) {
    return [...args];
  }
  if (!process.stdin.isTTY) {
    return parseSequenceText(readFileSync(0, 'utf-8'));
  }
  throw new Error('No input provided. Use sequence arguments, -f flag, or pipe input.');
}
