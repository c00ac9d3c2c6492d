/**
 * Text rendering of parity blocks
 *
 * One line per row, `totalCols` characters per line, no separators.
 * Block files may start with `# key: value` header lines and hold several
 * blocks separated by blank lines. Header lines are only read before the
 * first row; after that every non-empty line is a row, taken verbatim.
 */
import { ParityBlock } from '../encode/parity-block.js';
import { BLOCK_FILE } from '../utils/constants.js';

export interface BlockFile {
  blocks: ParityBlock[];
  meta: Record<string, string>;
}

/**
 * Render a block, each row followed by a newline
 */
export function formatBlock(block: ParityBlock): string {
  return block.rows().map(row => `${row}\n`).join('');
}

/**
 * Render several blocks with an optional metadata header
 * Throws when a cell would not read back: a line break anywhere, or a
 * comment prefix opening the first row.
 */
export function formatBlockFile(blocks: readonly ParityBlock[], meta: Record<string, string> = {}): string {
  blocks.forEach((block, index) => {
    block.rows().forEach((row, i) => {
      if (/[\r\n]/.test(row)) {
        throw new Error(`Block ${index} row ${i} holds a line break, which a block file cannot carry`);
      }
    });
  });
  if (blocks.length > 0 && blocks[0].get(0, 0) === BLOCK_FILE.COMMENT_PREFIX) {
    throw new Error(`The first row of a block file cannot start with "${BLOCK_FILE.COMMENT_PREFIX}"`);
  }

  const header = Object.entries(meta)
    .map(([key, value]) => `${BLOCK_FILE.COMMENT_PREFIX} ${key}: ${value}\n`)
    .join('');
  return header + blocks.map(formatBlock).join('\n');
}

/**
 * Parse a block file
 * Cells are kept verbatim so corrupted files still load; ragged rows throw.
 */
export function parseBlockFile(text: string): BlockFile {
  const lines = text.replace(/\r\n?/g, '\n').split('\n');
  const meta: Record<string, string> = {};
  const blocks: ParityBlock[] = [];

  let current: string[] = [];
  let startLine = 0;
  let inHeader = true;

  const flush = () => {
    if (current.length === 0) return;
    const width = current[0].length;
    current.forEach((row, i) => {
      if (row.length !== width) {
        throw new Error(
          `Line ${startLine + i + 1}: row has ${row.length} cells, expected ${width}`
        );
      }
    });
    blocks.push(ParityBlock.fromRows(current));
    current = [];
  };

  lines.forEach((line, index) => {
    if (inHeader && line.startsWith(BLOCK_FILE.COMMENT_PREFIX)) {
      const match = line.slice(BLOCK_FILE.COMMENT_PREFIX.length).match(/^\s*([\w-]+)\s*:\s*(.*)$/);
      if (match) {
        meta[match[1]] = match[2].trim();
      }
      return;
    }

    if (line.length === 0) {
      flush();
      return;
    }

    inHeader = false;
    if (current.length === 0) {
      startLine = index;
    }
    current.push(line);
  });
  flush();

  if (blocks.length === 0) {
    throw new Error('No blocks found');
  }

  return { blocks, meta };
}
