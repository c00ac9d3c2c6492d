/**
 * Sealed record tables
 *
 *   record_id<TAB>nonce_dna<TAB>ciphertext_dna
 *   hotspot_0<TAB>AAAG...<TAB>CTGA...
 *
 * One row per record; nonce and ciphertext are nucleotide strings.
 */
import type { DnaSealedRecord } from '../lib/crypto.js';
import { SEALED_TABLE } from '../utils/constants.js';

export interface SealedRow extends DnaSealedRecord {
  id: string;
}

const HEADER = SEALED_TABLE.COLUMNS.join('\t');

/**
 * Identifier of the record at `index`, shared with envelope file names
 */
export function sealedRecordId(index: number): string {
  return `${SEALED_TABLE.RECORD_PREFIX}${index}`;
}

export function formatSealedTable(rows: readonly SealedRow[]): string {
  return [HEADER, ...rows.map(row => `${row.id}\t${row.nonce}\t${row.ciphertext}`)]
    .map(line => `${line}\n`)
    .join('');
}

/**
 * Whether text starts with the sealed table header
 */
export function isSealedTable(text: string): boolean {
  return text.replace(/\r\n?/g, '\n').split('\n', 1)[0] === HEADER;
}

export function parseSealedTable(text: string): SealedRow[] {
  const lines = text.replace(/\r\n?/g, '\n').split('\n');
  if (lines[0] !== HEADER) {
    throw new Error(`Line 1: expected header "${SEALED_TABLE.COLUMNS.join(' ')}"`);
  }

  const rows: SealedRow[] = [];
  lines.slice(1).forEach((line, index) => {
    if (line.length === 0) return;

    const fields = line.split('\t');
    if (fields.length !== SEALED_TABLE.COLUMNS.length) {
      throw new Error(`Line ${index + 2}: expected ${SEALED_TABLE.COLUMNS.length} fields, got ${fields.length}`);
    }
    const [id, nonce, ciphertext] = fields;
    if (id.length === 0) {
      throw new Error(`Line ${index + 2}: empty record id`);
    }
    rows.push({ id, nonce, ciphertext });
  });

  return rows;
}
