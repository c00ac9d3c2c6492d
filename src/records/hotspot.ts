/**
 * Hotspot record files
 *
 *   Hotspot Positions: 12, 40, 77
 *   Reference: ACGT
 *   Alternate: TTGA        (optional)
 *
 * Groups repeat; blank lines are ignored.
 */
import { bytesToHex, parseIndexList } from '../utils/helpers.js';

export interface HotspotRecord {
  positions: number[];
  reference: string;
  alternate?: string;
}

const POSITIONS_PREFIX = 'Hotspot Positions:';
const REFERENCE_PREFIX = 'Reference:';
const ALTERNATE_PREFIX = 'Alternate:';

/**
 * Parse every record in a hotspot file
 */
export function parseHotspots(text: string): HotspotRecord[] {
  const lines = text
    .replace(/\r\n?/g, '\n')
    .split('\n')
    .map((line, index) => ({ text: line.trim(), number: index + 1 }))
    .filter(line => line.text.length > 0);

  const records: HotspotRecord[] = [];
  let i = 0;

  while (i < lines.length) {
    const header = lines[i];
    if (!header.text.startsWith(POSITIONS_PREFIX)) {
      throw new Error(`Line ${header.number}: unexpected line "${header.text}"`);
    }

    let positions: number[];
    try {
      positions = parseIndexList(header.text.slice(POSITIONS_PREFIX.length));
    } catch (err) {
      throw new Error(`Line ${header.number}: ${err instanceof Error ? err.message : String(err)}`);
    }

    const referenceLine = lines[i + 1];
    if (!referenceLine) {
      throw new Error(`Line ${header.number}: missing Reference line after Hotspot Positions`);
    }
    if (!referenceLine.text.startsWith(REFERENCE_PREFIX)) {
      throw new Error(`Line ${referenceLine.number}: malformed Reference line "${referenceLine.text}"`);
    }

    const record: HotspotRecord = {
      positions,
      reference: referenceLine.text.slice(REFERENCE_PREFIX.length).trim(),
    };
    i += 2;

    const next = lines[i];
    if (next && next.text.startsWith(ALTERNATE_PREFIX)) {
      record.alternate = next.text.slice(ALTERNATE_PREFIX.length).trim();
      i++;
    }

    records.push(record);
  }

  return records;
}

/**
 * Text that gets sealed for a record
 */
export function hotspotPlaintext(record: HotspotRecord): string {
  return `${POSITIONS_PREFIX} ${record.positions.join(',')}\n${REFERENCE_PREFIX} ${record.reference}\n`;
}

/**
 * Render records in the hotspot file format, one group per record
 */
export function formatHotspots(records: readonly HotspotRecord[]): string {
  return records
    .map(record => record.alternate === undefined
      ? hotspotPlaintext(record)
      : `${hotspotPlaintext(record)}${ALTERNATE_PREFIX} ${record.alternate}\n`)
    .join('\n');
}

/**
 * Human-readable metadata written next to a sealed record
 */
export function hotspotMetadata(record: HotspotRecord, nonce: Uint8Array, ciphertextLength: number): string {
  const lines = [
    `Hotspot Count: ${record.positions.length}`,
    `${REFERENCE_PREFIX} ${record.reference}`,
  ];
  if (record.alternate !== undefined) {
    lines.push(`${ALTERNATE_PREFIX} ${record.alternate}`);
  }
  lines.push(`Nonce (hex): ${bytesToHex(nonce)}`);
  lines.push(`Ciphertext Length: ${ciphertextLength}`);
  return lines.join('\n') + '\n';
}
