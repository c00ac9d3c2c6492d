/**
 * CLI Seal and Unseal Commands
 * Encrypts hotspot records into one envelope per record, or into a table of
 * nucleotide-encoded rows
 */

import { mkdirSync, readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import { openFromDna, openMetadata, parseHexKey, readEnvelope, sealMetadata, sealToDna } from '../src/lib/crypto.js';
import { hotspotMetadata, hotspotPlaintext, parseHotspots, type HotspotRecord } from '../src/records/hotspot.js';
import { formatSealedTable, isSealedTable, parseSealedTable, sealedRecordId } from '../src/records/sealed-table.js';
import { bytesToString, stringToBytes } from '../src/utils/helpers.js';
import { writeText } from './block-io.js';
import { createLogger, reportError, type Logger } from './logging.js';

interface SealOptions {
  key?: string;
  out?: string;
  tsv?: string;
  quiet?: boolean;
  json?: boolean;
}

interface UnsealOptions {
  key?: string;
  record?: string;
  output?: string;
  json?: boolean;
}

interface SealedFiles {
  index: number;
  envelope: string;
  metadata: string;
}

function loadKey(keyPath: string | undefined): Uint8Array {
  if (!keyPath) {
    throw new Error('A key file is required (-k, --key)');
  }
  return parseHexKey(readFileSync(keyPath, 'utf-8'));
}

function sealToDirectory(records: HotspotRecord[], key: Uint8Array, outDir: string, log: Logger): SealedFiles[] {
  mkdirSync(outDir, { recursive: true, mode: 0o700 });

  return records.map((record, index) => {
    const envelope = sealMetadata(stringToBytes(hotspotPlaintext(record)), key);
    const { nonce, ciphertext } = readEnvelope(envelope);

    const binPath = join(outDir, `${sealedRecordId(index)}.bin`);
    const metaPath = join(outDir, `${sealedRecordId(index)}.meta`);
    writeFileSync(binPath, envelope);
    writeFileSync(metaPath, hotspotMetadata(record, nonce, ciphertext.length));
    log(`Sealed record ${index} (${record.positions.length} positions) -> ${binPath}`);

    return { index, envelope: binPath, metadata: metaPath };
  });
}

function sealToTable(records: HotspotRecord[], key: Uint8Array, tablePath: string): string[] {
  const rows = records.map((record, index) => ({
    id: sealedRecordId(index),
    ...sealToDna(stringToBytes(hotspotPlaintext(record)), key),
  }));
  writeFileSync(tablePath, formatSealedTable(rows));
  return rows.map(row => row.id);
}

export function sealCommand(hotspotPath: string, options: SealOptions): void {
  const log = createLogger(options.quiet || options.json);

  try {
    const outDir = options.out;
    const tablePath = options.tsv;
    if (!outDir && !tablePath) {
      throw new Error('An output directory (-o, --out) or table file (--tsv) is required');
    }
    const key = loadKey(options.key);
    const records = parseHotspots(readFileSync(hotspotPath, 'utf-8'));
    if (records.length === 0) {
      throw new Error('No hotspot records found');
    }

    const files = outDir ? sealToDirectory(records, key, outDir, log) : [];
    const tableIds = tablePath ? sealToTable(records, key, tablePath) : [];

    if (options.json) {
      console.log(JSON.stringify({
        success: true,
        records: files,
        table: tablePath,
        tableRecords: tablePath ? tableIds : undefined,
      }, null, 2));
      return;
    }
    if (outDir) {
      log(`Sealed ${records.length} record(s) into ${outDir}`);
    }
    if (tablePath) {
      log(`Sealed ${tableIds.length} record(s) into ${tablePath}`);
    }
  } catch (err) {
    reportError(err, options.json);
  }
}

/**
 * Decrypt every row of a sealed table, or the one named by `recordId`
 */
function openTable(text: string, key: Uint8Array, recordId: string | undefined): Array<{ id: string; plaintext: string }> {
  const rows = parseSealedTable(text).filter(row => recordId === undefined || row.id === recordId);
  if (rows.length === 0) {
    throw new Error(recordId === undefined ? 'Sealed table has no records' : `Record "${recordId}" not found`);
  }
  return rows.map(row => ({ id: row.id, plaintext: bytesToString(openFromDna(row, key)) }));
}

export function unsealCommand(sealedPath: string, options: UnsealOptions): void {
  try {
    const key = loadKey(options.key);
    const raw = readFileSync(sealedPath);
    const text = raw.toString('utf-8');

    if (isSealedTable(text)) {
      const opened = openTable(text, key, options.record);
      if (options.json) {
        console.log(JSON.stringify({
          success: true,
          records: opened.flatMap(({ id, plaintext }) => parseHotspots(plaintext).map(record => ({ id, ...record }))),
        }, null, 2));
        return;
      }
      writeText(options.output, opened.map(entry => entry.plaintext).join('\n'));
      return;
    }

    if (options.record !== undefined) {
      throw new Error('--record only applies to a sealed table');
    }
    const plaintext = bytesToString(openMetadata(new Uint8Array(raw), key));

    if (options.json) {
      console.log(JSON.stringify({ success: true, records: parseHotspots(plaintext) }, null, 2));
      return;
    }
    writeText(options.output, plaintext);
  } catch (err) {
    reportError(err, options.json);
  }
}
