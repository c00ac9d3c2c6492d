import { describe, it, expect } from 'vitest';
import { formatSealedTable, isSealedTable, parseSealedTable, sealedRecordId } from '../src/records/sealed-table.js';

const HEADER = 'record_id\tnonce_dna\tciphertext_dna\n';

describe('Sealed tables', () => {
  it('should write a header and one row per record', () => {
    const text = formatSealedTable([
      { id: sealedRecordId(0), nonce: 'AAAG', ciphertext: 'ACGTTGCA' },
      { id: sealedRecordId(1), nonce: 'CCCC', ciphertext: 'GGGG' },
    ]);

    expect(text).toBe(HEADER + 'hotspot_0\tAAAG\tACGTTGCA\nhotspot_1\tCCCC\tGGGG\n');
  });

  it('should read back rows and skip blank lines', () => {
    expect(parseSealedTable(HEADER.replace('\n', '\r\n') + 'r1\tAAAA\tCCCC\r\n\r\n')).toEqual([
      { id: 'r1', nonce: 'AAAA', ciphertext: 'CCCC' },
    ]);
  });

  it('should recognise the header', () => {
    expect(isSealedTable(HEADER)).toBe(true);
    expect(isSealedTable('Hotspot Positions: 1\n')).toBe(false);
  });

  it('should report malformed tables with a line number', () => {
    expect(() => parseSealedTable('id\tnonce\n')).toThrow(
      'Line 1: expected header "record_id nonce_dna ciphertext_dna"'
    );
    expect(() => parseSealedTable(HEADER + 'r1\tAAAA\n')).toThrow('Line 2: expected 3 fields, got 2');
    expect(() => parseSealedTable(HEADER + 'r1\tAAAA\tCCCC\n\tAAAA\tCCCC\n')).toThrow('Line 3: empty record id');
  });
});
