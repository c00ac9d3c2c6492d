import { describe, it, expect, vi, beforeAll, afterAll, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { createProgram } from '../cli/program.js';
import { buildCommand } from '../cli/build.js';
import { checkCommand } from '../cli/check.js';
import { mutateCommand } from '../cli/mutate.js';
import { protectCommand, recoverCommand } from '../cli/protect.js';
import { demoCommand } from '../cli/demo.js';
import { embedCommand, extractCommand } from '../cli/embed.js';
import { sealCommand, unsealCommand } from '../cli/seal.js';
import { hotspotsCommand } from '../cli/hotspots.js';
import { parseSequenceText } from '../cli/block-io.js';

const REFERENCE_ROWS = ['AACGGATGA', 'TTAGGCATA', 'CGTATTCGG'];
const REFERENCE_TEXT = 'AACGGATGAG\nTTAGGCATAG\nCGTATTCGGC\nACAATAATGC\n';

// Test directory for temporary files
let testDir: string;

beforeAll(() => {
  testDir = mkdtempSync(join(tmpdir(), 'baseguard-cli-test-'));
});

afterAll(() => {
  if (testDir && existsSync(testDir)) {
    rmSync(testDir, { recursive: true, force: true });
  }
});

let stdout: string[];
let stderr: string[];

beforeEach(() => {
  stdout = [];
  stderr = [];
  const toStdout = (...args: unknown[]) => { stdout.push(args.map(String).join(' ')); };
  const toStderr = (...args: unknown[]) => { stderr.push(args.map(String).join(' ')); };

  vi.spyOn(console, 'log').mockImplementation(toStdout);
  vi.spyOn(console, 'error').mockImplementation(toStderr);
  vi.spyOn(console, 'warn').mockImplementation(toStderr);
  vi.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
    stdout.push(String(chunk));
    return true;
  });
  process.exitCode = undefined;
});

afterEach(() => {
  vi.restoreAllMocks();
  process.exitCode = undefined;
});

function file(name: string): string {
  return join(testDir, name);
}

describe('CLI', () => {
  describe('Help and Version', () => {
    it('should describe every command', () => {
      const help = createProgram().helpInformation();

      expect(help).toContain('Protect nucleotide sequences with 2D parity');
      for (const command of ['build', 'check', 'mutate', 'protect', 'recover', 'demo', 'embed', 'extract', 'hotspots', 'seal', 'unseal']) {
        expect(help).toContain(command);
      }
    });

    it('should report a version', () => {
      expect(createProgram().version()).toMatch(/^\d+\.\d+\.\d+$/);
    });
  });

  describe('Build', () => {
    it('should write a block file', () => {
      const output = file('built.txt');
      buildCommand(REFERENCE_ROWS, { output, quiet: true });

      expect(process.exitCode).toBeUndefined();
      expect(readFileSync(output, 'utf-8')).toBe(REFERENCE_TEXT);
    });

    it('should print the block to stdout without -o', () => {
      buildCommand(REFERENCE_ROWS, { quiet: true });
      expect(stdout).toEqual([REFERENCE_TEXT]);
    });

    it('should read sequences from a FASTA file', () => {
      const input = file('rows.fa');
      writeFileSync(input, '>row0\nAACGG\nATGA\n>row1\nTTAGGCATA\n>row2\nCGTATTCGG\n');
      buildCommand([], { file: input, quiet: true });
      expect(stdout).toEqual([REFERENCE_TEXT]);
    });

    it('should output JSON', () => {
      buildCommand(REFERENCE_ROWS, { json: true });

      expect(JSON.parse(stdout.join(''))).toEqual({
        success: true,
        rows: 4,
        cols: 10,
        block: REFERENCE_TEXT.trim().split('\n'),
      });
      expect(stderr).toEqual([]);
    });

    it('should fail on invalid bases', () => {
      buildCommand(['ACNT'], { quiet: true });

      expect(stderr).toEqual(['Error: Invalid base "N" at sequence 0, position 2']);
      expect(process.exitCode).toBe(1);
    });
  });

  describe('Mutate and Check', () => {
    it('should correct an injected data error', () => {
      const blockFile = file('mutated.txt');
      const fixed = file('fixed.txt');
      writeFileSync(blockFile, REFERENCE_TEXT);

      mutateCommand(blockFile, { row: '0', col: '0', base: 't', output: blockFile });
      expect(stderr[0]).toBe('Introducing mutation in block 0 at (0, 0): A -> T');
      expect(readFileSync(blockFile, 'utf-8').split('\n')[0]).toBe('TACGGATGAG');

      checkCommand(blockFile, { output: fixed });

      expect(process.exitCode).toBeUndefined();
      expect(readFileSync(fixed, 'utf-8')).toBe(REFERENCE_TEXT);
      expect(stderr).toContain('[Parity] Corrected data cell (0, 0)');
      expect(stderr).toContain('Block 0: corrected data cell (0, 0): T -> A');
      expect(stdout).toEqual([]);
    });

    it('should report unrecoverable blocks as JSON without writing in a dry run', () => {
      const blockFile = file('double.txt');
      const damaged = 'TTCGGATGAG\nTTAGGCATAG\nCGTATTCGGC\nACAATAATGC\n';
      writeFileSync(blockFile, damaged);

      checkCommand(blockFile, { dryRun: true, json: true });

      expect(JSON.parse(stdout.join(''))).toEqual({
        success: false,
        blocks: [{ index: 0, status: 'unrecoverable', reason: 'multiple_errors' }],
      });
      expect(process.exitCode).toBe(1);
      expect(readFileSync(blockFile, 'utf-8')).toBe(damaged);
    });

    it('should keep a comment prefix injected inside a block', () => {
      const blockFile = file('hash-cell.txt');
      writeFileSync(blockFile, REFERENCE_TEXT);

      mutateCommand(blockFile, { row: '1', col: '0', base: '#', output: blockFile, quiet: true });
      expect(readFileSync(blockFile, 'utf-8').split('\n')[1]).toBe('#TAGGCATAG');

      checkCommand(blockFile, { dryRun: true, json: true });

      expect(JSON.parse(stdout.join(''))).toEqual({
        success: false,
        blocks: [{ index: 0, status: 'invalid_input', reason: 'Invalid symbol "#" at (1, 0)' }],
      });
      expect(process.exitCode).toBe(1);
    });

    it('should refuse a comment prefix at the start of the file', () => {
      const blockFile = file('hash-first.txt');
      writeFileSync(blockFile, REFERENCE_TEXT);

      mutateCommand(blockFile, { row: '0', col: '0', base: '#', output: blockFile, quiet: true });

      expect(stderr).toEqual(['Error: The first row of a block file cannot start with "#"']);
      expect(process.exitCode).toBe(1);
      expect(readFileSync(blockFile, 'utf-8')).toBe(REFERENCE_TEXT);
    });

    it('should keep a whitespace cell in the parity column', () => {
      const blockFile = file('space-cell.txt');
      writeFileSync(blockFile, REFERENCE_TEXT);

      mutateCommand(blockFile, { row: '0', col: '9', base: ' ', output: blockFile, quiet: true });
      expect(readFileSync(blockFile, 'utf-8').split('\n')[0]).toBe('AACGGATGA ');

      checkCommand(blockFile, { dryRun: true, json: true });

      expect(JSON.parse(stdout.join(''))).toEqual({
        success: false,
        blocks: [{ index: 0, status: 'invalid_input', reason: 'Invalid symbol " " at (0, 9)' }],
      });
    });

    it('should reject an out-of-range cell', () => {
      const blockFile = file('range.txt');
      writeFileSync(blockFile, REFERENCE_TEXT);

      mutateCommand(blockFile, { row: '4', col: '0', base: 'A', quiet: true });

      expect(stderr).toEqual(['Error: Cell (4, 0) outside 4x10 block']);
      expect(process.exitCode).toBe(1);
    });

    it('should fail on a missing file', () => {
      checkCommand(file('missing.txt'), { quiet: true });
      expect(stderr).toHaveLength(1);
      expect(stderr[0]).toMatch(/^Error: ENOENT/);
      expect(process.exitCode).toBe(1);
    });
  });

  describe('Protect and Recover', () => {
    it('should round-trip a sequence through a damaged block file', () => {
      const blockFile = file('protected.txt');
      const recovered = file('recovered.txt');

      protectCommand('ACGTACGTACGT', { width: '5', rows: '2', output: blockFile, quiet: true });
      const text = readFileSync(blockFile, 'utf-8');
      expect(text.split('\n').slice(0, 3)).toEqual(['# length: 12', '# row-length: 5', '# rows-per-block: 2']);

      mutateCommand(blockFile, { row: '0', col: '2', base: 'T', block: '1', output: blockFile, quiet: true });
      recoverCommand(blockFile, { output: recovered, quiet: true });

      expect(process.exitCode).toBeUndefined();
      expect(readFileSync(recovered, 'utf-8')).toBe('ACGTACGTACGT');
    });

    it('should need the length header', () => {
      const blockFile = file('no-header.txt');
      writeFileSync(blockFile, REFERENCE_TEXT);

      recoverCommand(blockFile, { quiet: true });

      expect(stderr).toEqual(['Error: Block file has no "length" header']);
      expect(process.exitCode).toBe(1);
    });
  });

  describe('Demo', () => {
    it('should walk through the three corrections', () => {
      demoCommand();

      expect(stdout[0]).toBe('Initial block with parity nucleotides:');
      expect(stdout[1]).toBe(REFERENCE_TEXT);
      expect(stdout).toContain('Introducing mutation at (0, 0): A -> T');
      expect(stdout).toContain('Parity check: corrected data cell (0, 0): T -> A');
      expect(stdout).toContain('Introducing mutation at (1, 9): G -> A');
      expect(stdout).toContain('Parity check: corrected row parity cell (1, 9): A -> G');
      expect(stdout).toContain('Introducing mutation at (3, 2): A -> G');
      expect(stdout).toContain('Parity check: corrected column parity cell (3, 2): G -> A');
      expect(stdout[stdout.length - 1]).toBe(REFERENCE_TEXT);
      expect(stderr).toEqual([]);
    });
  });

  describe('Embed and Extract', () => {
    it('should embed a payload and read it back', () => {
      const positions = '0,1,2,3,4,5,6,7';

      embedCommand('ACGTACGTACGT', { positions, payload: 'b6', quiet: true });
      expect(stdout).toEqual(['GATGCTTCACGT']);

      stdout.length = 0;
      extractCommand('GATGCTTCACGT', { positions, reference: 'ACGTACGTACGT' });
      expect(stdout).toEqual(['b6']);
    });

    it('should print the allele table to stderr', () => {
      embedCommand('ACGTACGT', { positions: '0,1,2,3,4,5,6,7', payload: '00' });
      expect(stderr).toContain('  pos=0 ref=A allele=C bit=0');
    });

    it('should require positions', () => {
      embedCommand('ACGT', { payload: '00' });
      expect(stderr).toEqual(['Error: Both --positions and --payload are required']);
      expect(process.exitCode).toBe(1);
    });
  });

  describe('Seal and Unseal', () => {
    it('should seal each record and open it again', () => {
      const hotspots = file('hotspots.txt');
      const keyFile = file('key.hex');
      const outDir = file('sealed');
      writeFileSync(hotspots, 'Hotspot Positions: 12,40,77\nReference: ACGT\nAlternate: TTGA\n\nHotspot Positions: 5\nReference: G\n');
      writeFileSync(keyFile, '11'.repeat(32) + '\n');

      sealCommand(hotspots, { key: keyFile, out: outDir, quiet: true });

      expect(process.exitCode).toBeUndefined();
      expect(existsSync(join(outDir, 'hotspot_0.bin'))).toBe(true);
      expect(existsSync(join(outDir, 'hotspot_1.bin'))).toBe(true);
      expect(readFileSync(join(outDir, 'hotspot_0.meta'), 'utf-8')).toMatch(
        /^Hotspot Count: 3\nReference: ACGT\nAlternate: TTGA\nNonce \(hex\): [0-9a-f]{48}\nCiphertext Length: 44\n$/
      );

      unsealCommand(join(outDir, 'hotspot_0.bin'), { key: keyFile });
      expect(stdout).toEqual(['Hotspot Positions: 12,40,77\nReference: ACGT\n']);
    });

    it('should seal records into a nucleotide table and open each row', () => {
      const hotspots = file('hotspots-table.txt');
      const keyFile = file('key-table.hex');
      const table = file('sealed.tsv');
      writeFileSync(hotspots, 'Hotspot Positions: 12,40,77\nReference: ACGT\n\nHotspot Positions: 5\nReference: G\n');
      writeFileSync(keyFile, '11'.repeat(32));

      sealCommand(hotspots, { key: keyFile, tsv: table, quiet: true });

      expect(process.exitCode).toBeUndefined();
      const lines = readFileSync(table, 'utf-8').split('\n');
      expect(lines[0]).toBe('record_id\tnonce_dna\tciphertext_dna');
      const [id, nonce, ciphertext] = lines[1].split('\t');
      expect(id).toBe('hotspot_0');
      expect(nonce).toMatch(/^[ACGT]{96}$/);
      expect(ciphertext).toMatch(/^[ACGT]{176}$/);
      expect(lines[2].startsWith('hotspot_1\t')).toBe(true);

      unsealCommand(table, { key: keyFile });
      expect(stdout).toEqual([
        'Hotspot Positions: 12,40,77\nReference: ACGT\n\nHotspot Positions: 5\nReference: G\n',
      ]);

      stdout.length = 0;
      unsealCommand(table, { key: keyFile, record: 'hotspot_1' });
      expect(stdout).toEqual(['Hotspot Positions: 5\nReference: G\n']);
    });

    it('should name a missing table row', () => {
      const table = file('sealed-missing.tsv');
      const keyFile = file('key-missing.hex');
      writeFileSync(table, 'record_id\tnonce_dna\tciphertext_dna\n');
      writeFileSync(keyFile, '11'.repeat(32));

      unsealCommand(table, { key: keyFile, record: 'hotspot_9' });

      expect(stderr).toEqual(['Error: Record "hotspot_9" not found']);
      expect(process.exitCode).toBe(1);
    });

    it('should need somewhere to write', () => {
      sealCommand(file('hotspots.txt'), { key: file('key.hex') });
      expect(stderr).toEqual(['Error: An output directory (-o, --out) or table file (--tsv) is required']);
      expect(process.exitCode).toBe(1);
    });

    it('should require a key file', () => {
      sealCommand(file('hotspots.txt'), { out: file('sealed-nokey') });
      expect(stderr).toEqual(['Error: A key file is required (-k, --key)']);
      expect(process.exitCode).toBe(1);
    });
  });

  describe('Hotspots', () => {
    const VARIANTS = [
      '#CHROM\tPOS\tID\tREF\tALT',
      'chr1\t100\trs1\tA\tG',
      'chr1\t150\t.\tC\tT,A',
      'chr1\t900\t.\tG\tC',
      'chr1\t1500\t.\tT\tA',
      'chr2\t10\t.\tA\tC',
      'chr2\t20\t.\tG\tT',
      '',
    ].join('\n');

    it('should write hotspot records that seal accepts', () => {
      const variants = file('variants.vcf');
      const records = file('found.txt');
      const keyFile = file('key-found.hex');
      writeFileSync(variants, VARIANTS);
      writeFileSync(keyFile, '11'.repeat(32));

      hotspotsCommand(variants, { window: '1000', threshold: '2', output: records, quiet: true });

      expect(readFileSync(records, 'utf-8')).toBe(
        'Hotspot Positions: 100,150,900\nReference: ACG\nAlternate: GTC\n' +
        '\n' +
        'Hotspot Positions: 10,20\nReference: AG\nAlternate: CT\n'
      );

      sealCommand(records, { key: keyFile, tsv: file('found.tsv'), quiet: true });
      expect(process.exitCode).toBeUndefined();
    });

    it('should print a summary table and log counts', () => {
      const variants = file('variants-table.vcf');
      writeFileSync(variants, VARIANTS);

      hotspotsCommand(variants, { window: '1000', threshold: '2', table: true, exclude: 'chr2:0-50' });

      expect(stdout).toEqual(['Chromosome\tStart\tEnd\tSNP_Count\tDNA_String\nchr1\t0\t1000\t3\tAGCTAGC\n']);
      expect(stderr).toEqual([
        `Read 6 SNP site(s) from ${variants}`,
        'Dropped 1 hotspot(s) overlapping excluded regions',
        'Found 1 hotspot(s)',
      ]);
    });

    it('should reject a malformed region', () => {
      const variants = file('variants-region.vcf');
      writeFileSync(variants, VARIANTS);

      hotspotsCommand(variants, { exclude: '50-10', quiet: true });

      expect(stderr).toEqual(['Error: Region "50-10" ends before it starts']);
      expect(process.exitCode).toBe(1);
    });
  });

  describe('Sequence input', () => {
    it('should read one sequence per line and skip comments', () => {
      expect(parseSequenceText('# rows\nACGT\r\n\nTTGA\n')).toEqual(['ACGT', 'TTGA']);
    });

    it('should reject FASTA data before a header', () => {
      expect(() => parseSequenceText('ACGT\n>seq\nTT\n')).toThrow('FASTA sequence data before the first ">" header');
    });
  });
});
