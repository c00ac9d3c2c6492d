/**
 * baseguard CLI - Parity protection for nucleotide sequences
 */

import { Command } from 'commander';
import { VERSION } from '../src/utils/version.js';
import { buildCommand } from './build.js';
import { checkCommand } from './check.js';
import { demoCommand } from './demo.js';
import { embedCommand, extractCommand } from './embed.js';
import { hotspotsCommand } from './hotspots.js';
import { mutateCommand } from './mutate.js';
import { protectCommand, recoverCommand } from './protect.js';
import { sealCommand, unsealCommand } from './seal.js';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('baseguard')
    .description('Protect nucleotide sequences with 2D parity.\n\nEach block gets a row parity column, a column parity row and a corner, all mod 4 over A=0 T=1 G=2 C=3. Any single corrupted base in a block can be located and corrected.')
    .version(VERSION)
    .addHelpText('after', `
Examples:
  $ baseguard build AACGGATGA TTAGGCATA CGTATTCGG -o block.txt
  $ baseguard mutate block.txt --row 0 --col 0 --base T -o block.txt
  $ baseguard check block.txt
  $ baseguard protect -f genome.fa -w 60 -r 16 -o genome.blocks
  $ baseguard recover genome.blocks -o genome.txt
  $ baseguard demo`);

  // Build command
  program
    .command('build')
    .description('Build a parity block from equal-length sequences')
    .argument('[sequences...]', 'Sequences, one per block row (or use -f, or pipe from stdin)')
    .option('-f, --file <path>', 'Read sequences from a file (one per line, or FASTA)')
    .option('-o, --output <path>', 'Write the block to a file instead of stdout')
    .option('-q, --quiet', 'Suppress progress output')
    .option('--json', 'Output result as JSON')
    .action(buildCommand);

  // Check command
  program
    .command('check')
    .description('Detect and correct single-base errors in a block file')
    .argument('<file>', 'Block file to check')
    .option('-o, --output <path>', 'Write corrected blocks to a file instead of stdout')
    .option('--dry-run', 'Report what would be corrected without writing anything')
    .option('-q, --quiet', 'Suppress progress output')
    .option('--json', 'Output per-block outcomes as JSON')
    .addHelpText('after', `
Exit code is 1 when any block is unrecoverable or invalid.

Examples:
  $ baseguard check block.txt -o fixed.txt
  $ baseguard check genome.blocks --dry-run --json`)
    .action(checkCommand);

  // Mutate command
  program
    .command('mutate')
    .description('Overwrite one cell of a block file to simulate an error')
    .argument('<file>', 'Block file to modify')
    .requiredOption('--row <n>', 'Row index (0-based, parity row included)')
    .requiredOption('--col <n>', 'Column index (0-based, parity column included)')
    .requiredOption('--base <b>', 'Replacement character')
    .option('--block <n>', 'Block index within the file', '0')
    .option('-o, --output <path>', 'Write the result to a file instead of stdout')
    .option('-q, --quiet', 'Suppress progress output')
    .action(mutateCommand);

  // Protect command
  program
    .command('protect')
    .description('Split a long sequence into parity blocks')
    .argument('[sequence]', 'Sequence to protect (or use -f, or pipe from stdin)')
    .option('-f, --file <path>', 'Read the sequence from a file (plain or FASTA)')
    .option('-w, --width <n>', 'Bases per row')
    .option('-r, --rows <n>', 'Rows per block')
    .option('-o, --output <path>', 'Write the block file to a path instead of stdout')
    .option('-q, --quiet', 'Suppress progress output')
    .option('--json', 'Output result as JSON')
    .action(protectCommand);

  // Recover command
  program
    .command('recover')
    .description('Correct a protected block file and print the original sequence')
    .argument('<file>', 'Block file written by protect')
    .option('-o, --output <path>', 'Write the sequence to a file instead of stdout')
    .option('-q, --quiet', 'Suppress progress output')
    .option('--json', 'Output result as JSON')
    .action(recoverCommand);

  // Demo command
  program
    .command('demo')
    .description('Walk through data, row parity and column parity corrections on a 3x9 block')
    .action(demoCommand);

  // Embed command
  program
    .command('embed')
    .description('Embed a payload into a sequence at candidate SNP positions')
    .argument('<sequence>', 'Reference sequence')
    .option('-p, --positions <list>', 'Comma-separated 0-based candidate positions')
    .option('--payload <hex>', 'Payload bytes as hex (one bit per position, MSB first)')
    .option('--alternates <list>', 'Comma-separated alternate alleles per position')
    .option('-q, --quiet', 'Suppress the allele table')
    .option('--json', 'Output result as JSON')
    .addHelpText('after', `
Examples:
  $ baseguard embed ACGTACGTACGT -p 0,1,2,3,4,5,6,7 --payload b6`)
    .action(embedCommand);

  // Extract command
  program
    .command('extract')
    .description('Read a payload back from an embedded sequence')
    .argument('<sequence>', 'Sequence carrying the payload')
    .option('-p, --positions <list>', 'Comma-separated 0-based candidate positions')
    .option('--reference <sequence>', 'Original reference sequence')
    .option('--bytes <n>', 'Payload length in bytes (default: positions / 8)')
    .option('--alternates <list>', 'Comma-separated alternate alleles per position')
    .option('--json', 'Output result as JSON')
    .action(extractCommand);

  // Hotspots command
  program
    .command('hotspots')
    .description('Find SNP-dense windows in variant lines and write hotspot records')
    .argument('<variants>', 'Tab-separated variant file (VCF columns CHROM POS ID REF ALT)')
    .option('-w, --window <n>', 'Window size in bases (default: 10000, or 1000 with --sliding)')
    .option('-t, --threshold <n>', 'Minimum SNPs per window (default: 15, or 10 with --sliding)')
    .option('--sliding', 'Slide windows by a tenth of their size instead of tiling them')
    .option('--exclude <regions>', 'Drop windows overlapping these regions (start-end or chrom:start-end, comma-separated)')
    .option('--limit <n>', 'Read at most this many sites')
    .option('--table', 'Write a Chromosome/Start/End/SNP_Count/DNA_String table instead of records')
    .option('-o, --output <path>', 'Write to a file instead of stdout')
    .option('-q, --quiet', 'Suppress progress output')
    .option('--json', 'Output result as JSON')
    .addHelpText('after', `
Examples:
  $ baseguard hotspots variants.vcf -w 10000 -t 15 -o hotspots.txt
  $ baseguard hotspots variants.vcf --sliding --exclude chr1:0-5000 --table`)
    .action(hotspotsCommand);

  // Seal command
  program
    .command('seal')
    .description('Encrypt hotspot records into per-record envelopes or a nucleotide table')
    .argument('<hotspots>', 'Hotspot record file')
    .option('-k, --key <path>', 'File holding a 32-byte key as hex')
    .option('-o, --out <dir>', 'Output directory for hotspot_N.bin and hotspot_N.meta')
    .option('--tsv <path>', 'Write a record_id/nonce_dna/ciphertext_dna table')
    .option('-q, --quiet', 'Suppress progress output')
    .option('--json', 'Output result as JSON')
    .addHelpText('after', `
Examples:
  $ baseguard seal hotspots.txt -k key.hex -o sealed/
  $ baseguard seal hotspots.txt -k key.hex --tsv sealed.tsv`)
    .action(sealCommand);

  // Unseal command
  program
    .command('unseal')
    .description('Decrypt a hotspot envelope or sealed table')
    .argument('<file>', 'Envelope or table written by seal')
    .option('-k, --key <path>', 'File holding the 32-byte key as hex')
    .option('--record <id>', 'Only open this table row (e.g. hotspot_0)')
    .option('-o, --output <path>', 'Write the plaintext to a file instead of stdout')
    .option('--json', 'Output parsed records as JSON')
    .action(unsealCommand);

  return program;
}
