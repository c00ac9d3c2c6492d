/**
 * CLI Embed and Extract Commands
 */

import { embedBitstream, extractBitstream, type CandidateSnp } from '../src/embed/snp.js';
import { bytesToHex, hexToBytes, parseIndexList } from '../src/utils/helpers.js';
import { parseIntegerOption } from './args.js';
import { createLogger, reportError } from './logging.js';

interface EmbedOptions {
  positions?: string;
  payload?: string;
  alternates?: string;
  quiet?: boolean;
  json?: boolean;
}

interface ExtractOptions {
  positions?: string;
  reference?: string;
  bytes?: string;
  alternates?: string;
  json?: boolean;
}

/**
 * Candidates at `positions`, with references read from `reference`
 * @param alternates Comma-separated alternate alleles aligned with positions
 */
export function candidatesFrom(reference: string, positions: number[], alternates?: string): CandidateSnp[] {
  const alternateList = alternates === undefined ? [] : alternates.split(',').map(a => a.trim());
  if (alternateList.length > positions.length) {
    throw new Error(`${alternateList.length} alternate entries for ${positions.length} positions`);
  }

  return positions.map((position, i) => {
    const candidate: CandidateSnp = { position, reference: reference.charAt(position) };
    if (alternateList[i]) {
      candidate.alternates = alternateList[i];
    }
    return candidate;
  });
}

export function embedCommand(sequence: string, options: EmbedOptions): void {
  const log = createLogger(options.quiet || options.json);

  try {
    if (!options.positions || options.payload === undefined) {
      throw new Error('Both --positions and --payload are required');
    }
    const positions = parseIndexList(options.positions);
    const payload = hexToBytes(options.payload);

    const result = embedBitstream(sequence, candidatesFrom(sequence, positions, options.alternates), payload);

    if (options.json) {
      console.log(JSON.stringify({ success: true, ...result }, null, 2));
      return;
    }

    log(`Original sequence: ${sequence}`);
    log(`Encoded alleles:${result.alleles.length ? '' : ' (none)'}`);
    for (const allele of result.alleles) {
      log(`  pos=${allele.position} ref=${allele.reference} allele=${allele.allele} bit=${allele.bit}`);
    }
    console.log(result.sequence);
  } catch (err) {
    reportError(err, options.json);
  }
}

export function extractCommand(sequence: string, options: ExtractOptions): void {
  try {
    if (!options.positions || options.reference === undefined) {
      throw new Error('Both --positions and --reference are required');
    }
    const positions = parseIndexList(options.positions);
    const byteLength = parseIntegerOption(options.bytes, '--bytes', Math.floor(positions.length / 8));

    const payload = extractBitstream(
      sequence,
      candidatesFrom(options.reference, positions, options.alternates),
      byteLength
    );

    if (options.json) {
      console.log(JSON.stringify({ success: true, payload: bytesToHex(payload), bytes: payload.length }, null, 2));
      return;
    }
    console.log(bytesToHex(payload));
  } catch (err) {
    reportError(err, options.json);
  }
}
