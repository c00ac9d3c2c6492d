/**
 * SNP payload embedding
 *
 * Each candidate SNP carries one payload bit (MSB first). The bit selects
 * one of two alleles that differ from the reference base:
 * - two or more usable alternates: alternates[bit]
 * - one usable alternate: bit 0 uses it, bit 1 falls back to the default map
 * - none: the default map below
 */
import { normalizeBase } from '../lib/bases.js';
import type { Base } from '../utils/constants.js';
import { getBit, setBit } from '../utils/helpers.js';

export interface CandidateSnp {
  /** Zero-based index in the sequence */
  position: number;
  /** Expected reference base at that position */
  reference: string;
  /** Known alternate alleles, in preference order */
  alternates?: string;
}

export interface EmbeddedAllele {
  position: number;
  reference: Base;
  allele: Base;
  bit: number;
}

export interface EmbeddingResult {
  sequence: string;
  alleles: EmbeddedAllele[];
}

// Allele pair used for bit 0 / bit 1 when no alternates are known
const DEFAULT_ALLELES: Record<Base, readonly [Base, Base]> = {
  A: ['C', 'G'],
  C: ['A', 'T'],
  G: ['A', 'T'],
  T: ['C', 'G'],
};

/**
 * Number of payload bits the candidates can carry
 */
export function calculateCapacity(candidates: readonly CandidateSnp[]): number {
  return candidates.length;
}

function requireReference(candidate: CandidateSnp): Base {
  const reference = normalizeBase(candidate.reference);
  if (!reference) {
    throw new Error(`Unsupported reference base "${candidate.reference}" at position ${candidate.position}`);
  }
  return reference;
}

/**
 * The two alleles that encode bit 0 and bit 1 for a candidate
 */
export function alleleOptions(candidate: CandidateSnp): readonly [Base, Base] {
  const reference = requireReference(candidate);

  const alternates: Base[] = [];
  for (const symbol of candidate.alternates ?? '') {
    const alt = normalizeBase(symbol);
    if (alt && alt !== reference && !alternates.includes(alt)) {
      alternates.push(alt);
    }
  }

  if (alternates.length >= 2) {
    return [alternates[0], alternates[1]];
  }

  const defaults = DEFAULT_ALLELES[reference];
  if (alternates.length === 1) {
    const fallback = defaults[0] !== alternates[0] ? defaults[0] : defaults[1];
    return [alternates[0], fallback];
  }

  return defaults;
}

function checkPosition(sequence: string, candidate: CandidateSnp): void {
  if (!Number.isInteger(candidate.position) || candidate.position < 0 || candidate.position >= sequence.length) {
    throw new Error(`Candidate SNP position ${candidate.position} outside sequence of length ${sequence.length}`);
  }
}

/**
 * Embed a payload into a sequence at the candidate positions
 */
export function embedBitstream(
  sequence: string,
  candidates: readonly CandidateSnp[],
  payload: Uint8Array
): EmbeddingResult {
  const bitCount = payload.length * 8;
  if (bitCount > calculateCapacity(candidates)) {
    throw new Error(
      `Insufficient candidate SNPs: payload needs ${bitCount}, have ${calculateCapacity(candidates)}`
    );
  }

  const mutated = sequence.split('');
  const alleles: EmbeddedAllele[] = [];

  for (let i = 0; i < bitCount; i++) {
    const candidate = candidates[i];
    checkPosition(sequence, candidate);

    const reference = requireReference(candidate);
    const current = normalizeBase(mutated[candidate.position]);
    if (current !== reference) {
      throw new Error(
        `Reference mismatch at position ${candidate.position}: sequence has "${mutated[candidate.position]}", expected "${reference}"`
      );
    }

    const bit = getBit(payload, i);
    const allele = alleleOptions(candidate)[bit];
    mutated[candidate.position] = allele;
    alleles.push({ position: candidate.position, reference, allele, bit });
  }

  return { sequence: mutated.join(''), alleles };
}

/**
 * Read back `byteLength` bytes embedded at the candidate positions
 */
export function extractBitstream(
  sequence: string,
  candidates: readonly CandidateSnp[],
  byteLength: number
): Uint8Array {
  const bitCount = byteLength * 8;
  if (bitCount > calculateCapacity(candidates)) {
    throw new Error(
      `Insufficient candidate SNPs: ${byteLength} bytes need ${bitCount}, have ${calculateCapacity(candidates)}`
    );
  }

  const payload = new Uint8Array(byteLength);
  for (let i = 0; i < bitCount; i++) {
    const candidate = candidates[i];
    checkPosition(sequence, candidate);

    const observed = normalizeBase(sequence[candidate.position]);
    const bit = observed === null ? -1 : alleleOptions(candidate).indexOf(observed);
    if (bit < 0) {
      throw new Error(
        `Position ${candidate.position} holds "${sequence[candidate.position]}", which encodes no bit`
      );
    }
    setBit(payload, i, bit);
  }

  return payload;
}
