export { ALPHABET, LAYOUT, LIMITS, type Base } from './utils/constants.js';
export {
  baseToDigit,
  digitToBase,
  normalizeBase,
  isBase,
  mod4,
  type Digit,
} from './lib/bases.js';
export { ParityBlock, type CellRegion } from './encode/parity-block.js';
export { buildParityBlock, validateSequences, type BuildError, type BuildResult } from './encode/build.js';
export { protectSequence, chunkSequence, type ProtectOptions, type ProtectResult } from './encode/index.js';
export { analyzeBlock, type BlockAnalysis, type AnalysisResult } from './decode/syndrome.js';
export {
  detectAndCorrect,
  checkBlock,
  planCorrection,
  type ParityOutcome,
  type ParityStatus,
  type UnrecoverableReason,
  type CorrectionPlan,
} from './decode/correct.js';
export { correctBatch, type BatchReport } from './decode/batch.js';
export { recoverSequence, type RecoverResult } from './decode/index.js';
export { formatBlock, formatBlockFile, parseBlockFile, type BlockFile } from './format/block-text.js';
export {
  embedBitstream,
  extractBitstream,
  calculateCapacity,
  alleleOptions,
  type CandidateSnp,
  type EmbeddedAllele,
  type EmbeddingResult,
} from './embed/snp.js';
export {
  sealMetadata,
  openMetadata,
  readEnvelope,
  parseHexKey,
  sealToDna,
  openFromDna,
  type DnaSealedRecord,
} from './lib/crypto.js';
export {
  parseHotspots,
  formatHotspots,
  hotspotPlaintext,
  hotspotMetadata,
  type HotspotRecord,
} from './records/hotspot.js';
export {
  parseVariantSites,
  findHotspots,
  slidingHotspots,
  filterStableHotspots,
  toHotspotRecord,
  formatHotspotTable,
  type SnpSite,
  type HotspotWindow,
  type GenomicRegion,
} from './records/hotspot-scan.js';
export {
  formatSealedTable,
  parseSealedTable,
  isSealedTable,
  sealedRecordId,
  type SealedRow,
} from './records/sealed-table.js';
export { bytesToDna, dnaToBytes } from './utils/helpers.js';
