/**
 * SNP density scanning
 *
 * Finds genomic windows dense in SNPs and turns them into hotspot records.
 * Two scans:
 * - fixed windows: `[k * windowSize, (k + 1) * windowSize)` per chromosome
 * - sliding windows: step of a tenth of the window, starting at 0 and
 *   stopping before the last SNP position
 *
 * Input sites come from tab-separated variant lines (VCF columns
 * CHROM, POS, ID, REF, ALT); positions are taken as written.
 */
import { HOTSPOTS } from '../utils/constants.js';
import type { HotspotRecord } from './hotspot.js';

export interface SnpSite {
  chrom: string;
  position: number;
  reference: string;
  alternate: string;      // Comma-separated when several
}

export interface HotspotWindow {
  chrom: string;
  start: number;
  end: number;            // Exclusive
  count: number;
  density: number;        // SNPs per base
  sites: SnpSite[];
  bases: string;          // REF + ALT bases of every site, concatenated
}

export interface GenomicRegion {
  chrom?: string;         // Any chromosome when omitted
  start: number;
  end: number;
}

export interface FixedScanOptions {
  windowSize?: number;
  threshold?: number;
}

export interface SlidingScanOptions {
  windowSize?: number;
  minSnps?: number;
}

const TABLE_COLUMNS = ['Chromosome', 'Start', 'End', 'SNP_Count', 'DNA_String'];

function checkPositive(value: number, name: string): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new RangeError(`${name} must be a positive integer, got ${value}`);
  }
}

function compareWindows(a: HotspotWindow, b: HotspotWindow): number {
  if (a.chrom !== b.chrom) {
    return a.chrom < b.chrom ? -1 : 1;
  }
  return a.start - b.start;
}

function siteBases(site: SnpSite): string {
  return site.reference + site.alternate.split(',').join('');
}

function toWindow(chrom: string, start: number, windowSize: number, sites: SnpSite[]): HotspotWindow {
  return {
    chrom,
    start,
    end: start + windowSize,
    count: sites.length,
    density: sites.length / windowSize,
    sites,
    bases: sites.map(siteBases).join(''),
  };
}

function groupByChrom(sites: readonly SnpSite[]): Map<string, SnpSite[]> {
  const groups = new Map<string, SnpSite[]>();
  for (const site of sites) {
    const group = groups.get(site.chrom);
    if (group) {
      group.push(site);
    } else {
      groups.set(site.chrom, [site]);
    }
  }
  return groups;
}

/**
 * Read SNP sites from variant lines
 * Header lines ("#") and lines with fewer than five columns are skipped.
 * @param limit Stop after this many sites
 */
export function parseVariantSites(text: string, limit = Infinity): SnpSite[] {
  const sites: SnpSite[] = [];
  const lines = text.replace(/\r\n?/g, '\n').split('\n');

  for (let i = 0; i < lines.length && sites.length < limit; i++) {
    const line = lines[i];
    if (line.length === 0 || line.startsWith('#')) continue;

    const parts = line.trim().split('\t');
    if (parts.length < 5) continue;

    if (!/^\d+$/.test(parts[1])) {
      throw new Error(`Line ${i + 1}: invalid position "${parts[1]}"`);
    }
    sites.push({
      chrom: parts[0],
      position: parseInt(parts[1], 10),
      reference: parts[3],
      alternate: parts[4],
    });
  }

  return sites;
}

/**
 * Fixed-window scan: every window holding at least `threshold` sites
 * Sites keep their input order within a window; windows are sorted by
 * chromosome, then start.
 */
export function findHotspots(sites: readonly SnpSite[], options: FixedScanOptions = {}): HotspotWindow[] {
  const windowSize = options.windowSize ?? HOTSPOTS.WINDOW_SIZE;
  const threshold = options.threshold ?? HOTSPOTS.THRESHOLD;
  checkPositive(windowSize, 'Window size');
  checkPositive(threshold, 'Threshold');

  const windows = new Map<string, { chrom: string; index: number; sites: SnpSite[] }>();
  for (const site of sites) {
    const index = Math.floor(site.position / windowSize);
    const key = `${site.chrom}\t${index}`;
    const window = windows.get(key);
    if (window) {
      window.sites.push(site);
    } else {
      windows.set(key, { chrom: site.chrom, index, sites: [site] });
    }
  }

  return Array.from(windows.values())
    .filter(window => window.sites.length >= threshold)
    .map(window => toWindow(window.chrom, window.index * windowSize, windowSize, window.sites))
    .sort(compareWindows);
}

/**
 * Sliding-window scan with 90% overlap
 */
export function slidingHotspots(sites: readonly SnpSite[], options: SlidingScanOptions = {}): HotspotWindow[] {
  const windowSize = options.windowSize ?? HOTSPOTS.SLIDING_WINDOW_SIZE;
  const minSnps = options.minSnps ?? HOTSPOTS.SLIDING_MIN_SNPS;
  checkPositive(windowSize, 'Window size');
  checkPositive(minSnps, 'Minimum SNP count');

  const step = Math.max(1, Math.floor(windowSize / HOTSPOTS.SLIDING_STEP_DIVISOR));
  const hotspots: HotspotWindow[] = [];

  for (const [chrom, group] of groupByChrom(sites)) {
    const sorted = [...group].sort((a, b) => a.position - b.position);
    const maxPosition = sorted[sorted.length - 1].position;

    // Both edges only move forward as the window slides
    let first = 0;
    let last = 0;
    for (let start = 0; start < maxPosition; start += step) {
      const end = start + windowSize;
      while (first < sorted.length && sorted[first].position < start) first++;
      last = Math.max(last, first);
      while (last < sorted.length && sorted[last].position < end) last++;

      if (last - first >= minSnps) {
        hotspots.push(toWindow(chrom, start, windowSize, sorted.slice(first, last)));
      }
    }
  }

  return hotspots.sort(compareWindows);
}

/**
 * Drop windows overlapping any unstable region
 */
export function filterStableHotspots<T extends { chrom: string; start: number; end: number }>(
  hotspots: readonly T[],
  unstable: readonly GenomicRegion[]
): T[] {
  return hotspots.filter(hotspot => !unstable.some(region =>
    (region.chrom === undefined || region.chrom === hotspot.chrom) &&
    hotspot.start < region.end && hotspot.end > region.start
  ));
}

/**
 * Hotspot record for sealing: site positions, REF bases, first ALT bases
 */
export function toHotspotRecord(window: HotspotWindow): HotspotRecord {
  return {
    positions: window.sites.map(site => site.position),
    reference: window.sites.map(site => site.reference).join(''),
    alternate: window.sites.map(site => site.alternate.split(',')[0]).join(''),
  };
}

/**
 * Tab-separated summary, one row per window
 */
export function formatHotspotTable(hotspots: readonly HotspotWindow[]): string {
  return [TABLE_COLUMNS.join('\t'), ...hotspots.map(h => [h.chrom, h.start, h.end, h.count, h.bases].join('\t'))]
    .map(line => `${line}\n`)
    .join('');
}
