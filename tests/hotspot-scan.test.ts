import { describe, it, expect } from 'vitest';
import {
  filterStableHotspots,
  findHotspots,
  formatHotspotTable,
  parseVariantSites,
  slidingHotspots,
  toHotspotRecord,
  type SnpSite,
} from '../src/records/hotspot-scan.js';
import { formatHotspots, parseHotspots } from '../src/records/hotspot.js';

const VARIANTS = [
  '##fileformat=VCFv4.2',
  '#CHROM\tPOS\tID\tREF\tALT',
  'chr2\t10\t.\tA\tC',
  'chr1\t100\trs1\tA\tG',
  'chr1\t150\t.\tC\tT,A',
  'short\tline',
  'chr1\t900\t.\tG\tC',
  'chr2\t20\t.\tG\tT',
  'chr1\t1500\t.\tT\tA',
  '',
].join('\n');

function site(position: number, chrom = 'chr1'): SnpSite {
  return { chrom, position, reference: 'A', alternate: 'G' };
}

describe('Variant parsing', () => {
  it('should read sites and skip headers and short lines', () => {
    const sites = parseVariantSites(VARIANTS);

    expect(sites).toHaveLength(6);
    expect(sites[0]).toEqual({ chrom: 'chr2', position: 10, reference: 'A', alternate: 'C' });
    expect(sites[2]).toEqual({ chrom: 'chr1', position: 150, reference: 'C', alternate: 'T,A' });
  });

  it('should stop at the limit', () => {
    expect(parseVariantSites(VARIANTS, 2).map(s => s.position)).toEqual([10, 100]);
  });

  it('should report a bad position with its line', () => {
    expect(() => parseVariantSites('#h\nchr1\t1\t.\tA\tG\nchr1\tx\t.\tA\tG\n')).toThrow(
      'Line 3: invalid position "x"'
    );
  });
});

describe('Fixed-window scan', () => {
  it('should keep windows that reach the threshold, sorted by chromosome', () => {
    const hotspots = findHotspots(parseVariantSites(VARIANTS), { windowSize: 1000, threshold: 2 });

    expect(hotspots.map(h => [h.chrom, h.start, h.end, h.count])).toEqual([
      ['chr1', 0, 1000, 3],
      ['chr2', 0, 1000, 2],
    ]);
    expect(hotspots[0].bases).toBe('AGCTAGC');
    expect(hotspots[0].density).toBe(0.003);
    expect(hotspots[1].bases).toBe('ACGT');
  });

  it('should use 10 kb windows and 15 sites by default', () => {
    const sites = Array.from({ length: 15 }, (_, i) => site(10_000 + i * 100));

    expect(findHotspots(sites).map(h => [h.start, h.end, h.count])).toEqual([[10_000, 20_000, 15]]);
    expect(findHotspots(sites.slice(1))).toEqual([]);
  });

  it('should reject a non-positive window', () => {
    expect(() => findHotspots([], { windowSize: 0 })).toThrow('Window size must be a positive integer, got 0');
  });
});

describe('Sliding-window scan', () => {
  const sites = [site(120), site(5), site(50), site(400), site(95)];

  it('should step by a tenth of the window', () => {
    const hotspots = slidingHotspots(sites, { windowSize: 100, minSnps: 3 });

    expect(hotspots.map(h => h.start)).toEqual([0, 30, 40, 50]);
    expect(hotspots[0].sites.map(s => s.position)).toEqual([5, 50, 95]);
    expect(hotspots[1].sites.map(s => s.position)).toEqual([50, 95, 120]);
    expect(hotspots[1].end).toBe(130);
    expect(hotspots[1].density).toBe(0.03);
  });

  it('should find nothing in an empty input', () => {
    expect(slidingHotspots([], { windowSize: 100, minSnps: 1 })).toEqual([]);
  });

  it('should drop windows overlapping unstable regions', () => {
    const hotspots = slidingHotspots(sites, { windowSize: 100, minSnps: 3 });

    expect(filterStableHotspots(hotspots, [{ start: 0, end: 35 }]).map(h => h.start)).toEqual([40, 50]);
    expect(filterStableHotspots(hotspots, [{ chrom: 'chr2', start: 0, end: 1000 }])).toHaveLength(4);
  });
});

describe('Hotspot output', () => {
  const hotspots = findHotspots(parseVariantSites(VARIANTS), { windowSize: 1000, threshold: 2 });

  it('should turn a window into a sealable record', () => {
    const record = toHotspotRecord(hotspots[0]);

    expect(record).toEqual({ positions: [100, 150, 900], reference: 'ACG', alternate: 'GTC' });
    expect(parseHotspots(formatHotspots([record]))).toEqual([record]);
  });

  it('should write records in the hotspot file format', () => {
    expect(formatHotspots(hotspots.map(toHotspotRecord))).toBe(
      'Hotspot Positions: 100,150,900\nReference: ACG\nAlternate: GTC\n' +
      '\n' +
      'Hotspot Positions: 10,20\nReference: AG\nAlternate: CT\n'
    );
  });

  it('should write a summary table', () => {
    expect(formatHotspotTable(hotspots)).toBe(
      'Chromosome\tStart\tEnd\tSNP_Count\tDNA_String\n' +
      'chr1\t0\t1000\t3\tAGCTAGC\n' +
      'chr2\t0\t1000\t2\tACGT\n'
    );
  });
});
