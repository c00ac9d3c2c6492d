/**
 * CLI Hotspots Command
 * Scans variant sites for SNP-dense windows and writes hotspot records
 */

import { readFileSync } from 'fs';
import {
  filterStableHotspots,
  findHotspots,
  formatHotspotTable,
  parseVariantSites,
  slidingHotspots,
  toHotspotRecord,
} from '../src/records/hotspot-scan.js';
import { formatHotspots } from '../src/records/hotspot.js';
import { HOTSPOTS } from '../src/utils/constants.js';
import { parseIntegerOption, parseRegionList } from './args.js';
import { writeText } from './block-io.js';
import { createLogger, reportError } from './logging.js';

interface HotspotsOptions {
  window?: string;
  threshold?: string;
  sliding?: boolean;
  exclude?: string;
  limit?: string;
  table?: boolean;
  output?: string;
  quiet?: boolean;
  json?: boolean;
}

export function hotspotsCommand(variantPath: string, options: HotspotsOptions): void {
  const log = createLogger(options.quiet || options.json);

  try {
    const limit = options.limit === undefined ? Infinity : parseIntegerOption(options.limit, '--limit');
    const sites = parseVariantSites(readFileSync(variantPath, 'utf-8'), limit);
    log(`Read ${sites.length} SNP site(s) from ${variantPath}`);

    let hotspots = options.sliding
      ? slidingHotspots(sites, {
        windowSize: parseIntegerOption(options.window, '--window', HOTSPOTS.SLIDING_WINDOW_SIZE),
        minSnps: parseIntegerOption(options.threshold, '--threshold', HOTSPOTS.SLIDING_MIN_SNPS),
      })
      : findHotspots(sites, {
        windowSize: parseIntegerOption(options.window, '--window', HOTSPOTS.WINDOW_SIZE),
        threshold: parseIntegerOption(options.threshold, '--threshold', HOTSPOTS.THRESHOLD),
      });

    if (options.exclude !== undefined) {
      const found = hotspots.length;
      hotspots = filterStableHotspots(hotspots, parseRegionList(options.exclude));
      log(`Dropped ${found - hotspots.length} hotspot(s) overlapping excluded regions`);
    }
    log(`Found ${hotspots.length} hotspot(s)`);

    if (options.json) {
      console.log(JSON.stringify({
        success: true,
        sites: sites.length,
        hotspots: hotspots.map(({ sites: windowSites, ...window }) => ({
          ...window,
          positions: windowSites.map(site => site.position),
        })),
      }, null, 2));
      return;
    }

    const text = options.table
      ? formatHotspotTable(hotspots)
      : formatHotspots(hotspots.map(toHotspotRecord));
    writeText(options.output, text);
    if (options.output) {
      log(`Saved to ${options.output}`);
    }
  } catch (err) {
    reportError(err, options.json);
  }
}
