import fs from 'node:fs';
import path from 'node:path';
import { globSync } from 'glob';
import { gisOutputDir, type GisConfig } from '../config.js';
import type { DetectionRecord, GeoreferencedCenter } from '../types/geo.js';
import { readWorldFile } from '../utils/affine.js';
import {
  ArtifactNotFoundError,
  GeoreferenceError,
  MalformedDetectionRecordError,
  MalformedTransformArtifactError,
} from '../utils/errors.js';
import { georeferenceRecord, parseDetectionRecord, withGis } from './georeference.js';

export type SkipReason = 'missing-world-file' | 'malformed-world-file' | 'unreadable-record' | 'malformed-record';

export interface SkippedRecord {
  file: string;
  reason: SkipReason;
  message: string;
  error: GeoreferenceError;
}

export interface GisRunSummary {
  total: number;
  written: string[];                                  // output paths
  printed: { file: string; results: GeoreferencedCenter[] }[];
  skipped: SkippedRecord[];
}

export const worldFileNameFor = (recordFile: string, extension: string): string =>
  `${path.basename(recordFile, '.json')}${extension}`;

export const listRecordFiles = (jsonDir: string): string[] =>
  globSync('*.json', { cwd: jsonDir, nodir: true }).sort();

export function readDetectionRecord(recordPath: string): DetectionRecord {
  let text: string;
  try {
    text = fs.readFileSync(recordPath, 'utf8');
  } catch (err) {
    throw new ArtifactNotFoundError(recordPath, { cause: err });
  }
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (err) {
    const detail = err instanceof Error ? err.message : 'invalid JSON';
    throw new MalformedDetectionRecordError(recordPath, detail, { cause: err });
  }
  return parseDetectionRecord(value, recordPath);
}

function skipReasonFor(err: GeoreferenceError, worldFilePath: string): SkipReason {
  if (err instanceof ArtifactNotFoundError) {
    return err.artifactPath === worldFilePath ? 'missing-world-file' : 'unreadable-record';
  }
  if (err instanceof MalformedTransformArtifactError) return 'malformed-world-file';
  return 'malformed-record';
}

/**
 * Pair every detection record in `config.jsonDir` with its world file in
 * `config.inputDir` and attach geographic coordinates. Records that cannot be
 * paired or parsed are skipped and logged; the rest of the batch carries on.
 */
export function populateGis(config: GisConfig): GisRunSummary {
  const files = listRecordFiles(config.jsonDir);
  const summary: GisRunSummary = { total: files.length, written: [], printed: [], skipped: [] };
  const outputDir = gisOutputDir(config);

  console.log(`[GIS] Found ${files.length} detection records in ${config.jsonDir}`);
  if (!config.printResults) {
    fs.mkdirSync(outputDir, { recursive: true });
  }

  let processed = 0;
  for (const file of files) {
    processed++;
    const recordPath = path.join(config.jsonDir, file);
    const worldFilePath = path.join(config.inputDir, worldFileNameFor(file, config.worldFileExtension));

    try {
      const transform = readWorldFile(worldFilePath);
      const record = readDetectionRecord(recordPath);
      const results = georeferenceRecord(record, transform, recordPath);

      if (config.printResults) {
        console.log(`${file}: ${JSON.stringify(results)}`);
        summary.printed.push({ file, results });
      } else {
        const outPath = path.join(outputDir, file);
        const body = JSON.stringify(withGis(record, results), null, 4);
        fs.writeFileSync(outPath, body);
        console.log(`[GIS] Saved ${outPath}`);
        summary.written.push(outPath);
      }
    } catch (err) {
      if (!(err instanceof GeoreferenceError)) throw err;
      const reason = skipReasonFor(err, worldFilePath);
      const log = reason === 'missing-world-file' ? console.warn : console.error;
      log(`[GIS] Skipping ${file} (${reason}): ${err.message}`);
      summary.skipped.push({ file, reason, message: err.message, error: err });
    }

    if (processed % 100 === 0 || processed === files.length) {
      console.log(`[GIS] Processed ${processed}/${files.length} records...`);
    }
  }

  return summary;
}
