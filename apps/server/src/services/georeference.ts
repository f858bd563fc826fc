import type {
  AffineTransform,
  BoundingBox,
  CenterSource,
  DetectionRecord,
  GeoPoint,
  GeoreferencedCenter,
  GeoreferencedRecord,
  PixelPoint,
} from '../types/geo.js';
import { bboxCenter, pixelToGeo, readWorldFile } from '../utils/affine.js';
import { MalformedDetectionRecordError } from '../utils/errors.js';

const isObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isFiniteNumber = (value: unknown): value is number =>
  typeof value === 'number' && Number.isFinite(value);

function toPixelPoint(value: unknown, index: number, source: string): PixelPoint {
  if (!isObject(value) || !isFiniteNumber(value.x) || !isFiniteNumber(value.y)) {
    throw new MalformedDetectionRecordError(source, `center[${index}] must be an object with numeric x and y`);
  }
  return { x: value.x, y: value.y };
}

function toBoundingBox(value: unknown, index: number, source: string): BoundingBox {
  if (!Array.isArray(value) || value.length !== 4) {
    throw new MalformedDetectionRecordError(source, `bboxes[${index}] must be [x, y, width, height]`);
  }
  const [x, y, w, h]: unknown[] = value;
  if (!isFiniteNumber(x) || !isFiniteNumber(y) || !isFiniteNumber(w) || !isFiniteNumber(h)) {
    throw new MalformedDetectionRecordError(source, `bboxes[${index}] must contain four numbers`);
  }
  return [x, y, w, h];
}

export function parseDetectionRecord(value: unknown, source = '<inline>'): DetectionRecord {
  if (!isObject(value)) {
    throw new MalformedDetectionRecordError(source, 'expected a JSON object');
  }
  return value;
}

/**
 * Decide once, at ingestion, where a record's pixel centers come from.
 * A non-empty `center` list wins; otherwise `bboxes` midpoints are used.
 */
export function resolveCenterSource(record: DetectionRecord, source = '<inline>'): CenterSource {
  const { center, bboxes } = record;

  if (center !== undefined && center !== null) {
    if (!Array.isArray(center)) {
      throw new MalformedDetectionRecordError(source, '"center" must be an array');
    }
    if (center.length > 0) {
      return { kind: 'centers', centers: center.map((c: unknown, i) => toPixelPoint(c, i, source)) };
    }
  }

  if (bboxes !== undefined && bboxes !== null) {
    if (!Array.isArray(bboxes)) {
      throw new MalformedDetectionRecordError(source, '"bboxes" must be an array');
    }
    if (bboxes.length > 0) {
      return { kind: 'bboxes', bboxes: bboxes.map((b: unknown, i) => toBoundingBox(b, i, source)) };
    }
  }

  return { kind: 'missing' };
}

export function centersOf(source: CenterSource): PixelPoint[] {
  switch (source.kind) {
    case 'centers':
      return source.centers;
    case 'bboxes':
      return source.bboxes.map(bboxCenter);
    case 'missing':
      return [];
  }
}

export function georeferenceRecord(
  record: DetectionRecord,
  transform: AffineTransform,
  source = '<inline>'
): GeoreferencedCenter[] {
  const centerSource = resolveCenterSource(record, source);
  if (centerSource.kind === 'missing') {
    console.warn(`[GEOREF] No "center" or "bboxes" data in ${source}; producing no coordinates`);
    return [];
  }
  return centersOf(centerSource).map(p => ({ x: p.x, y: p.y, ...pixelToGeo(transform, p) }));
}

/** Copy of `record` with every original field plus `gis`. */
export function withGis(record: DetectionRecord, results: GeoPoint[]): GeoreferencedRecord {
  return {
    ...structuredClone(record),
    gis: results.map(({ latitude, longitude }) => ({ latitude, longitude })),
  };
}

export function populateGisFromRecord(
  record: DetectionRecord,
  worldFilePath: string,
  source = '<inline>'
): GeoPoint[] {
  const transform = readWorldFile(worldFilePath);
  return georeferenceRecord(record, transform, source)
    .map(({ latitude, longitude }) => ({ latitude, longitude }));
}
