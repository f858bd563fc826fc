import fs from 'node:fs';
import type { AffineTransform, BoundingBox, GeoPoint, PixelPoint } from '../types/geo.js';
import { ArtifactNotFoundError, MalformedTransformArtifactError } from './errors.js';

const WORLD_FILE_LINES = 6;
const DECIMAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Parse world-file text: six newline-separated numbers, in order
 * pixel-size-x, rotation-x, rotation-y, pixel-size-y, origin-x, origin-y.
 * Lines past the sixth are ignored.
 */
export const parseWorldFile = (text: string, source = '<inline>'): AffineTransform => {
  const lines = text.replace(/(?:\r?\n)+$/, '').split(/\r?\n/);
  if (lines.length < WORLD_FILE_LINES) {
    throw new MalformedTransformArtifactError(source, `expected ${WORLD_FILE_LINES} lines, found ${lines.length}`);
  }

  const values = lines.slice(0, WORLD_FILE_LINES).map((line, i) => {
    const token = line.trim();
    if (!DECIMAL.test(token)) {
      throw new MalformedTransformArtifactError(source, `line ${i + 1} is not a number: "${token}"`);
    }
    return Number(token);
  });

  const [pixelSizeX, rotationX, rotationY, pixelSizeY, originX, originY] = values;
  return Object.freeze({ pixelSizeX, rotationX, rotationY, pixelSizeY, originX, originY });
};

export const readWorldFile = (worldFilePath: string): AffineTransform => {
  if (!fs.existsSync(worldFilePath) || !fs.statSync(worldFilePath).isFile()) {
    throw new ArtifactNotFoundError(worldFilePath);
  }
  let text: string;
  try {
    text = fs.readFileSync(worldFilePath, 'utf8');
  } catch (err) {
    throw new ArtifactNotFoundError(worldFilePath, { cause: err });
  }
  return parseWorldFile(text, worldFilePath);
};

export const pixelToGeo = (t: AffineTransform, { x, y }: PixelPoint): GeoPoint => ({
  latitude: t.originX + x * t.pixelSizeX + y * t.rotationX,
  longitude: t.originY + x * t.rotationY + y * t.pixelSizeY,
});

export const pixelsToGeo = (t: AffineTransform, points: PixelPoint[]): GeoPoint[] =>
  points.map(p => pixelToGeo(t, p));

export const bboxCenter = ([x, y, w, h]: BoundingBox): PixelPoint => ({ x: x + w / 2, y: y + h / 2 });
