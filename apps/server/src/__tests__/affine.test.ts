import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { AffineTransform } from '../types/geo.js';
import { bboxCenter, parseWorldFile, pixelToGeo, pixelsToGeo, readWorldFile } from '../utils/affine.js';
import { ArtifactNotFoundError, MalformedTransformArtifactError } from '../utils/errors.js';

const worldFile = (values: number[]) => values.map(String).join('\n') + '\n';

describe('parseWorldFile', () => {
  it('reads the six coefficients in world-file order', () => {
    const t = parseWorldFile('0.5\n0.0\n0.0\n-0.5\n100.0\n200.0\n');
    expect(t).toEqual({
      pixelSizeX: 0.5,
      rotationX: 0,
      rotationY: 0,
      pixelSizeY: -0.5,
      originX: 100,
      originY: 200,
    });
    expect(Object.isFrozen(t)).toBe(true);
  });

  it('accepts CRLF endings, padding and exponents', () => {
    const t = parseWorldFile(' 1e-5 \r\n+0.25\r\n-.5\r\n-1E-5\r\n126.9\r\n37.5\r\n');
    expect(t.pixelSizeX).toBe(0.00001);
    expect(t.rotationX).toBe(0.25);
    expect(t.rotationY).toBe(-0.5);
    expect(t.pixelSizeY).toBe(-0.00001);
    expect(t.originX).toBe(126.9);
    expect(t.originY).toBe(37.5);
  });

  it('ignores lines past the sixth', () => {
    const t = parseWorldFile('1\n2\n3\n4\n5\n6\nsome trailing note\n');
    expect(t.originY).toBe(6);
  });

  it('rejects an artifact with only three lines', () => {
    expect(() => parseWorldFile('0.5\n0.0\n0.0', 'short.tfw')).toThrow(MalformedTransformArtifactError);
    expect(() => parseWorldFile('0.5\n0.0\n0.0', 'short.tfw')).toThrow(/expected 6 lines, found 3/);
  });

  it('rejects a line that is not a number', () => {
    expect(() => parseWorldFile('0.5\nabc\n0\n-0.5\n100\n200')).toThrow(/line 2 is not a number/);
  });

  it('rejects blank and hexadecimal lines', () => {
    expect(() => parseWorldFile('0.5\n\n0\n-0.5\n100\n200')).toThrow(MalformedTransformArtifactError);
    expect(() => parseWorldFile('0x10\n0\n0\n-0.5\n100\n200')).toThrow(MalformedTransformArtifactError);
  });

  it('tags the error with its code', () => {
    try {
      parseWorldFile('1\n2');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(MalformedTransformArtifactError);
      if (err instanceof MalformedTransformArtifactError) {
        expect(err.code).toBe('MALFORMED_TRANSFORM_ARTIFACT');
        expect(err.name).toBe('MalformedTransformArtifactError');
      }
    }
  });
});

describe('readWorldFile', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'affine-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('parses a world file from disk', () => {
    const file = path.join(dir, 'tile.tfw');
    fs.writeFileSync(file, worldFile([0.5, 0, 0, -0.5, 100, 200]));
    expect(readWorldFile(file).originX).toBe(100);
  });

  it('throws ArtifactNotFoundError for a missing path', () => {
    const file = path.join(dir, 'missing.tfw');
    expect(() => readWorldFile(file)).toThrow(ArtifactNotFoundError);
    expect(() => readWorldFile(file)).toThrow(`Artifact not found: ${file}`);
  });

  it('throws ArtifactNotFoundError for a directory', () => {
    expect(() => readWorldFile(dir)).toThrow(ArtifactNotFoundError);
  });

  it('propagates a malformed file', () => {
    const file = path.join(dir, 'short.tfw');
    fs.writeFileSync(file, '1\n2\n3\n');
    expect(() => readWorldFile(file)).toThrow(MalformedTransformArtifactError);
  });
});

describe('pixelToGeo', () => {
  const northUp = parseWorldFile(worldFile([0.5, 0, 0, -0.5, 100, 200]));

  it('maps a pixel through a north-up transform', () => {
    expect(pixelToGeo(northUp, { x: 10, y: 10 })).toEqual({ latitude: 105, longitude: 195 });
  });

  it('applies the rotation terms', () => {
    const rotated = parseWorldFile(worldFile([2, 0.5, 0.25, -3, 10, 20]));
    // 10 + 4*2 + 8*0.5, 20 + 4*0.25 + 8*-3
    expect(pixelToGeo(rotated, { x: 4, y: 8 })).toEqual({ latitude: 22, longitude: -3 });
  });

  it('leaves points unchanged under the identity transform', () => {
    const identity = parseWorldFile(worldFile([1, 0, 0, 1, 0, 0]));
    for (const p of [{ x: 3.25, y: -7.5 }, { x: 1024, y: 768 }, { x: -0.125, y: 42 }]) {
      expect(pixelToGeo(identity, p)).toEqual({ latitude: p.x, longitude: p.y });
    }
  });

  it('is deterministic', () => {
    const t = parseWorldFile(worldFile([0.1, 0.003, -0.002, -0.1, 126.97, 37.56]));
    const p = { x: 123.456, y: 789.012 };
    expect(pixelToGeo(t, p)).toEqual(pixelToGeo(t, p));
  });

  it('is affine in the pixel point', () => {
    const t: AffineTransform = parseWorldFile(worldFile([0.3, 0.07, -0.02, -0.3, 500000, 4100000]));
    const origin = pixelToGeo(t, { x: 0, y: 0 });
    const a = pixelToGeo(t, { x: 12.5, y: 40 });
    const b = pixelToGeo(t, { x: 300, y: 7.25 });
    const sum = pixelToGeo(t, { x: 312.5, y: 47.25 });

    expect(sum.latitude - origin.latitude).toBeCloseTo((a.latitude - origin.latitude) + (b.latitude - origin.latitude), 6);
    expect(sum.longitude - origin.longitude).toBeCloseTo((a.longitude - origin.longitude) + (b.longitude - origin.longitude), 6);
  });

  it('maps a list of points in order', () => {
    expect(pixelsToGeo(northUp, [{ x: 10, y: 10 }, { x: 2, y: 4 }])).toEqual([
      { latitude: 105, longitude: 195 },
      { latitude: 101, longitude: 198 },
    ]);
  });
});

describe('bboxCenter', () => {
  it('returns the box midpoint', () => {
    expect(bboxCenter([10, 20, 4, 6])).toEqual({ x: 12, y: 23 });
  });

  it('keeps fractional centers', () => {
    expect(bboxCenter([1, 2, 3, 5])).toEqual({ x: 2.5, y: 4.5 });
  });
});
