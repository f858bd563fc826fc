export type BoundingBox = [number, number, number, number]; // [x, y, width, height] in pixels

export interface PixelPoint {
  x: number;
  y: number;
}

export interface GeoPoint {
  latitude: number;  // first mapped component (x-axis of the transform's CRS)
  longitude: number; // second mapped component
}

export interface GeoreferencedCenter extends PixelPoint, GeoPoint {}

// World-file coefficients, lines 1..6 in this order
export interface AffineTransform {
  readonly pixelSizeX: number;
  readonly rotationX: number;
  readonly rotationY: number;
  readonly pixelSizeY: number;
  readonly originX: number;
  readonly originY: number;
}

// Externally owned: `center` ({x,y}[]) and/or `bboxes` (BoundingBox[]) plus
// metadata, labels, scores, masks... which pass through untouched.
export type DetectionRecord = Record<string, unknown>;

export type GeoreferencedRecord = DetectionRecord & { gis: GeoPoint[] };

export type CenterSource =
  | { kind: 'centers'; centers: PixelPoint[] }
  | { kind: 'bboxes'; bboxes: BoundingBox[] }
  | { kind: 'missing' };
