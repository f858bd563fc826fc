export type GeoreferenceErrorCode =
  | 'ARTIFACT_NOT_FOUND'
  | 'MALFORMED_TRANSFORM_ARTIFACT'
  | 'MALFORMED_DETECTION_RECORD';

export class GeoreferenceError extends Error {
  readonly code: GeoreferenceErrorCode;

  constructor(code: GeoreferenceErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ArtifactNotFoundError extends GeoreferenceError {
  readonly artifactPath: string;

  constructor(artifactPath: string, options?: { cause?: unknown }) {
    super('ARTIFACT_NOT_FOUND', `Artifact not found: ${artifactPath}`, options);
    this.artifactPath = artifactPath;
  }
}

export class MalformedTransformArtifactError extends GeoreferenceError {
  constructor(source: string, detail: string) {
    super('MALFORMED_TRANSFORM_ARTIFACT', `Malformed world file ${source}: ${detail}`);
  }
}

export class MalformedDetectionRecordError extends GeoreferenceError {
  constructor(source: string, detail: string, options?: { cause?: unknown }) {
    super('MALFORMED_DETECTION_RECORD', `Malformed detection record ${source}: ${detail}`, options);
  }
}
