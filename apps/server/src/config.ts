import path from 'node:path';

export interface GisConfig {
  readonly jsonDir: string;            // detection-record JSON files
  readonly inputDir: string;           // world files (.tfw by default)
  readonly outDir: string;
  readonly printResults: boolean;      // log results instead of writing files
  readonly worldFileExtension: string;
}

export interface GisConfigOptions {
  jsonDir: string;
  inputDir: string;
  outDir?: string;
  printResults?: boolean;
  worldFileExtension?: string;
}

export const DEFAULT_OUT_DIR = 'outputs';
export const DEFAULT_WORLD_FILE_EXTENSION = '.tfw';

export function createGisConfig(opts: GisConfigOptions): GisConfig {
  const ext = opts.worldFileExtension || DEFAULT_WORLD_FILE_EXTENSION;
  return Object.freeze({
    jsonDir: path.resolve(opts.jsonDir),
    inputDir: path.resolve(opts.inputDir),
    outDir: path.resolve(opts.outDir || DEFAULT_OUT_DIR),
    printResults: Boolean(opts.printResults),
    worldFileExtension: ext.startsWith('.') ? ext : `.${ext}`,
  });
}

export const gisOutputDir = (config: GisConfig): string => path.join(config.outDir, 'gis');

export interface ServerConfig {
  readonly port: number;
  readonly corsOrigins: string[];
}

const DEFAULT_CORS_ORIGINS = ['http://localhost:5173', 'http://localhost:3000'];

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const port = Number(env.PORT || 4000);
  const corsOrigins = env.CORS_ORIGINS
    ? env.CORS_ORIGINS.split(',').map(s => s.trim()).filter(Boolean)
    : DEFAULT_CORS_ORIGINS;
  return { port: Number.isFinite(port) ? port : 4000, corsOrigins };
}
