import { Router, type NextFunction, type Request, type Response } from 'express';
import multer from 'multer';
import { georeferenceRecord, parseDetectionRecord, withGis } from '../services/georeference.js';
import { parseWorldFile } from '../utils/affine.js';
import { ArtifactNotFoundError, GeoreferenceError } from '../utils/errors.js';

export const georeference = Router();

const upload = multer({
  storage: multer.memoryStorage(),
  limits: { fileSize: 10 * 1024 * 1024 } // 10MB
});

// POST /api/georeference
// Body: multipart/form-data with `record` (detection JSON) and `worldfile` (.tfw text)
// Returns: the record with a `gis` list of {latitude, longitude}

georeference.post(
  '/georeference',
  upload.fields([{ name: 'record', maxCount: 1 }, { name: 'worldfile', maxCount: 1 }]),
  (req, res) => {
    const files = req.files;
    const recordFile = files && !Array.isArray(files) ? files.record?.[0] : undefined;
    const worldFile = files && !Array.isArray(files) ? files.worldfile?.[0] : undefined;

    if (!recordFile || !worldFile) {
      console.log('[API] Georeference request missing record or worldfile');
      return res.status(400).json({
        error: 'Missing input',
        message: 'Both "record" and "worldfile" files are required'
      });
    }

    console.log(`[API] Georeferencing ${recordFile.originalname} with ${worldFile.originalname}`);

    try {
      let parsed: unknown;
      try {
        parsed = JSON.parse(recordFile.buffer.toString('utf8'));
      } catch (err) {
        return res.status(400).json({
          error: 'Invalid record',
          message: err instanceof Error ? err.message : 'Record is not valid JSON'
        });
      }

      const record = parseDetectionRecord(parsed, recordFile.originalname);
      const transform = parseWorldFile(worldFile.buffer.toString('utf8'), worldFile.originalname);
      const results = georeferenceRecord(record, transform, recordFile.originalname);
      console.log(`[API] Produced ${results.length} coordinates`);

      res.json(withGis(record, results));
    } catch (error) {
      if (error instanceof GeoreferenceError && !(error instanceof ArtifactNotFoundError)) {
        console.warn(`[API] Rejected input (${error.code}): ${error.message}`);
        return res.status(400).json({ error: error.code, message: error.message });
      }
      console.error('[API] Error:', error);
      res.status(500).json({
        error: 'Georeference failed',
        message: error instanceof Error ? error.message : 'Unknown error'
      });
    }
  }
);

// Upload rejections (unexpected field, extra file, size limit) and anything
// else thrown before the handler answer with JSON instead of express's HTML page
georeference.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
  if (err instanceof multer.MulterError) {
    console.warn(`[API] Rejected upload (${err.code}): ${err.message}`);
    return res.status(400).json({ error: err.code, message: err.message });
  }
  console.error('[API] Error:', err);
  res.status(500).json({
    error: 'Georeference failed',
    message: err instanceof Error ? err.message : 'Unknown error'
  });
});

// GET /api/health

georeference.get('/health', (_, res) => res.json({ ok: true }));
