/*
  Attach geographic coordinates to detection records using per-image world files

  Each <name>.json in --json-dir is paired with <name>.tfw (or --world-ext) in
  --input-dir. Pixel centers come from the record's "center" list, or from the
  midpoints of its "bboxes" when no centers are given. Results are written to
  <out-dir>/gis/<name>.json with a "gis" list of {latitude, longitude}.

  Usage:
    npm run populate-gis -w @geopixel/server -- \
      --json-dir predictions \
      --input-dir tiles \
      --out-dir outputs

    # print instead of writing files
    npm run populate-gis -w @geopixel/server -- --json-dir predictions --input-dir tiles --print
*/

import fs from 'node:fs';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { createGisConfig, DEFAULT_OUT_DIR, DEFAULT_WORLD_FILE_EXTENSION } from '../src/config.js';
import { populateGis } from '../src/services/gis-processor.js';

const argv = yargs(hideBin(process.argv))
  .option('json-dir', { type:'string', demandOption:true, desc:'Folder with detection JSON files ("center" or "bboxes" key)' })
  .option('input-dir', { type:'string', demandOption:true, desc:'Folder with world files (.tfw)' })
  .option('out-dir', { type:'string', default: DEFAULT_OUT_DIR, desc:'Output folder; results go to <out-dir>/gis' })
  .option('print', { type:'boolean', default: false, desc:'Print coordinates instead of writing files' })
  .option('world-ext', { type:'string', default: DEFAULT_WORLD_FILE_EXTENSION, desc:'World file extension (.tfw, .jgw, .pgw, .wld)' })
  .parseSync();

const config = createGisConfig({
  jsonDir: argv['json-dir'],
  inputDir: argv['input-dir'],
  outDir: argv['out-dir'],
  printResults: argv.print,
  worldFileExtension: argv['world-ext'],
});

for (const dir of [config.jsonDir, config.inputDir]) {
  if (!fs.existsSync(dir)) {
    console.error('Error: Directory not found:', dir);
    process.exit(1);
  }
}

const summary = populateGis(config);

console.log(`\nDone! ${summary.total} records, ${summary.written.length + summary.printed.length} georeferenced, ${summary.skipped.length} skipped`);
if (!config.printResults) {
  console.log(`Output directory: ${config.outDir}`);
}
