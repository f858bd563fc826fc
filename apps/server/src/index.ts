import { createApp } from './app.js';
import { loadServerConfig } from './config.js';

const config = loadServerConfig();
const app = createApp(config);

app.listen(config.port, () => {
  console.log(`========================================`);
  console.log(`API Server listening on port ${config.port}`);
  console.log(`========================================`);
  console.log(`Health check: http://localhost:${config.port}/api/health`);
  console.log(`Georeference endpoint: http://localhost:${config.port}/api/georeference`);
});
