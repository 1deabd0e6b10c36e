import { createServer } from './server.js';
import { pipeline } from './context.js';
import { logger } from './logger.js';
import './worker.js';

const app = createServer(pipeline);

app.listen(pipeline.config.port, () => {
  logger.info({ port: pipeline.config.port }, 'Model pipeline API listening');
});
