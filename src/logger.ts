import 'dotenv/config';
import { pino } from 'pino';

export const logger = pino({
  name: 'model-pipeline',
  level: process.env.LOG_LEVEL ?? 'info',
});
