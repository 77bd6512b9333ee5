import pino from 'pino';
import { config } from '../config';

export const logger = pino({
  name: 'agentreg-sdk',
  level: config.logLevel
});

export default logger;
