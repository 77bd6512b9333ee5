import dotenv from 'dotenv';
import path from 'path';
import fs from 'fs';

// Load .env from the caller's working directory first, then from the package root
(() => {
  const cwdEnv = path.resolve(process.cwd(), '.env');
  const packageEnv = path.resolve(__dirname, '../../.env');
  if (fs.existsSync(cwdEnv)) {
    dotenv.config({ path: cwdEnv });
  } else if (fs.existsSync(packageEnv)) {
    dotenv.config({ path: packageEnv });
  } else {
    dotenv.config();
  }
})();

export const config = {
  apiBaseUrl: process.env.AGENTREG_API_URL || 'https://registry.example.com/api/v1',
  email: process.env.AGENTREG_EMAIL || undefined,
  apiKey: process.env.AGENTREG_API_KEY || undefined,
  password: process.env.AGENTREG_PASSWORD || undefined,
  logLevel: process.env.LOG_LEVEL || (process.env.NODE_ENV === 'test' ? 'silent' : 'info')
};
