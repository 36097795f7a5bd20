import dotenv from 'dotenv';
import path from 'path';
import { fileURLToPath } from 'url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
// Load root .env if present
dotenv.config({ path: path.join(__dirname, '../../../.env') });
// Fallback to local .env
dotenv.config();

const { createApp } = await import('./app');
const { logger } = await import('./utils/logger');

const port = Number(process.env.PORT) || 8080;
createApp().listen(port, () => {
  logger.info(`Schema Scout API running on ${port}`);
});
