import 'dotenv/config';
import { App } from './app';
import logger from './infrastructure/logger';

try {
    new App().listen();
} catch (error) {
    logger.error('Failed to start server', { error: error instanceof Error ? error.message : String(error) });
    process.exit(1);
}
