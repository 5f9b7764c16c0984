import { logger } from '../src/main/utils/logger';

// Suppress log output during tests
logger.silent = true;
