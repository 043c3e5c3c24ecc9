import './env.js';
import { logger } from '../utils/logger.js';

// Keep test output clean; nothing under test depends on log output
logger.silent = true;
