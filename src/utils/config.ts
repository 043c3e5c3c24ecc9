import os from 'os';
import path from 'path';
import { CanvasCredentials, Config } from '../types/index.js';
import { ConfigError } from './errors.js';

const dataDir = process.env.CANVAS_DIGEST_DATA_DIR || path.join(os.homedir(), '.canvas-digest');

export const config: Config = {
  canvas: {
    userAgent: 'canvas-digest/1.0.0',
    timeout: 20 * 1000,
    maxRetries: 4,
    perPage: 100,
  },
  digest: {
    maxCourses: 2,
    title: 'Courses & Assignments (sorted by due date)',
  },
  logging: {
    level: process.env.LOG_LEVEL || 'info',
  },
  paths: {
    dataDir,
    logFile: path.join(dataDir, 'canvas-digest.log'),
  },
};

export function requireEnv(name: string, env: NodeJS.ProcessEnv = process.env): string {
  const value = env[name];
  if (!value) {
    throw new ConfigError(`Missing environment variable: ${name}`, name);
  }
  return value;
}

export function loadCredentials(env: NodeJS.ProcessEnv = process.env): CanvasCredentials {
  return {
    baseUrl: requireEnv('CANVAS_BASE_URL', env).replace(/\/+$/, ''),
    token: requireEnv('CANVAS_TOKEN', env),
  };
}
