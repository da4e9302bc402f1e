/**
 * Vitest Global Setup
 *
 * Loads environment variables and sets up test configuration
 */

import { config } from 'dotenv';
import { fileURLToPath } from 'url';
import { beforeEach } from 'vitest';
import { clearEnvCache } from '@/config/env';

// Set NODE_ENV to 'test' BEFORE loading dotenv so verbose errors are on
process.env.NODE_ENV = 'test';

// Load .env.test if it exists; nothing in the suite needs real credentials
config({ path: fileURLToPath(new URL('../.env.test', import.meta.url)) });

// Keep log output out of test runs unless asked for
if (!process.env.LOG_LEVEL) {
  process.env.LOG_LEVEL = 'error';
}

beforeEach(() => {
  clearEnvCache();
});
