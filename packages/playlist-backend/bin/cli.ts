#!/usr/bin/env tsx
import { existsSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import process from 'node:process';
import { fileURLToPath } from 'node:url';

import { loadEnvFilesWithSummary } from '@vibelist/shared-infrastructure';

import { createCliProgram } from '../src/cli.js';
import { logger } from '../src/infrastructure/logger.js';

const moduleDir = dirname(fileURLToPath(import.meta.url));
const repoEnvPath = resolve(moduleDir, '../../../.env');
const envFiles = ['.env'];
if (existsSync(repoEnvPath)) {
  envFiles.push(repoEnvPath);
}
const envSummary = loadEnvFilesWithSummary({
  files: envFiles,
  cwd: process.cwd(),
  assignToProcess: true,
  override: false,
});
logger.debug('Environment loaded', {
  component: 'cli',
  loadedFiles: envSummary.loadedFiles,
  assignedKeys: envSummary.assignedKeys.length,
});

createCliProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : String(error));
    process.exit(1);
  });
