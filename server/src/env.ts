/**
 * Environment variable loader
 *
 * This file MUST be imported before any other modules that depend on environment variables.
 * It loads variables from .env files in the following priority:
 *   1. Root project .env file
 *   2. Server-specific .env file (server/.env)
 *   3. Process environment (already set variables take precedence)
 */

import { config } from 'dotenv';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';
import { existsSync } from 'fs';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// src -> server and dist -> server are the same hop
const serverDir = resolve(__dirname, '..');
const projectRoot = resolve(serverDir, '..');

// Load .env files in order of precedence (later files don't override earlier ones)
const envPaths = [
  resolve(projectRoot, '.env'),
  resolve(serverDir, '.env'),
];

let loadedFrom: string | null = null;

for (const envPath of envPaths) {
  if (existsSync(envPath)) {
    // Don't override existing env vars
    const result = config({ path: envPath, override: false });
    if (result.parsed && !loadedFrom) {
      loadedFrom = envPath;
    }
  }
}

export { loadedFrom };
