/**
 * Environment variable utilities
 *
 * Reads overrides from the process environment and from .dispatchkit/.env
 */

import * as fs from 'fs';
import * as path from 'path';
import { PROJECT_DIR } from './paths';

const ENV_FILE_NAME = '.env';

/**
 * Parse a .env file content into key-value pairs
 */
export function parseEnvFile(content: string): Record<string, string> {
  const result: Record<string, string> = {};

  for (const line of content.split('\n')) {
    const trimmed = line.trim();

    // Skip empty lines and comments
    if (!trimmed || trimmed.startsWith('#')) {
      continue;
    }

    const eqIndex = trimmed.indexOf('=');
    if (eqIndex > 0) {
      const key = trimmed.substring(0, eqIndex).trim();
      let value = trimmed.substring(eqIndex + 1).trim();

      // Remove surrounding quotes if present
      if ((value.startsWith('"') && value.endsWith('"')) ||
          (value.startsWith("'") && value.endsWith("'"))) {
        value = value.slice(1, -1);
      }

      result[key] = value;
    }
  }

  return result;
}

/**
 * Get the path to the .dispatchkit/.env file
 */
export function getEnvFilePath(projectRoot: string): string {
  return path.join(projectRoot, PROJECT_DIR, ENV_FILE_NAME);
}

/**
 * Load environment variables from .dispatchkit/.env
 * Returns empty object if file doesn't exist
 */
export function loadEnvFile(projectRoot: string): Record<string, string> {
  const envPath = getEnvFilePath(projectRoot);

  if (!fs.existsSync(envPath)) {
    return {};
  }

  return parseEnvFile(fs.readFileSync(envPath, 'utf-8'));
}

/**
 * Get multiple environment variables, merging .dispatchkit/.env with process.env
 * Process.env takes priority over file values
 */
export function getEnvVars(keys: string[], projectRoot: string): Record<string, string> {
  const fileEnv = loadEnvFile(projectRoot);
  const result: Record<string, string> = {};

  for (const key of keys) {
    const value = process.env[key] || fileEnv[key];
    if (value) {
      result[key] = value;
    }
  }

  return result;
}
