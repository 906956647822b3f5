import * as dotenv from 'dotenv';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { existsSync } from 'fs';
import { DEFAULT_LIBRARY_NAME } from '../playback/recorder.js';

// Project root is two levels up from both src/config and dist/config
const projectRoot = dirname(dirname(dirname(fileURLToPath(import.meta.url))));

// Try to load .env from project root
const envPath = join(projectRoot, '.env');
if (existsSync(envPath)) {
  dotenv.config({ path: envPath });
}

// Dotted identifier, e.g. "playback_data" or "app.replay.data"
const LIBRARY_NAME_REGEX = /^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)*$/;

/**
 * Parse a boolean-ish environment flag ("1", "true", "yes", "on").
 */
export function parseFlag(value: string | undefined): boolean {
  if (!value) return false;
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

/**
 * Whether debug logging is on by default (CHANGE_WATCH_DEBUG).
 */
export function isDebugEnabled(): boolean {
  return parseFlag(process.env.CHANGE_WATCH_DEBUG);
}

/**
 * Library name used in generated playback modules (PLAYBACK_LIBRARY_NAME).
 */
export function getPlaybackLibraryName(): string {
  return process.env.PLAYBACK_LIBRARY_NAME || DEFAULT_LIBRARY_NAME;
}

/**
 * Check a playback library name.
 * @returns Error message if invalid, null if valid
 */
export function validateLibraryName(name: string): string | null {
  if (!LIBRARY_NAME_REGEX.test(name)) {
    return `library name "${name}" must be a dotted identifier (letters, digits, underscores)`;
  }
  return null;
}

/**
 * Validate the environment configuration.
 * Called during CLI initialization.
 */
export function validateEnvironment(): void {
  const libraryError = validateLibraryName(getPlaybackLibraryName());
  if (libraryError) {
    throw new Error(
      `Invalid PLAYBACK_LIBRARY_NAME: ${libraryError}\n` +
      'Set it in the environment or in a .env file in the project root:\n' +
      '   PLAYBACK_LIBRARY_NAME=playback_data'
    );
  }
}
