#!/usr/bin/env node

import { Command } from 'commander';
import { readFileSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { createDiffCommand } from './commands/diff.js';
import { createPlaybackCommand } from './commands/playback.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

// Read package.json to get the version
const packageJsonPath = join(__dirname, '../../package.json');
const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf8'));
const version =
  typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson
    ? String(packageJson.version)
    : '0.0.0';

const program = new Command();

program
  .name('change-watch')
  .description('Identity-based change detection and playback tools')
  .version(version);

// Register subcommands
program.addCommand(createDiffCommand());
program.addCommand(createPlaybackCommand());

// Parse arguments
program.parseAsync().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
