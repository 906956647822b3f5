import { Command } from 'commander';
import { writeFileSync } from 'fs';
import { PlaybackRecorder, type PlaybackEntry } from '../../playback/recorder.js';
import {
  getPlaybackLibraryName,
  isDebugEnabled,
  validateEnvironment,
  validateLibraryName,
} from '../../config/environment.js';
import { parseJson, readJsonFile, readStdin } from '../utils/input.js';
import { printDebug, exitWithError } from '../utils/output.js';

/**
 * Validate recorded observations: an array of { key, data } objects.
 * Non-string data is serialized to JSON text.
 */
export function parsePlaybackEntries(raw: unknown): PlaybackEntry[] {
  if (!Array.isArray(raw)) {
    throw new Error('Playback input must be a JSON array of { "key", "data" } objects');
  }

  return raw.map((entry: unknown, index) => {
    if (typeof entry !== 'object' || entry === null || Array.isArray(entry)) {
      throw new Error(`Entry ${index}: expected an object`);
    }
    const key: unknown = Reflect.get(entry, 'key');
    const data: unknown = Reflect.get(entry, 'data');
    if (typeof key !== 'string' || key === '') {
      throw new Error(`Entry ${index}: "key" must be a non-empty string`);
    }
    if (data === undefined) {
      throw new Error(`Entry ${index}: "data" is required`);
    }
    return { key, data: typeof data === 'string' ? data : JSON.stringify(data) };
  });
}

interface PlaybackOptions {
  library?: string;
  out?: string;
  debug?: boolean;
}

export function createPlaybackCommand(): Command {
  return new Command('playback')
    .description('Generate a replay module from recorded key/data observations')
    .argument('[file]', 'JSON file with [{ "key": ..., "data": ... }] (or pipe content to stdin)')
    .option('--library <name>', 'Library name for the generated module')
    .option('--out <file>', 'Write the module to a file instead of stdout')
    .option('--debug', 'Show debug information')
    .addHelpText('after', `
Only the first observation of each key is kept; output follows first-seen order.

Examples:
  change-watch playback recordings.json --out playback_data.dart
  cat recordings.json | change-watch playback --library app.replay
`)
    .action(async (file: string | undefined, options: PlaybackOptions) => {
      try {
        const debug = options.debug || isDebugEnabled();
        let raw: unknown;

        if (file) {
          raw = readJsonFile(file);
        } else {
          if (process.stdin.isTTY) {
            exitWithError('No file specified and no input piped. Use: change-watch playback <file.json> or cat file.json | change-watch playback');
          }
          raw = parseJson(await readStdin(), 'stdin');
        }

        let libraryName: string;
        if (options.library) {
          const libraryError = validateLibraryName(options.library);
          if (libraryError) {
            exitWithError(libraryError);
          }
          libraryName = options.library;
        } else {
          validateEnvironment();
          libraryName = getPlaybackLibraryName();
        }

        const recorder = new PlaybackRecorder({ libraryName });
        const entries = parsePlaybackEntries(raw);
        for (const entry of entries) {
          recorder.record(entry.key, entry.data);
        }

        if (debug) {
          printDebug('Playback', {
            library: libraryName,
            received: entries.length,
            recorded: recorder.size,
          });
        }

        const output = recorder.generate();
        if (options.out) {
          writeFileSync(options.out, output + '\n', 'utf-8');
          console.log(`Wrote ${recorder.size} recording(s) to ${options.out}`);
        } else {
          console.log(output);
        }
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        exitWithError(message);
      }
    });
}
