import { Command } from 'commander';
import { CollectionDiffer, type CollectionChangeRecord } from '../../change-detection/collection-differ.js';
import { MapDiffer, type MapChangeRecord } from '../../change-detection/map-differ.js';
import { isPlainObject } from '../../utils/helpers.js';
import { isDebugEnabled } from '../../config/environment.js';
import { readJsonFile } from '../utils/input.js';
import {
  formatCollectionChanges,
  formatMapChanges,
  printDebug,
  exitWithError,
} from '../utils/output.js';

export type DocumentDiff =
  | { kind: 'collection'; record: CollectionChangeRecord<unknown> }
  | { kind: 'map'; record: MapChangeRecord<unknown> };

/**
 * Diff two parsed JSON documents: two arrays as sequences, two objects as
 * key/value collections. Values are compared by identity, so only scalars
 * can match across separately parsed documents.
 */
export function diffDocuments(before: unknown, after: unknown): DocumentDiff {
  if (Array.isArray(before) && Array.isArray(after)) {
    const differ = new CollectionDiffer<unknown>(before);
    return { kind: 'collection', record: differ.check(after) };
  }

  if (isPlainObject(before) && isPlainObject(after)) {
    const differ = new MapDiffer<unknown>(before);
    return { kind: 'map', record: differ.check(after) };
  }

  throw new Error('Both documents must be JSON arrays or both must be JSON objects');
}

interface DiffOptions {
  json?: boolean;
  debug?: boolean;
}

export function createDiffCommand(): Command {
  return new Command('diff')
    .description('Diff two JSON arrays (items, moves) or two JSON objects (keys)')
    .argument('<before>', 'JSON file with the previous state')
    .argument('<after>', 'JSON file with the current state')
    .option('--json', 'Output as JSON')
    .option('--debug', 'Show debug information')
    .addHelpText('after', `
Items and values are compared by identity: strings, numbers, booleans and
null match by value, objects and arrays never match across files.

Examples:
  # Which items were added, moved or removed
  change-watch diff before.json after.json

  # JSON output for scripting
  change-watch diff before.json after.json --json
`)
    .action((before: string, after: string, options: DiffOptions) => {
      try {
        const debug = options.debug || isDebugEnabled();
        const previous = readJsonFile(before);
        const current = readJsonFile(after);

        const diff = diffDocuments(previous, current);

        if (debug) {
          printDebug('Diff kind', diff.kind);
        }

        const output = diff.kind === 'collection'
          ? formatCollectionChanges(diff.record, options)
          : formatMapChanges(diff.record, options);
        console.log(output);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        exitWithError(message);
      }
    });
}
