import type { CollectionChangeRecord } from '../../change-detection/collection-differ.js';
import type { MapChangeRecord } from '../../change-detection/map-differ.js';
import {
  summarizeCollectionChanges,
  summarizeMapChanges,
} from '../../change-detection/summary.js';

export { printDebug } from '../../utils/logger.js';

export interface OutputOptions {
  json?: boolean;
  debug?: boolean;
}

/**
 * Render a single value for text output
 */
export function formatValue(value: unknown): string {
  if (value === undefined) return 'undefined';
  return JSON.stringify(value);
}

/**
 * Format a sequence diff for output
 */
export function formatCollectionChanges(
  record: CollectionChangeRecord<unknown>,
  options: OutputOptions
): string {
  const summary = summarizeCollectionChanges(record);

  if (options.json) {
    return JSON.stringify({
      summary,
      additions: record.additions,
      moves: record.moves,
      removals: record.removals,
    }, null, 2);
  }

  const lines = [summary];
  record.forEachAddition((a) => {
    lines.push(`  + ${formatValue(a.item)} at ${a.currentIndex}`);
  });
  record.forEachMove((m) => {
    lines.push(`  ~ ${formatValue(m.item)} ${m.previousIndex} -> ${m.currentIndex}`);
  });
  record.forEachRemoval((r) => {
    lines.push(`  - ${formatValue(r.item)} from ${r.previousIndex}`);
  });

  return lines.join('\n');
}

/**
 * Format a key/value diff for output
 */
export function formatMapChanges(
  record: MapChangeRecord<unknown>,
  options: OutputOptions
): string {
  const summary = summarizeMapChanges(record);

  if (options.json) {
    return JSON.stringify({
      summary,
      changes: record.changes,
      additions: record.additions,
      removals: record.removals,
    }, null, 2);
  }

  const lines = [summary];
  record.forEachChange((c) => {
    lines.push(`  ~ ${String(c.key)}: ${formatValue(c.previousValue)} -> ${formatValue(c.currentValue)}`);
  });
  record.forEachAddition((a) => {
    lines.push(`  + ${String(a.key)}: ${formatValue(a.currentValue)}`);
  });
  record.forEachRemoval((r) => {
    lines.push(`  - ${String(r.key)}: ${formatValue(r.previousValue)}`);
  });

  return lines.join('\n');
}

/**
 * Print error message and exit
 */
export function exitWithError(message: string, code: number = 1): never {
  console.error(`Error: ${message}`);
  process.exit(code);
}
