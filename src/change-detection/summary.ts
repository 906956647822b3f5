/**
 * Change Summaries
 *
 * Turns change lists and structural change records into counts and short
 * human-readable summaries, for logging and CLI output.
 */

import type { CollectionStats, MapStats } from './types.js';
import type { CollectionChangeRecord } from './collection-differ.js';
import type { MapChangeRecord } from './map-differ.js';
import { changesToArray, type ChangeRecord } from './change-record.js';

export function getCollectionStats(record: CollectionChangeRecord<unknown>): CollectionStats {
  return {
    items: record.items.length,
    additions: record.additions.length,
    moves: record.moves.length,
    removals: record.removals.length,
  };
}

export function getMapStats(record: MapChangeRecord<unknown>): MapStats {
  return {
    entries: record.entries.length,
    changes: record.changes.length,
    additions: record.additions.length,
    removals: record.removals.length,
  };
}

function joinParts(parts: string[]): string {
  if (parts.length === 0) {
    return 'No changes';
  }
  return parts.join(', ');
}

/**
 * e.g. "1 addition(s), 2 move(s)"
 */
export function summarizeCollectionChanges(record: CollectionChangeRecord<unknown>): string {
  const parts: string[] = [];

  if (record.additions.length > 0) {
    parts.push(`${record.additions.length} addition(s)`);
  }
  if (record.moves.length > 0) {
    parts.push(`${record.moves.length} move(s)`);
  }
  if (record.removals.length > 0) {
    parts.push(`${record.removals.length} removal(s)`);
  }

  return joinParts(parts);
}

/**
 * e.g. "1 change(s), 1 removal(s)"
 */
export function summarizeMapChanges(record: MapChangeRecord<unknown>): string {
  const parts: string[] = [];

  if (record.changes.length > 0) {
    parts.push(`${record.changes.length} change(s)`);
  }
  if (record.additions.length > 0) {
    parts.push(`${record.additions.length} addition(s)`);
  }
  if (record.removals.length > 0) {
    parts.push(`${record.removals.length} removal(s)`);
  }

  return joinParts(parts);
}

/**
 * Summarize a digest result.
 */
export function summarizeDigest<H>(head: ChangeRecord<H> | null): string {
  const count = changesToArray(head).length;
  return count === 0 ? 'No changes' : `${count} change(s)`;
}
