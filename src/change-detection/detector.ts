/**
 * Change Detector
 *
 * The root watch group. collectChanges() runs one digest pass: every record
 * of the tree is checked in registration order and the detected changes
 * are returned as a linked list.
 *
 * Mutating the tree (watch, newGroup, remove) while a pass is running
 * throws DigestInProgressError; it is never queued.
 */

import type { EvalExceptionHandler } from './types.js';
import type { ChangeRecord } from './change-record.js';
import { WatchGroup } from './watch-group.js';
import { DigestState } from './run.js';
import { printDebug } from '../utils/logger.js';

export interface ChangeDetectorOptions {
  /** Log a summary of every digest pass to stderr */
  debug?: boolean;
}

export class ChangeDetector<H = unknown> extends WatchGroup<H> {
  private readonly debug: boolean;

  constructor(options: ChangeDetectorOptions = {}) {
    super(null, new DigestState());
    this.debug = options.debug ?? false;
  }

  /** True while collectChanges() is running. */
  get digesting(): boolean {
    return this.digest.active;
  }

  /**
   * Check every record and link the detected changes in registration order.
   *
   * With an `exceptionHandler`, a record whose check throws is reported to
   * it and the pass continues. Without one, the error propagates and the
   * pass is aborted: no change list is returned, but records checked
   * before the failure have already taken their new values.
   *
   * @returns head of the change list, or null when nothing changed
   * @throws DigestInProgressError when called from inside a running pass
   */
  collectChanges(exceptionHandler?: EvalExceptionHandler<H>): ChangeRecord<H> | null {
    return this.digest.run(() => {
      let head: ChangeRecord<H> | null = null;
      let last: ChangeRecord<H> | null = null;
      let checked = 0;
      let failed = 0;
      let changed = 0;

      for (const record of this.records()) {
        checked++;
        let change: ChangeRecord<H> | null;
        try {
          change = record.check();
        } catch (error) {
          if (!exceptionHandler) {
            throw error;
          }
          failed++;
          exceptionHandler(error, record);
          continue;
        }

        if (change === null) continue;
        changed++;
        if (last === null) {
          head = change;
        } else {
          last.linkNext(change);
        }
        last = change;
      }

      if (this.debug) {
        printDebug('Digest', { checked, changed, failed });
      }
      return head;
    });
  }
}
