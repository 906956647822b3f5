import { describe, it, expect } from 'vitest';
import { ChangeDetector } from './detector.js';
import { changesToArray } from './change-record.js';
import { GroupRemovedError } from './errors.js';

describe('WatchGroup', () => {
  // Handlers are labels; collecting them shows the digest order
  function handlersOf(detector: ChangeDetector<string>): string[] {
    return [...detector.records()].map((r) => r.handler);
  }

  describe('Registration order', () => {
    it('orders a group\'s own records before its child groups', () => {
      const detector = new ChangeDetector<string>();
      const obj = { v: 1 };

      const child = detector.newGroup();
      child.watch(obj, 'v', 'child-1');
      detector.watch(obj, 'v', 'root-1');
      const grandchild = child.newGroup();
      grandchild.watch(obj, 'v', 'grandchild-1');
      child.watch(obj, 'v', 'child-2');
      detector.watch(obj, 'v', 'root-2');

      expect(handlersOf(detector)).toEqual([
        'root-1',
        'root-2',
        'child-1',
        'child-2',
        'grandchild-1',
      ]);
    });

    it('orders sibling subtrees by creation', () => {
      const detector = new ChangeDetector<string>();
      const obj = { v: 1 };

      const first = detector.newGroup();
      const second = detector.newGroup();
      second.watch(obj, 'v', 'second-1');
      first.newGroup().watch(obj, 'v', 'first-nested');
      first.watch(obj, 'v', 'first-1');
      second.newGroup().watch(obj, 'v', 'second-nested');

      expect(handlersOf(detector)).toEqual([
        'first-1',
        'first-nested',
        'second-1',
        'second-nested',
      ]);
    });

    it('lists only its own subtree', () => {
      const detector = new ChangeDetector<string>();
      const obj = { v: 1 };
      const first = detector.newGroup();
      const second = detector.newGroup();
      first.watch(obj, 'v', 'first');
      second.watch(obj, 'v', 'second');

      expect([...first.records()].map((r) => r.handler)).toEqual(['first']);
      expect([...second.records()].map((r) => r.handler)).toEqual(['second']);
    });

    it('tracks record and group counts', () => {
      const detector = new ChangeDetector<string>();
      const group = detector.newGroup();
      group.watch({ v: 1 }, 'v', 'a');
      group.watch({ v: 1 }, 'v', 'b');
      group.newGroup();

      expect(detector.groupCount).toBe(1);
      expect(group.recordCount).toBe(2);
      expect(group.groupCount).toBe(1);
    });
  });

  describe('remove', () => {
    it('detaches the group, its descendants and their records', () => {
      const detector = new ChangeDetector<string>();
      const obj = { v: 1 };
      detector.watch(obj, 'v', 'root');
      const group = detector.newGroup();
      group.watch(obj, 'v', 'group');
      group.newGroup().watch(obj, 'v', 'nested');
      detector.newGroup().watch(obj, 'v', 'sibling');

      group.remove();

      expect(handlersOf(detector)).toEqual(['root', 'sibling']);
      expect(detector.groupCount).toBe(1);
    });

    it('stops reporting changes from removed records', () => {
      const detector = new ChangeDetector<string>();
      const obj = { v: 1 };
      const group = detector.newGroup();
      const record = group.watch(obj, 'v', 'group');
      group.newGroup().watch(obj, 'v', 'nested');
      detector.watch(obj, 'v', 'root');

      group.remove();
      obj.v = 2;

      expect(changesToArray(detector.collectChanges()).map((c) => c.handler)).toEqual(['root']);
      obj.v = 3;
      expect(changesToArray(detector.collectChanges()).map((c) => c.handler)).toEqual(['root']);
      expect(record.removed).toBe(true);
    });

    it('keeps later registrations in order after removing the last child', () => {
      const detector = new ChangeDetector<string>();
      const obj = { v: 1 };
      const first = detector.newGroup();
      first.watch(obj, 'v', 'first');
      const last = detector.newGroup();
      last.watch(obj, 'v', 'last');

      last.remove();
      detector.newGroup().watch(obj, 'v', 'replacement');
      first.watch(obj, 'v', 'first-2');
      detector.watch(obj, 'v', 'root');

      expect(handlersOf(detector)).toEqual(['root', 'first', 'first-2', 'replacement']);
    });

    it('updates ancestor boundaries when a deeply nested last group goes away', () => {
      const detector = new ChangeDetector<string>();
      const obj = { v: 1 };
      const outer = detector.newGroup();
      outer.watch(obj, 'v', 'outer');
      const inner = outer.newGroup();
      inner.newGroup().watch(obj, 'v', 'deep');

      inner.remove();
      detector.newGroup().watch(obj, 'v', 'after');
      outer.watch(obj, 'v', 'outer-2');

      expect(handlersOf(detector)).toEqual(['outer', 'outer-2', 'after']);
    });

    it('is a no-op the second time, and for descendants of a removed group', () => {
      const detector = new ChangeDetector<string>();
      const group = detector.newGroup();
      const nested = group.newGroup();

      group.remove();
      expect(() => group.remove()).not.toThrow();
      expect(() => nested.remove()).not.toThrow();
      expect(group.removed).toBe(true);
      expect(nested.removed).toBe(true);
    });

    it('rejects registrations on a removed group', () => {
      const detector = new ChangeDetector<string>();
      const group = detector.newGroup();
      const nested = group.newGroup();
      group.remove();

      expect(() => group.watch({ v: 1 }, 'v', 'late')).toThrow(GroupRemovedError);
      expect(() => nested.newGroup()).toThrow(GroupRemovedError);
    });

    it('clears the whole tree when the detector itself is removed', () => {
      const detector = new ChangeDetector<string>();
      const obj = { v: 1 };
      detector.watch(obj, 'v', 'root');
      detector.newGroup().watch(obj, 'v', 'child');

      detector.remove();
      obj.v = 2;

      expect(detector.collectChanges()).toBeNull();
      expect(detector.removed).toBe(true);
    });
  });

  describe('record removal', () => {
    it('removes a single record without touching its siblings', () => {
      const detector = new ChangeDetector<string>();
      const obj = { v: 1 };
      detector.watch(obj, 'v', 'a');
      const b = detector.watch(obj, 'v', 'b');
      detector.watch(obj, 'v', 'c');

      b.remove();

      expect(handlersOf(detector)).toEqual(['a', 'c']);
    });

    it('keeps appending after the new last record when the last one is removed', () => {
      const detector = new ChangeDetector<string>();
      const obj = { v: 1 };
      const group = detector.newGroup();
      group.watch(obj, 'v', 'a');
      const b = group.watch(obj, 'v', 'b');
      detector.newGroup().watch(obj, 'v', 'sibling');

      b.remove();
      group.watch(obj, 'v', 'c');

      expect(handlersOf(detector)).toEqual(['a', 'c', 'sibling']);
    });

    it('keeps the subtree boundary when the tail record is removed', () => {
      const detector = new ChangeDetector<string>();
      const obj = { v: 1 };
      const group = detector.newGroup();
      const only = group.watch(obj, 'v', 'only');

      only.remove();
      detector.newGroup().watch(obj, 'v', 'sibling');
      group.watch(obj, 'v', 'again');

      expect(handlersOf(detector)).toEqual(['again', 'sibling']);
    });
  });
});
