import { describe, it, expect, afterEach } from 'vitest';
import {
  parseFlag,
  isDebugEnabled,
  getPlaybackLibraryName,
  validateLibraryName,
  validateEnvironment,
} from './environment.js';

describe('environment', () => {
  const originalDebug = process.env.CHANGE_WATCH_DEBUG;
  const originalLibrary = process.env.PLAYBACK_LIBRARY_NAME;

  afterEach(() => {
    // Restore original env
    if (originalDebug !== undefined) {
      process.env.CHANGE_WATCH_DEBUG = originalDebug;
    } else {
      delete process.env.CHANGE_WATCH_DEBUG;
    }
    if (originalLibrary !== undefined) {
      process.env.PLAYBACK_LIBRARY_NAME = originalLibrary;
    } else {
      delete process.env.PLAYBACK_LIBRARY_NAME;
    }
  });

  describe('parseFlag', () => {
    it('accepts common truthy spellings', () => {
      for (const value of ['1', 'true', 'TRUE', ' yes ', 'on']) {
        expect(parseFlag(value)).toBe(true);
      }
    });

    it('treats anything else as false', () => {
      for (const value of [undefined, '', '0', 'false', 'off', 'nope']) {
        expect(parseFlag(value)).toBe(false);
      }
    });
  });

  describe('isDebugEnabled', () => {
    it('reads CHANGE_WATCH_DEBUG', () => {
      process.env.CHANGE_WATCH_DEBUG = 'true';
      expect(isDebugEnabled()).toBe(true);

      delete process.env.CHANGE_WATCH_DEBUG;
      expect(isDebugEnabled()).toBe(false);
    });
  });

  describe('getPlaybackLibraryName', () => {
    it('falls back to "playback_data"', () => {
      delete process.env.PLAYBACK_LIBRARY_NAME;
      expect(getPlaybackLibraryName()).toBe('playback_data');
    });

    it('reads PLAYBACK_LIBRARY_NAME', () => {
      process.env.PLAYBACK_LIBRARY_NAME = 'app.replay_data';
      expect(getPlaybackLibraryName()).toBe('app.replay_data');
    });
  });

  describe('validateLibraryName', () => {
    it('accepts dotted identifiers', () => {
      expect(validateLibraryName('playback_data')).toBeNull();
      expect(validateLibraryName('app.service.data2')).toBeNull();
    });

    it('rejects anything else', () => {
      expect(validateLibraryName('2fast')).toBe(
        'library name "2fast" must be a dotted identifier (letters, digits, underscores)'
      );
      expect(validateLibraryName('a..b')).not.toBeNull();
      expect(validateLibraryName('has space')).not.toBeNull();
    });
  });

  describe('validateEnvironment', () => {
    it('passes with the default configuration', () => {
      delete process.env.PLAYBACK_LIBRARY_NAME;
      expect(() => validateEnvironment()).not.toThrow();
    });

    it('throws for an invalid library name', () => {
      process.env.PLAYBACK_LIBRARY_NAME = 'not valid';
      expect(() => validateEnvironment()).toThrow('Invalid PLAYBACK_LIBRARY_NAME');
    });
  });
});
