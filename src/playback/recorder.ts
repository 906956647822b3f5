/**
 * Playback Recorder
 *
 * Collects key/data observations (typically serialized responses) and
 * renders them into a replay module that maps each key to its decoded
 * payload. Only the first observation of a key is kept.
 */

export const DEFAULT_LIBRARY_NAME = 'playback_data';

export interface PlaybackRecorderOptions {
  /** Library name written into the generated module header */
  libraryName?: string;
}

export interface PlaybackEntry {
  key: string;
  data: string;
}

/**
 * Serialize `value` as a double-quoted string literal for the replay module.
 * `$` starts string interpolation in the target language, so it is escaped.
 */
export function toTemplateLiteral(value: string): string {
  return JSON.stringify(value).replace(/\$/g, '\\$');
}

export class PlaybackRecorder {
  private readonly entries: PlaybackEntry[] = [];
  private readonly seen = new Set<string>();
  readonly libraryName: string;

  constructor(options: PlaybackRecorderOptions = {}) {
    this.libraryName = options.libraryName ?? DEFAULT_LIBRARY_NAME;
  }

  /**
   * Store `data` under `key` unless the key was recorded before.
   * @returns true when the pair was stored
   */
  record(key: string, data: string): boolean {
    if (this.seen.has(key)) {
      return false;
    }
    this.seen.add(key);
    this.entries.push({ key, data });
    return true;
  }

  has(key: string): boolean {
    return this.seen.has(key);
  }

  get size(): number {
    return this.entries.length;
  }

  /** Recorded pairs in first-seen order. */
  list(): PlaybackEntry[] {
    return this.entries.map((entry) => ({ ...entry }));
  }

  clear(): void {
    this.entries.length = 0;
    this.seen.clear();
  }

  /**
   * Render the replay module: header, one line per pair in first-seen
   * order, footer.
   */
  generate(): string {
    const lines = [
      `library ${this.libraryName};`,
      '',
      "import 'dart:convert' as convert;",
      '',
      '// Generated by change-watch playback recorder',
      '',
      'Map<String, dynamic> playbackData = {',
    ];

    for (const entry of this.entries) {
      lines.push(
        `  ${toTemplateLiteral(entry.key)}: convert.json.decode(${toTemplateLiteral(entry.data)}),`
      );
    }

    lines.push('};');

    return lines.join('\n');
  }
}
