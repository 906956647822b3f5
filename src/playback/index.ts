export {
  PlaybackRecorder,
  DEFAULT_LIBRARY_NAME,
  toTemplateLiteral,
  type PlaybackRecorderOptions,
  type PlaybackEntry,
} from './recorder.js';
