export {
  isRecord,
  deepClone,
  deepEqual,
  compact,
  unionLists,
  isValidUrl,
} from './utils.js';
export {
  ANSI,
  type AnsiColor,
  colorize,
  shouldUseColors,
  wrapText,
  shorten,
  stripAnsi,
} from './terminal.js';
