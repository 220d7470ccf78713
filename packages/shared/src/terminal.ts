// Minimal ANSI helpers (no external deps)

export const ANSI = {
  reset: '\u001B[0m',
  bold: '\u001B[1m',
  dim: '\u001B[2m',
  red: '\u001B[31m',
  green: '\u001B[32m',
  yellow: '\u001B[33m',
  blue: '\u001B[34m',
  magenta: '\u001B[35m',
  cyan: '\u001B[36m',
  brightRed: '\u001B[91m',
  brightBlack: '\u001B[90m',
} as const;

export type AnsiColor = (typeof ANSI)[keyof typeof ANSI];

export function colorize(
  text: string,
  useColor: boolean,
  ...colors: AnsiColor[]
): string {
  if (!useColor || colors.length === 0) return text;
  return `${colors.join('')}${text}${ANSI.reset}`;
}

/**
 * Resolve whether color output is enabled. NO_COLOR wins over FORCE_COLOR,
 * which wins over the explicit preference.
 */
export function shouldUseColors(
  preference?: boolean,
  env: NodeJS.ProcessEnv = process.env
): boolean {
  const noColor = env.NO_COLOR;
  const force = env.FORCE_COLOR;
  if (noColor && noColor !== '0' && noColor !== 'false') return false;
  if (force && force !== '0' && force !== 'false') return true;
  if (preference !== undefined) return preference;
  return process.stdout.isTTY === true;
}

export function wrapText(text: string, width: number, indent = ''): string {
  if (!text) return '';
  const words = text.split(/\s+/).filter(Boolean);
  const lines: string[] = [];
  let line = '';
  for (const word of words) {
    if ((indent + line + (line ? ' ' : '') + word).length > width) {
      if (line) lines.push(indent + line);
      line = word;
    } else {
      line = line ? `${line} ${word}` : word;
    }
  }
  if (line) lines.push(indent + line);
  return lines.join('\n');
}

/**
 * Collapse whitespace and truncate on a word boundary, appending "..."
 * when anything was cut.
 */
export function shorten(text: string, width: number): string {
  const collapsed = text.split(/\s+/).filter(Boolean).join(' ');
  if (collapsed.length <= width) return collapsed;
  const placeholder = '...';
  const words = collapsed.split(' ');
  let out = '';
  for (const word of words) {
    const next = out ? `${out} ${word}` : word;
    if ((next + placeholder).length > width) break;
    out = next;
  }
  return out + placeholder;
}

export function stripAnsi(input: string): string {
  const ansiRe =
    /[\u001B\u009B][[\]()#;?]*(?:\d{1,4}(?:;\d{0,4})*)?[\dA-PR-TZcf-ntqry=><~]/g; // eslint-disable-line no-control-regex
  return input.replace(ansiRe, '');
}
