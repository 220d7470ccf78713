/**
 * Diagnostic sink. Library code logs through an injected Logger and stays
 * silent by default; the CLI wires a stderr logger.
 */
export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
};

export interface StderrLoggerOptions {
  /** Emit debug lines (default: TAXOFORGE_DEBUG=1) */
  debug?: boolean;
  /** Line prefix (default: "[taxoforge]") */
  tag?: string;
  write?: (line: string) => void;
}

export function createStderrLogger(options: StderrLoggerOptions = {}): Logger {
  const tag = options.tag ?? '[taxoforge]';
  const debugEnabled = options.debug ?? process.env.TAXOFORGE_DEBUG === '1';
  const write =
    options.write ?? ((line: string) => void process.stderr.write(line));
  const emit = (level: string, message: string): void => {
    write(`${tag} ${level ? `${level}: ` : ''}${message}\n`);
  };
  return {
    debug: (message) => {
      if (debugEnabled) emit('debug', message);
    },
    info: (message) => emit('', message),
    warn: (message) => emit('warn', message),
  };
}
