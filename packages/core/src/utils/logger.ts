type Level = 'error' | 'warn' | 'info' | 'debug';

// LOG_VERBOSITY: 0 errors only, 1 warnings and info (default), 3 everything
const MIN_VERBOSITY: Record<Level, number> = { error: 0, warn: 1, info: 1, debug: 3 };

const LABEL: Record<Level, string> = {
  error: '[ERROR] ✗✗',
  warn: '[WARN] ✗',
  info: '[INFO]',
  debug: '[DEBUG]',
};

export function parseVerbosity(raw: string | undefined): number {
  const parsed = raw === undefined ? NaN : Number.parseInt(raw, 10);
  return Number.isNaN(parsed) ? 1 : Math.max(0, parsed);
}

/**
 * Console logger shared by the engine and the CLI. Component names go in
 * the message itself ("[Gazetteer] ✓ Loaded ...").
 */
export class Logger {
  private static dayPrinted: string | undefined;

  static enabled(level: Level): boolean {
    return parseVerbosity(process.env.LOG_VERBOSITY) >= MIN_VERBOSITY[level];
  }

  static info(message: string, ...args: unknown[]): void {
    this.write('info', message, args);
  }

  static warn(message: string, ...args: unknown[]): void {
    this.write('warn', message, args);
  }

  static error(message: string, ...args: unknown[]): void {
    this.write('error', message, args);
  }

  static debug(message: string, ...args: unknown[]): void {
    this.write('debug', message, args);
  }

  private static write(level: Level, message: string, args: unknown[]): void {
    if (!this.enabled(level)) {
      return;
    }
    const [day, time] = new Date().toISOString().slice(0, 19).split('T');
    if (this.dayPrinted !== day) {
      console.log(`\n===== jobfit ${day} =====`);
      this.dayPrinted = day;
    }
    const line = `${time} ${LABEL[level]} ${message}`;
    if (level === 'error') {
      console.error(line, ...args);
    } else if (level === 'warn') {
      console.warn(line, ...args);
    } else {
      console.log(line, ...args);
    }
  }
}
