export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/**
 * Line-oriented logger. Every instance is bound to a module name and writes
 * `[timestamp] [LEVEL] [module] message` lines to a shared sink
 * (stderr unless {@link OutputChannel.configure} says otherwise).
 */
export class OutputChannel {
  private static level: LogLevel = 'info';
  private static sink: NodeJS.WritableStream = process.stderr;

  /**
   * Sets the process-wide threshold and/or destination.
   */
  static configure(options: { level?: LogLevel; sink?: NodeJS.WritableStream }): void {
    if (options.level) {OutputChannel.level = options.level;}
    if (options.sink) {OutputChannel.sink = options.sink;}
  }

  /**
   * @param module Name printed in every line, usually the class or command.
   */
  constructor(private readonly module: string) {}

  debug(msg: string): void {
    this.write('debug', msg);
  }

  info(msg: string): void {
    this.write('info', msg);
  }

  warn(msg: string): void {
    this.write('warn', msg);
  }

  error(msg: string): void {
    this.write('error', msg);
  }

  private write(level: LogLevel, msg: string): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[OutputChannel.level]) {return;}
    const timestamp = new Date().toISOString();
    OutputChannel.sink.write(`[${timestamp}] [${level.toUpperCase()}] [${this.module}] ${msg}\n`);
  }
}
