import chalk from 'chalk';

/** Logger interface for workflow observability */
export interface WorkflowLogger {
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  debug(message: string, data?: Record<string, unknown>): void;
}

type Level = 'INFO' | 'WARN' | 'ERROR' | 'DEBUG';

const LEVEL_COLOURS: Record<Level, (text: string) => string> = {
  INFO: chalk.cyan,
  WARN: chalk.yellow,
  ERROR: chalk.red,
  DEBUG: chalk.gray,
};

/** Default console-based logger with session-id prefix */
export class ConsoleWorkflowLogger implements WorkflowLogger {
  private prefix: string;

  constructor(sessionId?: string) {
    this.prefix = sessionId ? `[codeloop:${sessionId.slice(0, 8)}]` : '[codeloop]';
  }

  info(message: string, data?: Record<string, unknown>): void {
    console.log(this.format('INFO', message, data));
  }

  warn(message: string, data?: Record<string, unknown>): void {
    console.warn(this.format('WARN', message, data));
  }

  error(message: string, data?: Record<string, unknown>): void {
    console.error(this.format('ERROR', message, data));
  }

  debug(message: string, data?: Record<string, unknown>): void {
    console.debug(this.format('DEBUG', message, data));
  }

  private format(level: Level, message: string, data?: Record<string, unknown>): string {
    const base = `${this.prefix} ${LEVEL_COLOURS[level](level.padEnd(5))} ${message}`;
    return data ? `${base} ${JSON.stringify(data)}` : base;
  }
}
