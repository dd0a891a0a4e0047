// Minimal leveled logger shared by the validator and the generation driver

export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3
}

export class Logger {
  private level: LogLevel = LogLevel.WARN;

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  isEnabled(level: LogLevel): boolean {
    return level <= this.level;
  }

  error(message: string, ...details: unknown[]): void {
    if (this.isEnabled(LogLevel.ERROR)) {
      console.error(message, ...details);
    }
  }

  warn(message: string, ...details: unknown[]): void {
    if (this.isEnabled(LogLevel.WARN)) {
      console.warn(message, ...details);
    }
  }

  info(message: string, ...details: unknown[]): void {
    if (this.isEnabled(LogLevel.INFO)) {
      console.log(message, ...details);
    }
  }

  debug(message: string, ...details: unknown[]): void {
    if (this.isEnabled(LogLevel.DEBUG)) {
      console.log(message, ...details);
    }
  }
}

export const logger = new Logger();
