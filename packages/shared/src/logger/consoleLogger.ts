import type { HarnessEvent } from '../types/events';
import type { Logger } from './types';

export interface ConsoleLoggerOptions {
  /** Print debug messages (default: true) */
  debug?: boolean;
  /** Print structured events as JSON lines (default: false) */
  events?: boolean;
  /** Send every message to stderr so stdout carries only command output */
  stderr?: boolean;
}

export class ConsoleLogger implements Logger {
  private readonly showDebug: boolean;
  private readonly showEvents: boolean;
  private readonly toStderr: boolean;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.showDebug = options.debug ?? true;
    this.showEvents = options.events ?? false;
    this.toStderr = options.stderr ?? false;
  }

  log(event: HarnessEvent): void {
    if (!this.showEvents) return;
    this.print(JSON.stringify(event));
  }

  trace(event: HarnessEvent, message: string): void {
    if (this.showEvents) {
      this.print(message, JSON.stringify(event));
    } else {
      this.print(message);
    }
  }

  debug(message: string): void {
    if (!this.showDebug) return;
    if (this.toStderr) {
      console.error(message);
    } else {
      console.debug(message);
    }
  }

  info(message: string): void {
    if (this.toStderr) {
      console.error(message);
    } else {
      console.info(message);
    }
  }

  warn(message: string): void {
    console.warn(message);
  }

  error(error: Error, message?: string): void {
    if (message) {
      console.error(message, error);
    } else {
      console.error(error);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ScopedLogger(this, bindings);
  }

  private print(...parts: string[]): void {
    if (this.toStderr) {
      console.error(...parts);
    } else {
      console.log(...parts);
    }
  }
}

class ScopedLogger implements Logger {
  constructor(
    private readonly base: Logger,
    private readonly bindings: Record<string, unknown>,
  ) {}

  log(event: HarnessEvent) {
    return this.base.log(event);
  }

  trace(event: HarnessEvent, message: string) {
    return this.base.trace(event, this.withPrefix(message));
  }

  debug(message: string) {
    return this.base.debug(this.withPrefix(message));
  }

  info(message: string) {
    return this.base.info(this.withPrefix(message));
  }

  warn(message: string) {
    return this.base.warn(this.withPrefix(message));
  }

  error(error: Error, message?: string) {
    return this.base.error(error, message ? this.withPrefix(message) : undefined);
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ScopedLogger(this.base, { ...this.bindings, ...bindings });
  }

  private withPrefix(message: string): string {
    const prefix = Object.entries(this.bindings)
      .map(([k, v]) => `${k}=${String(v)}`)
      .join(' ');
    return prefix ? `[${prefix}] ${message}` : message;
  }
}
