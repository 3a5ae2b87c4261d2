import * as fs from 'fs/promises';
import { dirname } from 'path';
import type { HarnessEvent } from '../types/events';
import type { Logger } from './types';

export interface JsonlLoggerOptions {
  /** Echo messages to stderr instead of stdout */
  stderr?: boolean;
}

export class JsonlLogger implements Logger {
  private filePath: string;
  private readonly bindings: Record<string, unknown>;
  private readonly options: JsonlLoggerOptions;

  constructor(
    filePath: string,
    bindings: Record<string, unknown> = {},
    options: JsonlLoggerOptions = {},
  ) {
    this.filePath = filePath;
    this.bindings = bindings;
    this.options = options;
  }

  async log(event: HarnessEvent): Promise<void> {
    const line = JSON.stringify(event) + '\n';
    try {
      await fs.mkdir(dirname(this.filePath), { recursive: true });
      await fs.appendFile(this.filePath, line, 'utf8');
    } catch (error) {
      // Trace output is best-effort; a session must not fail because of it.
      console.error(`Failed to write to log file at ${this.filePath}`, error);
    }
  }

  async trace(event: HarnessEvent, message: string): Promise<void> {
    await this.log(event);
    this.echo(message);
  }

  debug(message: string): void {
    if (this.options.stderr) {
      console.error(this.withPrefix(message));
    } else {
      console.debug(this.withPrefix(message));
    }
  }

  info(message: string): void {
    this.echo(message);
  }

  warn(message: string): void {
    console.warn(this.withPrefix(message));
  }

  error(error: Error, message?: string): void {
    if (message) {
      console.error(this.withPrefix(message), error);
    } else {
      console.error(error);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    return new JsonlLogger(this.filePath, { ...this.bindings, ...bindings }, this.options);
  }

  private echo(message: string): void {
    if (this.options.stderr) {
      console.error(this.withPrefix(message));
    } else {
      console.info(this.withPrefix(message));
    }
  }

  private withPrefix(message: string): string {
    const prefix = Object.entries(this.bindings)
      .map(([k, v]) => `${k}=${String(v)}`)
      .join(' ');
    return prefix ? `[${prefix}] ${message}` : message;
  }
}
