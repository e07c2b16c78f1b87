// src/errors.ts
import type { ZodError } from 'zod';

/** Missing or malformed settings. Fatal at startup. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }

  static fromZod(source: string, err: ZodError): ConfigError {
    return new ConfigError(`${source}: ${formatIssues(err)}`);
  }
}

/** Failed call to the Home Assistant Core API */
export class HomeAssistantError extends Error {
  readonly status: number | null;
  readonly path: string;

  constructor(message: string, path: string, status: number | null = null) {
    super(message);
    this.name = 'HomeAssistantError';
    this.path = path;
    this.status = status;
  }
}

export class PeakEventError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PeakEventError';
  }
}

/** A control cycle cannot decide with the state it has */
export class ControlError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ControlError';
  }
}

export function formatIssues(err: ZodError): string {
  return err.issues
    .map(i => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message))
    .join('; ');
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
