// src/service.ts
import type { Server } from 'node:http';
import type express from 'express';
import { loadSettings, type Settings } from './config.js';
import { ConfigError } from './errors.js';
import { logger } from './logger.js';

/** Pause before retrying startup, to avoid hammering Home Assistant and the HEMS API */
export const RESTART_DELAY_MS = 5 * 60 * 1000;

export type Exit = (code: number) => void;

/** Settings, or null once a configuration error has been reported through `exit(1)` */
export function loadSettingsOrExit(load: () => Settings = () => loadSettings(), exit: Exit = process.exit): Settings | null {
  try {
    return load();
  } catch (e) {
    if (e instanceof ConfigError) {
      logger.error(`Invalid configuration: ${e.message}`);
      exit(1);
      return null;
    }
    throw e;
  }
}

export function serveStatusApi(app: express.Express, port: number, exit: Exit = process.exit): Server {
  const server = app.listen(port);
  server.on('listening', () => logger.info(`Status API listening on :${port}`));
  server.on('error', err => {
    logger.error(`Status API failed to listen on port ${port}`, err);
    exit(1);
  });
  return server;
}

export interface ServiceParts {
  controller: { start(): Promise<unknown> };
  scheduler: { start(): void; stop(): void };
  closeServer: () => void;
  restartDelayMs?: number;
}

/** Startup with retries, then the scheduler, until a signal stops it */
export class Service {
  private stopping = false;
  private wake: (() => void) | null = null;

  constructor(private readonly parts: ServiceParts) {}

  /** Resolves true once the scheduler runs, false when stopped first */
  async run(): Promise<boolean> {
    const delay = this.parts.restartDelayMs ?? RESTART_DELAY_MS;
    while (!this.stopping) {
      try {
        await this.parts.controller.start();
        break;
      } catch (e) {
        logger.error('Controller startup failed', e);
        logger.info(`Waiting ${Math.round(delay / 60_000)} minutes before restarting the module`);
        await this.sleep(delay);
      }
    }
    if (this.stopping) return false;
    this.parts.scheduler.start();
    return true;
  }

  stop(signal: string): void {
    if (this.stopping) return;
    this.stopping = true;
    logger.info(`Received ${signal}, stopping controller`);
    this.parts.scheduler.stop();
    this.wake?.();
    this.parts.closeServer();
  }

  private sleep(ms: number): Promise<void> {
    if (this.stopping) return Promise.resolve();
    return new Promise(resolve => {
      const t = setTimeout(resolve, ms);
      this.wake = () => {
        clearTimeout(t);
        resolve();
      };
    });
  }
}
