// src/loop.ts
import { CronJob } from 'cron';
import type { Settings } from './config.js';
import { computeControlActions } from './control.js';
import type { CopModels } from './cop.js';
import { errorMessage } from './errors.js';
import { executeControlActions } from './executor.js';
import type { DeviceClient } from './ha_client.js';
import { logger } from './logger.js';
import { retrievePeakEvent, type PeakEventSource } from './peak_events.js';
import type { CycleReport } from './types.js';
import type { ZoneConfigStore } from './zones.js';

export type ControllerSettings = Pick<Settings, 'environmentSensorId' | 'heatPumpEnabled' | 'heatPumpEntityId' | 'buildingId'>;

export interface ControllerDeps {
  client: DeviceClient;
  store: ZoneConfigStore;
  copModels: CopModels | null;
  peakEvents: PeakEventSource;
  settings: ControllerSettings;
  now?: () => Date;
}

export class Controller {
  private devices: string[] = [];
  private last: CycleReport | null = null;
  private running = false;
  private readonly now: () => Date;

  constructor(private readonly deps: ControllerDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  get buildingId(): string {
    return this.deps.settings.buildingId;
  }

  get store(): ZoneConfigStore {
    return this.deps.store;
  }

  /** Discovers climate/weather entities and records new zones in config.yaml */
  async start(): Promise<string[]> {
    this.devices = await this.deps.client.listDevices();
    logger.info(`Discovered ${this.devices.length} devices: ${this.devices.join(', ')}`);
    this.deps.store.syncZones(this.devices);
    return this.devices;
  }

  environmentSensorId(): string {
    const fromFile = this.deps.store.environmentSensorId();
    return fromFile ?? this.deps.settings.environmentSensorId;
  }

  /** Entities read every cycle: discovered ones plus the environment sensor */
  polledEntities(): string[] {
    const ids = new Set(this.devices);
    ids.add(this.environmentSensorId());
    return [...ids];
  }

  lastReport(): CycleReport | null {
    return this.last;
  }

  /** One read-decide-act pass. Never throws; failures land in the report. */
  async runCycle(): Promise<CycleReport | null> {
    if (this.running) {
      logger.warn('Previous control cycle still running, skipping this tick');
      return null;
    }
    this.running = true;

    const now = this.now();
    const report: CycleReport = {
      started_at: now.toISOString(),
      finished_at: null,
      ok: false,
      error: null,
      outside_temperature: null,
      heat_pump_mode: null,
      heat_pump_cop: null,
      peak_event: null,
      actions: null,
      commands: [],
    };

    try {
      const states = await this.deps.client.getDeviceStates(this.polledEntities());
      const event = await retrievePeakEvent(this.deps.peakEvents, now);
      if (event) {
        report.peak_event = { start: event.datedebut.toISOString(), end: event.datefin.toISOString() };
      }

      const decision = computeControlActions({
        states,
        store: this.deps.store,
        copModels: this.deps.copModels,
        environmentSensorId: this.environmentSensorId(),
        heatPumpEnabled: this.deps.settings.heatPumpEnabled,
        heatPumpEntityId: this.deps.settings.heatPumpEntityId,
        now,
        peakEvent: event,
      });
      report.outside_temperature = decision.outsideTemperature;
      report.heat_pump_mode = decision.mode;
      report.heat_pump_cop = Math.round(decision.cop * 100) / 100;
      report.actions = decision.actions;

      report.commands = await executeControlActions(
        this.deps.client,
        decision.actions,
        states,
        this.deps.settings.heatPumpEntityId,
      );
      report.ok = true;
    } catch (e) {
      report.error = errorMessage(e);
      logger.error('Control cycle failed', e);
    } finally {
      report.finished_at = this.now().toISOString();
      this.last = report;
      this.running = false;
    }
    return report;
  }
}

/** Every five minutes on the wall clock: :00, :05, ... */
export const CYCLE_CRON = '0 */5 * * * *';

/** Runs `task` once at start, then on every `cronTime` tick */
export class CycleScheduler {
  private readonly job: CronJob;

  constructor(private readonly task: () => Promise<unknown>, cronTime: string = CYCLE_CRON) {
    this.job = new CronJob(cronTime, () => void this.run(), null, false);
  }

  start(): void {
    void this.run();
    this.job.start();
  }

  stop(): void {
    this.job.stop();
  }

  isRunning(): boolean {
    return this.job.running;
  }

  nextRun(): Date {
    return this.job.nextDate().toJSDate();
  }

  private async run(): Promise<void> {
    try {
      await this.task();
    } catch (e) {
      logger.error('Scheduled task failed', e);
    }
    if (this.job.running) logger.debug(`Next control cycle at ${this.nextRun().toISOString()}`);
  }
}
