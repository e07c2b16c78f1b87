import path from 'node:path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import type { CopModels } from './cop.js';
import { Controller, CycleScheduler, type ControllerSettings } from './loop.js';
import type { PeakEvent, PeakEventSource } from './peak_events.js';
import { FakeDeviceClient, flatSchedule, tmpDir, writeYaml } from './test_support.js';
import type { DevicesState } from './types.js';
import { ZoneConfigStore } from './zones.js';

const HP = 'climate.heat_pump';
const now = new Date(2024, 0, 15, 9);
const copModels: CopModels = { heat: { coefficients: [3] }, cool: { coefficients: [4] } };
const settings: ControllerSettings = {
  environmentSensorId: 'weather.home',
  heatPumpEnabled: true,
  heatPumpEntityId: HP,
  buildingId: 'building-1',
};

const states = (): DevicesState => ({
  'weather.home': { state: 'snowy', last_changed: null, temperature: -5 },
  'sensor.outdoor': { state: '-8', last_changed: null },
  'climate.living': { state: 'heat', last_changed: null, current_temperature: 19, temperature: 20 },
  'climate.office': { state: 'heat', last_changed: null, current_temperature: 19, temperature: 19 },
  'climate.bedroom': { state: 'heat', last_changed: null, current_temperature: 18, temperature: 21 },
  [HP]: { state: 'off', last_changed: null, temperature: 20 },
});

const noEvents: PeakEventSource = { name: 'none', getPeakEvents: async () => [] };

function setup(extra: Record<string, unknown> = {}, peakEvents: PeakEventSource = noEvents) {
  const file = writeYaml(path.join(tmpDir(), 'config.yaml'), {
    ...extra,
    hvac_systems: {
      'climate.living': { heat_pump_impact: 1, schedule: flatSchedule(21) },
      'climate.office': { heat_pump_impact: 0, schedule: flatSchedule(20) },
      [HP]: { heating: { schedule: flatSchedule(23) } },
    },
  });
  const client = new FakeDeviceClient(states(), ['climate.living', 'climate.office', HP, 'weather.home', 'climate.bedroom']);
  const store = new ZoneConfigStore(file);
  const controller = new Controller({ client, store, copModels, peakEvents, settings, now: () => now });
  return { client, store, controller };
}

describe('Controller', () => {
  it('registers newly discovered zones on start', async () => {
    const { controller, store } = setup();
    await controller.start();
    expect(store.zoneIds()).toEqual(['climate.living', 'climate.office', 'climate.bedroom']);
  });

  it('polls discovered devices and the environment sensor', async () => {
    const { controller } = setup();
    expect(controller.polledEntities()).toEqual(['weather.home']);
    await controller.start();
    expect(controller.polledEntities()).toEqual(['climate.living', 'climate.office', HP, 'weather.home', 'climate.bedroom']);
  });

  it('prefers the environment sensor named in config.yaml', () => {
    const { controller } = setup({ environment_sensor_id: 'sensor.outdoor' });
    expect(controller.environmentSensorId()).toBe('sensor.outdoor');
  });

  it('reads, decides and sends only the changes', async () => {
    const { controller, client } = setup();
    await controller.start();
    const report = await controller.runCycle();

    expect(client.commands).toEqual([
      { entityId: HP, hvac_mode: 'heat' },
      { entityId: HP, temperature: 22 },
      { entityId: 'climate.office', temperature: 20 },
    ]);
    expect(report).toEqual({
      started_at: now.toISOString(),
      finished_at: now.toISOString(),
      ok: true,
      error: null,
      outside_temperature: -5,
      heat_pump_mode: 'heat',
      heat_pump_cop: 3,
      peak_event: null,
      actions: {
        heat_pump: { state: 'heat', setpoint: 22 },
        zones: { 'climate.living': 20, 'climate.office': 20, 'climate.bedroom': 21 },
      },
      commands: [
        { entity_id: HP, service: 'set_hvac_mode', hvac_mode: 'heat' },
        { entity_id: HP, service: 'set_temperature', temperature: 22 },
        { entity_id: 'climate.office', service: 'set_temperature', temperature: 20 },
      ],
    });
    expect(controller.lastReport()).toBe(report);
  });

  it('reports the peak event it planned around', async () => {
    const event: PeakEvent = {
      offre: 'CPC-D',
      plagehoraire: 'PM',
      duree: null,
      secteurclient: null,
      datedebut: new Date(2024, 0, 15, 17),
      datefin: new Date(2024, 0, 15, 20),
    };
    const { controller } = setup({}, { name: 'fixed', getPeakEvents: async () => [event] });
    const report = await controller.runCycle();
    expect(report?.peak_event).toEqual({ start: event.datedebut.toISOString(), end: event.datefin.toISOString() });
  });

  it('records a failed cycle instead of throwing', async () => {
    const { controller, client } = setup();
    client.failReads = new Error('Home Assistant unreachable');
    const report = await controller.runCycle();
    expect(report?.ok).toBe(false);
    expect(report?.error).toBe('Home Assistant unreachable');
    expect(report?.commands).toEqual([]);
    expect(client.commands).toEqual([]);
  });

  it('keeps a heat pump with its own entity id out of the zones', async () => {
    const file = path.join(tmpDir(), 'config.yaml');
    const client = new FakeDeviceClient(
      {
        'weather.home': { state: 'snowy', last_changed: null, temperature: -5 },
        'climate.living': { state: 'heat', last_changed: null, current_temperature: 19, temperature: 20 },
        'climate.daikin': { state: 'off', last_changed: null, temperature: 20 },
      },
      ['climate.living', 'climate.daikin', 'weather.home'],
    );
    const store = new ZoneConfigStore(file, 'climate.daikin');
    const controller = new Controller({
      client,
      store,
      copModels,
      peakEvents: noEvents,
      settings: { ...settings, heatPumpEntityId: 'climate.daikin' },
      now: () => now,
    });

    await controller.start();
    await controller.runCycle();

    expect(store.zoneIds()).toEqual(['climate.living']);
    expect(client.commands).toEqual([
      { entityId: 'climate.daikin', hvac_mode: 'heat' },
      { entityId: 'climate.daikin', temperature: 21 },
      { entityId: 'climate.living', temperature: 21 },
    ]);
  });

  it('skips a cycle while another is running', async () => {
    const { controller } = setup();
    const first = controller.runCycle();
    expect(await controller.runCycle()).toBeNull();
    expect((await first)?.ok).toBe(true);
  });
});

describe('CycleScheduler', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('runs at once and then on each five-minute mark', async () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date(2024, 0, 15, 9, 2, 30));
    const task = vi.fn(async () => undefined);
    const scheduler = new CycleScheduler(task);

    scheduler.start();
    expect(task).toHaveBeenCalledTimes(1);
    expect(scheduler.isRunning()).toBe(true);
    expect(scheduler.nextRun()).toEqual(new Date(2024, 0, 15, 9, 5));

    await vi.advanceTimersByTimeAsync(140_000);
    expect(task).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(20_000);
    expect(task).toHaveBeenCalledTimes(2);
    await vi.advanceTimersByTimeAsync(5 * 60_000);
    expect(task).toHaveBeenCalledTimes(3);

    scheduler.stop();
    expect(scheduler.isRunning()).toBe(false);
    await vi.advanceTimersByTimeAsync(15 * 60_000);
    expect(task).toHaveBeenCalledTimes(3);
  });

  it('keeps going after a failing run', async () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date(2024, 0, 15, 9, 0, 30));
    const task = vi.fn(async () => undefined).mockRejectedValueOnce(new Error('boom'));
    const scheduler = new CycleScheduler(task);

    scheduler.start();
    await vi.advanceTimersByTimeAsync(5 * 60_000);
    expect(task).toHaveBeenCalledTimes(2);
    scheduler.stop();
  });

  it('takes another cron pattern', async () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date(2024, 0, 15, 9, 7, 30));
    const scheduler = new CycleScheduler(async () => undefined, '0 */15 * * * *');
    expect(scheduler.nextRun()).toEqual(new Date(2024, 0, 15, 9, 15));
  });
});
