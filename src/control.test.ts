import path from 'node:path';
import { describe, expect, it } from 'vitest';
import {
  computeControlActions,
  heatPumpControl,
  heatPumpCop,
  heatPumpModeFor,
  outsideTemperature,
  thermostatControl,
  zoneMetrics,
} from './control.js';
import type { CopModels } from './cop.js';
import { ControlError } from './errors.js';
import { flatSchedule, tmpDir, writeYaml } from './test_support.js';
import type { DevicesState, ZoneMetrics } from './types.js';
import { ZoneConfigStore } from './zones.js';

const metric = (inside: number, target: number, impact = 1): ZoneMetrics => ({
  inside_temperature: inside,
  target_temperature: target,
  heat_pump_impact: impact,
});

const copModels: CopModels = { heat: { coefficients: [3] }, cool: { coefficients: [4] } };

describe('heatPumpModeFor', () => {
  it('cools above 20 C, heats below 10 C, otherwise stays off', () => {
    expect(heatPumpModeFor(25)).toBe('cool');
    expect(heatPumpModeFor(20)).toBe('off');
    expect(heatPumpModeFor(10)).toBe('off');
    expect(heatPumpModeFor(9.9)).toBe('heat');
  });
});

describe('outsideTemperature', () => {
  const states: DevicesState = {
    'sensor.outdoor': { state: '12.5', last_changed: null },
    'sensor.broken': { state: 'unavailable', last_changed: null },
    'weather.home': { state: 'sunny', last_changed: null, temperature: 5 },
  };

  it('reads sensor entities from their state', () => {
    expect(outsideTemperature(states, 'sensor.outdoor')).toBe(12.5);
    expect(outsideTemperature(states, 'sensor.broken')).toBeNull();
  });

  it('reads weather entities from the temperature attribute', () => {
    expect(outsideTemperature(states, 'weather.home')).toBe(5);
  });

  it('is null for an entity that was not read', () => {
    expect(outsideTemperature(states, 'weather.elsewhere')).toBeNull();
  });
});

describe('heatPumpCop', () => {
  it('evaluates the curve of the active mode', () => {
    expect(heatPumpCop(copModels, 'heat', -5)).toBe(3);
    expect(heatPumpCop(copModels, 'cool', 25)).toBe(4);
  });

  it('is zero when off or without models', () => {
    expect(heatPumpCop(copModels, 'off', 15)).toBe(0);
    expect(heatPumpCop(null, 'heat', -5)).toBe(0);
  });
});

describe('zoneMetrics', () => {
  it('skips zones missing an inside or target temperature', () => {
    const states: DevicesState = {
      'climate.a': { state: 'heat', last_changed: null, current_temperature: 19 },
      'climate.b': { state: 'heat', last_changed: null, current_temperature: null },
      'climate.c': { state: 'heat', last_changed: null, current_temperature: 20 },
    };
    const targets: Record<string, number | null> = { 'climate.a': 21, 'climate.b': 21, 'climate.c': null };
    const out = zoneMetrics({ 'climate.a': 1, 'climate.b': 1, 'climate.c': 0.5 }, states, id => targets[id] ?? null);
    expect(out).toEqual({ 'climate.a': metric(19, 21, 1) });
  });
});

describe('heatPumpControl', () => {
  const cold = { 'climate.a': metric(19, 21), 'climate.b': metric(20, 21) };
  const warm = { 'climate.a': metric(22, 21), 'climate.b': metric(21, 21) };

  it('heats above target with zones one below when the COP is good', () => {
    expect(heatPumpControl(cold, 'heat', 3)).toEqual({
      heat_pump: { state: 'heat', setpoint: 22 },
      zones: { 'climate.a': 20, 'climate.b': 20 },
    });
  });

  it('keeps zones at target as auxiliary heat when the COP is poor', () => {
    expect(heatPumpControl(cold, 'heat', 2)).toEqual({
      heat_pump: { state: 'heat', setpoint: 22 },
      zones: { 'climate.a': 21, 'climate.b': 21 },
    });
  });

  it('treats the COP threshold as good enough', () => {
    expect(heatPumpControl(cold, 'heat', 2.5).zones['climate.a']).toBe(20);
  });

  it('holds target once the zones are warm', () => {
    expect(heatPumpControl(warm, 'heat', 3)).toEqual({
      heat_pump: { state: 'heat', setpoint: 21 },
      zones: { 'climate.a': 19, 'climate.b': 19 },
    });
  });

  it('cools one below target while too warm and parks the zones', () => {
    expect(heatPumpControl(warm, 'cool', 4)).toEqual({
      heat_pump: { state: 'cool', setpoint: 20 },
      zones: { 'climate.a': 5, 'climate.b': 5 },
    });
    expect(heatPumpControl(cold, 'cool', 4).heat_pump).toEqual({ state: 'cool', setpoint: 21 });
  });

  it('hands the zones back when the heat pump is off', () => {
    expect(heatPumpControl(cold, 'off', 0)).toEqual({
      heat_pump: { state: 'off', setpoint: null },
      zones: { 'climate.a': 10, 'climate.b': 10 },
    });
  });

  it('rounds to two decimals', () => {
    const odd = { 'climate.a': metric(19, 21), 'climate.b': metric(19, 20), 'climate.c': metric(19, 20) };
    expect(heatPumpControl(odd, 'heat', 3)).toEqual({
      heat_pump: { state: 'heat', setpoint: 21.33 },
      zones: { 'climate.a': 19.33, 'climate.b': 19.33, 'climate.c': 19.33 },
    });
  });

  it('leaves the setpoint open without metrics', () => {
    expect(heatPumpControl({}, 'heat', 3)).toEqual({ heat_pump: { state: 'heat', setpoint: null }, zones: {} });
  });
});

describe('thermostatControl', () => {
  it('sets each zone to its target', () => {
    expect(thermostatControl({ 'climate.a': metric(18, 20.5, 0) })).toEqual({ 'climate.a': 20.5 });
  });
});

describe('computeControlActions', () => {
  const now = new Date(2024, 0, 15, 9);
  const states: DevicesState = {
    'weather.home': { state: 'snowy', last_changed: null, temperature: -5 },
    'climate.living': { state: 'heat', last_changed: null, current_temperature: 19, temperature: 20 },
    'climate.kitchen': { state: 'heat', last_changed: null, current_temperature: 20, temperature: 20 },
    'climate.office': { state: 'heat', last_changed: null, current_temperature: 19, temperature: 19 },
    'climate.heat_pump': { state: 'off', last_changed: null, temperature: 20 },
  };

  function storeWith(systems: Record<string, unknown>): ZoneConfigStore {
    return new ZoneConfigStore(writeYaml(path.join(tmpDir(), 'config.yaml'), { hvac_systems: systems }));
  }

  const fullStore = () =>
    storeWith({
      'climate.living': { heat_pump_impact: 1, schedule: flatSchedule(21) },
      'climate.kitchen': { heat_pump_impact: 0.5, schedule: flatSchedule(21) },
      'climate.office': { heat_pump_impact: 0, schedule: flatSchedule(20) },
      'climate.heat_pump': { heating: { schedule: flatSchedule(23) }, cooling: { schedule: flatSchedule(24) } },
    });

  const input = (store: ZoneConfigStore, heatPumpEnabled: boolean, s: DevicesState = states) => ({
    states: s,
    store,
    copModels,
    environmentSensorId: 'weather.home',
    heatPumpEnabled,
    heatPumpEntityId: 'climate.heat_pump',
    now,
    peakEvent: null,
  });

  it('drives the heat pump from impacted zones and the rest as thermostats', () => {
    const decision = computeControlActions(input(fullStore(), true));
    expect(decision.mode).toBe('heat');
    expect(decision.cop).toBe(3);
    expect(decision.outsideTemperature).toBe(-5);
    expect(decision.actions).toEqual({
      heat_pump: { state: 'heat', setpoint: 22 },
      zones: { 'climate.living': 20, 'climate.kitchen': 20, 'climate.office': 20 },
    });
  });

  it('treats every zone as a thermostat when the heat pump is disabled', () => {
    expect(computeControlActions(input(fullStore(), false)).actions).toEqual({
      zones: { 'climate.living': 21, 'climate.kitchen': 21, 'climate.office': 20 },
    });
  });

  it('falls back to the heat pump schedule without impacted zones', () => {
    const store = storeWith({
      'climate.office': { heat_pump_impact: 0, schedule: flatSchedule(20) },
      'climate.heat_pump': { heating: { schedule: flatSchedule(23) } },
    });
    expect(computeControlActions(input(store, true)).actions).toEqual({
      heat_pump: { state: 'heat', setpoint: 23 },
      zones: { 'climate.office': 20 },
    });
  });

  it('refuses to decide without an outside temperature', () => {
    const rest = Object.fromEntries(Object.entries(states).filter(([id]) => id !== 'weather.home'));
    expect(() => computeControlActions(input(fullStore(), true, rest))).toThrow(ControlError);
  });
});
