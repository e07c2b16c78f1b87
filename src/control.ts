// src/control.ts
import { ControlError } from './errors.js';
import { evaluate, type CopModels } from './cop.js';
import { logger } from './logger.js';
import type { PeakEvent } from './peak_events.js';
import { heatPumpTarget, zoneTarget } from './targets.js';
import type { ControlActions, DevicesState, HeatPumpMode, ZoneMetrics } from './types.js';
import type { ZoneConfigStore } from './zones.js';

export const COOLING_ABOVE_C = 20;
export const HEATING_BELOW_C = 10;
/** At or above this COP the heat pump carries the load without auxiliary heat */
export const HEAT_PUMP_ONLY_MIN_COP = 2.5;
export const ZONE_SETPOINT_WHILE_COOLING = 5;
export const ZONE_SETPOINT_HEAT_PUMP_OFF = 10;

const round2 = (x: number) => Math.round(x * 100) / 100;
const mean = (xs: number[]) => xs.reduce((a, b) => a + b, 0) / xs.length;

function asNumber(v: unknown): number | null {
  if (typeof v === 'number' && Number.isFinite(v)) return v;
  if (typeof v === 'string' && v.trim() !== '') {
    const n = Number(v);
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

/** weather/climate entities report it as an attribute, sensor entities as their state */
export function outsideTemperature(states: DevicesState, sensorId: string): number | null {
  const s = states[sensorId];
  if (!s) return null;
  if (sensorId.startsWith('sensor.')) return asNumber(s.state);
  return asNumber(s.temperature);
}

export function heatPumpModeFor(outsideC: number): HeatPumpMode {
  if (outsideC > COOLING_ABOVE_C) return 'cool';
  if (outsideC < HEATING_BELOW_C) return 'heat';
  return 'off';
}

export function heatPumpCop(models: CopModels | null, mode: HeatPumpMode, outsideC: number): number {
  if (mode === 'off' || !models) return 0;
  return evaluate(models[mode], outsideC);
}

/** Inside and target temperature per zone; zones missing either are skipped */
export function zoneMetrics(
  zones: Record<string, number>,
  states: DevicesState,
  targetOf: (zoneId: string) => number | null,
): Record<string, ZoneMetrics> {
  const out: Record<string, ZoneMetrics> = {};
  for (const [zoneId, impact] of Object.entries(zones)) {
    const inside = asNumber(states[zoneId]?.current_temperature);
    if (inside === null) {
      logger.warn(`Inside temperature for zone ${zoneId} is unknown, skipping control action.`);
      continue;
    }
    const target = targetOf(zoneId);
    if (target === null) {
      logger.warn(`Target temperature for zone ${zoneId} is unknown, skipping control action.`);
      continue;
    }
    out[zoneId] = { inside_temperature: inside, target_temperature: target, heat_pump_impact: impact };
  }
  return out;
}

/**
 * Heat pump and zone setpoints for the zones the heat pump conditions,
 * decided on the mean inside and mean target temperature.
 */
export function heatPumpControl(metrics: Record<string, ZoneMetrics>, mode: HeatPumpMode, cop: number): ControlActions {
  const zoneIds = Object.keys(metrics);
  const actions: ControlActions = { heat_pump: { state: mode, setpoint: null }, zones: {} };
  if (!zoneIds.length) return actions;

  const inside = mean(Object.values(metrics).map(m => m.inside_temperature));
  const target = mean(Object.values(metrics).map(m => m.target_temperature));
  logger.debug(`Mean inside temperature: ${round2(inside)} C, mean target temperature: ${round2(target)} C`);

  const setZones = (v: number) => {
    for (const id of zoneIds) actions.zones[id] = round2(v);
  };
  let setpoint: number | null = null;

  if (mode === 'heat') {
    if (inside < target) {
      setpoint = target + 1;
      // a weak COP leaves the zone heaters at target as auxiliary heat
      setZones(cop >= HEAT_PUMP_ONLY_MIN_COP ? target - 1 : target);
    } else {
      setpoint = target;
      setZones(target - 2);
    }
  } else if (mode === 'cool') {
    setZones(ZONE_SETPOINT_WHILE_COOLING);
    setpoint = inside > target ? target - 1 : target;
  } else {
    setZones(ZONE_SETPOINT_HEAT_PUMP_OFF);
  }

  actions.heat_pump = { state: mode, setpoint: setpoint === null ? null : round2(setpoint) };
  return actions;
}

/** Zones without heat pump impact simply track their target */
export function thermostatControl(metrics: Record<string, ZoneMetrics>): Record<string, number> {
  const out: Record<string, number> = {};
  for (const [zoneId, m] of Object.entries(metrics)) {
    logger.debug(`Zone ${zoneId} - inside temperature: ${m.inside_temperature} C, target temperature: ${m.target_temperature} C`);
    out[zoneId] = m.target_temperature;
  }
  return out;
}

export interface DecisionInput {
  states: DevicesState;
  store: ZoneConfigStore;
  copModels: CopModels | null;
  environmentSensorId: string;
  heatPumpEnabled: boolean;
  heatPumpEntityId: string;
  now: Date;
  peakEvent: PeakEvent | null;
}

export interface Decision {
  actions: ControlActions;
  outsideTemperature: number;
  mode: HeatPumpMode;
  cop: number;
}

export function computeControlActions(input: DecisionInput): Decision {
  const { states, store, now, peakEvent } = input;

  const outside = outsideTemperature(states, input.environmentSensorId);
  if (outside === null) {
    throw new ControlError(`Outside temperature from ${input.environmentSensorId} is unavailable, cannot compute heat pump COP.`);
  }
  const mode = heatPumpModeFor(outside);
  const cop = heatPumpCop(input.copModels, mode, outside);
  logger.debug(`Outside temperature: ${outside} C, heat pump mode: ${mode}, COP: ${cop.toFixed(2)}`);

  const targetOf = (zoneId: string) => zoneTarget(store, zoneId, now, peakEvent);
  let actions: ControlActions = { zones: {} };

  if (input.heatPumpEnabled) {
    const impacted = store.selectZones(true, true);
    logger.debug(`Zones with heat pump impact: ${Object.keys(impacted).join(', ') || 'none'}`);
    if (!Object.keys(impacted).length) {
      logger.warn('No zones with heat pump impact found. Using user preferences for heat pump control.');
      const setpoint = heatPumpTarget(store, input.heatPumpEntityId, mode, now, peakEvent);
      actions.heat_pump = { state: mode, setpoint };
    } else {
      actions = heatPumpControl(zoneMetrics(impacted, states, targetOf), mode, cop);
    }
  } else {
    logger.debug('Heat pump control disabled');
  }

  const others = store.selectZones(false, input.heatPumpEnabled);
  if (!Object.keys(others).length) {
    logger.info('No zones without heat pump impact found, skipping thermostat control logic.');
  } else {
    Object.assign(actions.zones, thermostatControl(zoneMetrics(others, states, targetOf)));
  }

  logger.debug(`Final control actions: ${JSON.stringify(actions)}`);
  return { actions, outsideTemperature: outside, mode, cop };
}
