// src/targets.ts
import { addHours, differenceInSeconds, subHours } from 'date-fns';
import { logger } from './logger.js';
import type { PeakEvent } from './peak_events.js';
import { conditioningRamp, dayTypeOf, targetAt, targetAtHour, type Schedule } from './schedule.js';
import type { HeatPumpMode } from './types.js';
import type { ZoneConfigStore } from './zones.js';

export const PRECONDITIONING_HOURS = 2;
export const RECOVERY_HOURS = 1;

export interface TargetProfile {
  schedule: Schedule;
  flexibility: { upward: number; downward: number };
  preconditioning: boolean;
}

/**
 * Scheduled target adjusted around a peak event:
 * - during the event the target drops by `flexibility.downward`;
 * - in the two hours before it (when preconditioning) it ramps up towards
 *   the highest target of the event hours plus `flexibility.upward`;
 * - in the hour after it, it ramps back to the scheduled target.
 */
export function targetTemperature(profile: TargetProfile, now: Date, event: PeakEvent | null): number | null {
  const { schedule, flexibility } = profile;
  const dayType = dayTypeOf(now);
  const scheduled = targetAt(now.getHours() * 60 + now.getMinutes(), dayType, schedule);
  if (!event) return scheduled;

  const start = event.datedebut;
  const end = event.datefin;

  if (now >= start && now < end) {
    return scheduled === null ? null : scheduled - flexibility.downward;
  }

  const preStart = subHours(start, PRECONDITIONING_HOURS);
  if (profile.preconditioning && now >= preStart && now < start) {
    const firstHour = start.getHours();
    const lastHour = end.getHours();
    let peakTarget = targetAtHour(firstHour, dayType, schedule) ?? 0;
    for (let h = firstHour; h < lastHour; h++) {
      peakTarget = Math.max(peakTarget, targetAtHour(h, dayType, schedule) ?? 0);
    }
    return conditioningRamp(
      differenceInSeconds(start, preStart),
      differenceInSeconds(now, preStart),
      targetAtHour(preStart.getHours(), dayType, schedule) ?? 0,
      flexibility.upward + peakTarget,
    );
  }

  const recoveryEnd = addHours(end, RECOVERY_HOURS);
  if (now >= end && now < recoveryEnd) {
    const after = targetAtHour(recoveryEnd.getHours(), dayType, schedule);
    if (after === null) return scheduled;
    const before = targetAtHour((end.getHours() + 23) % 24, dayType, schedule) ?? 0;
    return conditioningRamp(differenceInSeconds(recoveryEnd, end), differenceInSeconds(now, end), before, after);
  }

  return scheduled;
}

export function zoneTarget(store: ZoneConfigStore, zoneId: string, now: Date, event: PeakEvent | null): number | null {
  const settings = store.zoneSettings(zoneId);
  if (!settings) return null;
  const target = targetTemperature(settings, now, event);
  logger.debug(target === null ? `Zone ${zoneId}: no target temperature found` : `Zone ${zoneId}: target temperature = ${target} °C`);
  return target;
}

/** Heat pump follows its own heating/cooling schedule, without flexibility */
export function heatPumpTarget(
  store: ZoneConfigStore,
  entityId: string,
  mode: HeatPumpMode,
  now: Date,
  event: PeakEvent | null,
): number | null {
  if (mode === 'off') return null;
  const schedule = store.heatPumpSchedule(entityId, mode === 'heat' ? 'heating' : 'cooling');
  return targetTemperature({ schedule, flexibility: { upward: 0, downward: 0 }, preconditioning: false }, now, event);
}
