// src/schedule.ts
import { isWeekend } from 'date-fns';
import { z } from 'zod';
import type { DayType } from './types.js';

export const TimeSlotSchema = z.object({ target_temp_C: z.number() }).passthrough();

export const DayScheduleSchema = z.object({
  time_slots: z.record(z.string(), TimeSlotSchema).default({}),
});

export const ScheduleSchema = z.object({
  weekday: DayScheduleSchema.optional(),
  weekend: DayScheduleSchema.optional(),
});

export type Schedule = z.infer<typeof ScheduleSchema>;

/** Default schedule given to zones discovered in Home Assistant */
export function defaultSchedule(): Schedule {
  return {
    weekday: {
      time_slots: {
        '6h00-22h00': { target_temp_C: 21 },
        '22h00-6h00': { target_temp_C: 18 },
      },
    },
    weekend: {
      time_slots: {
        '8h00-23h00': { target_temp_C: 22 },
        '23h00-8h00': { target_temp_C: 19 },
      },
    },
  };
}

export function dayTypeOf(d: Date): DayType {
  return isWeekend(d) ? 'weekend' : 'weekday';
}

const SLOT_RE = /^\s*(\d{1,2})h(\d{2})?\s*-\s*(\d{1,2})h(\d{2})?\s*$/i;

/** "6h00-22h00" -> minutes of day [360, 1320]; null when the key does not parse */
export function parseSlot(range: string): { start: number; end: number } | null {
  const m = SLOT_RE.exec(range);
  if (!m) return null;
  const start = Number(m[1]) * 60 + Number(m[2] ?? 0);
  const end = Number(m[3]) * 60 + Number(m[4] ?? 0);
  if (start > 24 * 60 || end > 24 * 60) return null;
  return { start, end };
}

/**
 * Target of the slot covering `minuteOfDay`. Slots whose start is not before
 * their end wrap over midnight. First matching slot wins.
 */
export function targetAt(minuteOfDay: number, dayType: DayType, schedule: Schedule): number | null {
  const day = schedule[dayType];
  if (!day) return null;
  const m = ((minuteOfDay % 1440) + 1440) % 1440;

  for (const [range, slot] of Object.entries(day.time_slots)) {
    const parsed = parseSlot(range);
    if (!parsed) continue;
    const { start, end } = parsed;
    const hit = start < end ? m >= start && m < end : m >= start || m < end;
    if (hit) return slot.target_temp_C;
  }
  return null;
}

export function targetAtHour(hour: number, dayType: DayType, schedule: Schedule): number | null {
  return targetAt(hour * 60, dayType, schedule);
}

const round2 = (x: number) => Math.round(x * 100) / 100;

/**
 * Linear ramp from `initial` to `target` across `rampingSec`, reaching the
 * target 15 minutes before the window closes.
 */
export function conditioningRamp(rampingSec: number, elapsedSec: number, initial: number, target: number): number {
  const span = rampingSec - 900;
  if (elapsedSec <= 0) return round2(initial);
  if (elapsedSec >= span) return round2(target);
  return round2(initial + (target - initial) * (elapsedSec / span));
}
