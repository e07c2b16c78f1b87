// src/zones.ts
import fs from 'node:fs';
import path from 'node:path';
import YAML from 'yaml';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { logger } from './logger.js';
import { defaultSchedule, ScheduleSchema, type Schedule } from './schedule.js';
import type { HvacScheduleKey } from './types.js';

const FlexibilitySchema = z.object({
  upward: z.number().default(0),
  downward: z.number().default(0),
});

export const ZoneSettingsSchema = z.object({
  heat_pump_impact: z.number().min(0).default(0),
  flexibility: FlexibilitySchema.default({}),
  preconditioning: z.boolean().default(false),
  schedule: ScheduleSchema.default({}),
}).passthrough();

const ScheduleBlockSchema = z.object({ schedule: ScheduleSchema.default({}) }).passthrough();

export const HeatPumpSettingsSchema = z.object({
  heating: ScheduleBlockSchema.optional(),
  cooling: ScheduleBlockSchema.optional(),
}).passthrough();

const ControllerConfigSchema = z.object({
  environment_sensor_id: z.string().min(1).optional(),
  hvac_systems: z.record(z.string(), z.record(z.string(), z.unknown())).default({}),
}).passthrough();

export type ZoneSettings = z.infer<typeof ZoneSettingsSchema>;
export type HeatPumpSettings = z.infer<typeof HeatPumpSettingsSchema>;
export type ControllerConfig = z.infer<typeof ControllerConfigSchema>;

export const isHeatPumpKey = (id: string) => id.includes('heat_pump');

export const DEFAULT_HEAT_PUMP_ENTITY_ID = 'climate.heat_pump';

/**
 * config.yaml access. The file is re-read on every call so edits made from
 * the Home Assistant file editor apply on the next control cycle.
 */
export class ZoneConfigStore {
  constructor(readonly file: string, readonly heatPumpEntityId: string = DEFAULT_HEAT_PUMP_ENTITY_ID) {}

  /** The configured heat pump entity, or any key naming a heat pump */
  isHeatPump(id: string): boolean {
    return id === this.heatPumpEntityId || isHeatPumpKey(id);
  }

  read(): ControllerConfig {
    if (!fs.existsSync(this.file)) return { hvac_systems: {} };
    let doc: unknown;
    try {
      doc = YAML.parse(fs.readFileSync(this.file, 'utf8'));
    } catch (e) {
      throw new ConfigError(`${this.file}: ${e instanceof Error ? e.message : String(e)}`);
    }
    const parsed = ControllerConfigSchema.safeParse(doc ?? {});
    if (!parsed.success) throw ConfigError.fromZod(this.file, parsed.error);
    return parsed.data;
  }

  /**
   * Adds every unknown climate entity with default settings. Existing zones
   * are left untouched. Returns the added ids.
   */
  syncZones(entityIds: string[]): string[] {
    const config = this.read();
    const systems = config.hvac_systems;
    const added: string[] = [];

    for (const id of entityIds) {
      if (!id.startsWith('climate.') || id in systems) continue;
      systems[id] = this.isHeatPump(id)
        ? { heating: { schedule: defaultSchedule() }, cooling: { schedule: defaultSchedule() } }
        : {
            heat_pump_impact: 0.0,
            flexibility: { upward: 0.0, downward: 0.0 },
            preconditioning: false,
            schedule: defaultSchedule(),
          };
      added.push(id);
    }

    if (added.length) {
      fs.mkdirSync(path.dirname(this.file), { recursive: true });
      fs.writeFileSync(this.file, YAML.stringify({ ...config, hvac_systems: systems }));
      logger.info(`'${this.file}' updated with new zones: ${added.join(', ')}`);
    } else {
      logger.debug(`'${this.file}' already lists every discovered zone`);
    }
    return added;
  }

  zoneIds(): string[] {
    return Object.keys(this.read().hvac_systems).filter(id => !this.isHeatPump(id));
  }

  zoneSettings(zoneId: string): ZoneSettings | null {
    const raw = this.read().hvac_systems[zoneId];
    if (!raw) return null;
    const parsed = ZoneSettingsSchema.safeParse(raw);
    if (!parsed.success) throw ConfigError.fromZod(`${this.file} [${zoneId}]`, parsed.error);
    return parsed.data;
  }

  heatPumpSchedule(entityId: string, key: HvacScheduleKey): Schedule {
    const raw = this.read().hvac_systems[entityId];
    if (!raw) return {};
    const parsed = HeatPumpSettingsSchema.safeParse(raw);
    if (!parsed.success) throw ConfigError.fromZod(`${this.file} [${entityId}]`, parsed.error);
    return parsed.data[key]?.schedule ?? {};
  }

  /**
   * Zones split by heat pump impact (impact > 0). With the heat pump
   * disabled no zone is impacted and all of them count as plain thermostats.
   */
  selectZones(withImpact: boolean, heatPumpEnabled: boolean): Record<string, number> {
    const out: Record<string, number> = {};
    for (const id of this.zoneIds()) {
      const impact = this.zoneSettings(id)?.heat_pump_impact ?? 0;
      if (!heatPumpEnabled) {
        if (!withImpact) out[id] = 0;
        continue;
      }
      if ((impact > 0) === withImpact) out[id] = impact;
    }
    return out;
  }

  environmentSensorId(): string | null {
    return this.read().environment_sensor_id ?? null;
  }
}
