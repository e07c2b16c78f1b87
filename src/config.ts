// src/config.ts
import fs from 'node:fs';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { parseLevel, type LogThreshold } from './logger.js';

/** --- add-on options (/data/options.json, written by the Supervisor) --- */
const MockPeakEventSchema = z.object({
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD'),
  time_spec: z.string().min(1),
});

export const AddonOptionsSchema = z.object({
  hems_api_base_url: z.string().url().optional(),
  building_id: z.string().min(1).optional(),
  heat_pump_enabled: z.boolean().optional(),
  environment_sensor_id: z.string().min(1).optional(),
  telegraf_config_path: z.string().min(1).optional(),
  // the add-on UI stores an empty value when no mock event is wanted
  gdp_events: z.union([MockPeakEventSchema, z.literal(''), z.null()]).optional(),
}).passthrough();

export type AddonOptions = z.infer<typeof AddonOptionsSchema>;
export type MockPeakEvent = z.infer<typeof MockPeakEventSchema>;

export function loadAddonOptions(file: string): AddonOptions {
  if (!fs.existsSync(file)) return {};
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, 'utf8'));
  } catch (e) {
    throw new ConfigError(`${file}: invalid JSON (${e instanceof Error ? e.message : String(e)})`);
  }
  const parsed = AddonOptionsSchema.safeParse(raw);
  if (!parsed.success) throw ConfigError.fromZod(file, parsed.error);
  return parsed.data;
}

/** --- env --- */
const BoolString = z
  .string()
  .trim()
  .toLowerCase()
  .refine(v => ['true', 'false', '1', '0', 'yes', 'no', 'on', 'off'].includes(v), 'expected a boolean')
  .transform(v => v === 'true' || v === '1' || v === 'yes' || v === 'on');

const SettingsSchema = z.object({
  HEMS_API_BASE_URL: z.string().url(),
  BUILDING_ID: z.string().min(1),
  HEAT_PUMP_ENABLED: BoolString,
  ENVIRONMENT_SENSOR_ID: z.string().min(1),

  BASE_HA_URL: z.string().url().default('http://supervisor/core'),
  SUPERVISOR_TOKEN: z.string().default(''),
  HEAT_PUMP_ENTITY_ID: z.string().startsWith('climate.').default('climate.heat_pump'),

  CONFIG_FILE_PATH: z.string().default('/share/controller/config/config.yaml'),
  HEAT_PUMP_CONFIG_FILE_PATH: z.string().default('/share/controller/config/heat-pump.yaml'),
  MOCK_GDP_EVENTS_PATH: z.string().default('/share/controller/config/peak-events.json'),
  PEAK_EVENTS_SOURCE: z.enum(['hems', 'hydroquebec']).default('hems'),
  HQ_API_URL: z.string().url().default('https://donnees.hydroquebec.com/api/explore/v2.1/catalog/datasets/evenements-pointe/records'),

  LOGS_DIR: z.string().default('/share/controller/logs'),
  LOGLEVEL: z.string().optional(),
  LOG_TO_FILE: BoolString.default('true'),
  DRY_RUN: BoolString.default('false'),

  PORT: z.coerce.number().int().min(0).max(65535).default(8099),
  API_KEYS: z.string().default(''),
});

export interface Settings {
  hemsApiBaseUrl: string;
  buildingId: string;
  heatPumpEnabled: boolean;
  environmentSensorId: string;
  haBaseUrl: string;
  haToken: string;
  heatPumpEntityId: string;
  configFilePath: string;
  heatPumpConfigFilePath: string;
  mockPeakEventsPath: string;
  peakEventsSource: 'hems' | 'hydroquebec';
  hqApiUrl: string;
  mockPeakEvent: MockPeakEvent | null;
  logsDir: string;
  logLevel: LogThreshold;
  logToFile: boolean;
  dryRun: boolean;
  port: number;
  apiKeys: string[];
}

type Env = Record<string, string | undefined>;

/**
 * Resolves settings from the environment, falling back to the add-on options
 * for the four add-on keys. Throws ConfigError listing every bad key.
 */
export function loadSettings(env: Env = process.env, options?: AddonOptions): Settings {
  const opts = options ?? loadAddonOptions(env.OPTIONS_FILE_PATH ?? '/data/options.json');

  const merged: Env = {
    ...env,
    HEMS_API_BASE_URL: nonEmpty(env.HEMS_API_BASE_URL) ?? opts.hems_api_base_url,
    BUILDING_ID: nonEmpty(env.BUILDING_ID) ?? opts.building_id,
    HEAT_PUMP_ENABLED: nonEmpty(env.HEAT_PUMP_ENABLED)
      ?? (opts.heat_pump_enabled === undefined ? undefined : String(opts.heat_pump_enabled)),
    ENVIRONMENT_SENSOR_ID: nonEmpty(env.ENVIRONMENT_SENSOR_ID) ?? opts.environment_sensor_id,
  };
  for (const key of Object.keys(merged)) {
    if (isUnset(merged[key])) delete merged[key];
  }

  const parsed = SettingsSchema.safeParse(merged);
  if (!parsed.success) throw ConfigError.fromZod('settings', parsed.error);
  const s = parsed.data;

  return {
    hemsApiBaseUrl: s.HEMS_API_BASE_URL.replace(/\/+$/, ''),
    buildingId: s.BUILDING_ID,
    heatPumpEnabled: s.HEAT_PUMP_ENABLED,
    environmentSensorId: s.ENVIRONMENT_SENSOR_ID,
    haBaseUrl: s.BASE_HA_URL.replace(/\/+$/, ''),
    haToken: s.SUPERVISOR_TOKEN,
    heatPumpEntityId: s.HEAT_PUMP_ENTITY_ID,
    configFilePath: s.CONFIG_FILE_PATH,
    heatPumpConfigFilePath: s.HEAT_PUMP_CONFIG_FILE_PATH,
    mockPeakEventsPath: s.MOCK_GDP_EVENTS_PATH,
    peakEventsSource: s.PEAK_EVENTS_SOURCE,
    hqApiUrl: s.HQ_API_URL,
    mockPeakEvent: opts.gdp_events ? opts.gdp_events : null,
    logsDir: s.LOGS_DIR,
    logLevel: parseLevel(s.LOGLEVEL),
    logToFile: s.LOG_TO_FILE,
    dryRun: s.DRY_RUN,
    port: s.PORT,
    apiKeys: s.API_KEYS.split(',').map(k => k.trim()).filter(Boolean),
  };
}

/** Blank, or the literal `null` bashio prints for an option left unset */
function isUnset(v: string | undefined): boolean {
  if (v === undefined) return true;
  const t = v.trim();
  return t === '' || t === 'null';
}

function nonEmpty(v: string | undefined): string | undefined {
  return isUnset(v) ? undefined : v;
}
