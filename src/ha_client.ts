// src/ha_client.ts
import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { formatIssues, HomeAssistantError } from './errors.js';
import { logger } from './logger.js';
import type { DevicesState, DeviceState, FieldValue, HeatPumpMode } from './types.js';

/** Reads entity state and issues climate commands */
export interface DeviceClient {
  listDevices(): Promise<string[]>;
  getDeviceStates(entityIds: string[]): Promise<DevicesState>;
  setHvacMode(entityId: string, mode: HeatPumpMode): Promise<void>;
  setTemperature(entityId: string, temperature: number): Promise<void>;
}

const EntityStateSchema = z.object({
  entity_id: z.string(),
  state: z.union([z.string(), z.number()]).nullable(),
  last_changed: z.string().nullish(),
  attributes: z.record(z.string(), z.unknown()).default({}),
}).passthrough();

export type EntityState = z.infer<typeof EntityStateSchema>;

const DISCOVERED_DOMAINS = ['climate.', 'weather.'];

function normalize(v: unknown): FieldValue {
  if (typeof v === 'string') return v.toLowerCase();
  if (typeof v === 'number' && Number.isFinite(v)) return v;
  return null;
}

/** Picks the fields the controller uses for the entity's domain */
export function extractDeviceState(entity: EntityState): DeviceState {
  const out: DeviceState = {
    state: normalize(entity.state),
    last_changed: entity.last_changed ?? null,
  };
  if (entity.entity_id.startsWith('weather.')) {
    out.temperature = normalize(entity.attributes.temperature);
  } else if (entity.entity_id.startsWith('climate.')) {
    out.current_temperature = normalize(entity.attributes.current_temperature);
    out.temperature = normalize(entity.attributes.temperature);
  }
  return out;
}

export interface HomeAssistantOptions {
  baseUrl: string;
  token: string;
  timeoutMs?: number;
}

export class HomeAssistantClient implements DeviceClient {
  private readonly http: AxiosInstance;

  constructor(opts: HomeAssistantOptions) {
    this.http = axios.create({
      baseURL: opts.baseUrl,
      timeout: opts.timeoutMs ?? 10_000,
      headers: {
        Authorization: `Bearer ${opts.token}`,
        'Content-Type': 'application/json',
      },
      // the Supervisor URL must never go through an HTTP proxy
      proxy: false,
    });
  }

  /** climate.* and weather.* entity ids known to Home Assistant */
  async listDevices(): Promise<string[]> {
    const data = await this.request('get', '/api/states');
    const parsed = z.array(EntityStateSchema).safeParse(data);
    if (!parsed.success) {
      throw new HomeAssistantError(`unexpected /api/states payload: ${formatIssues(parsed.error)}`, '/api/states');
    }
    const devices = parsed.data
      .map(e => e.entity_id)
      .filter(id => DISCOVERED_DOMAINS.some(d => id.startsWith(d)));
    logger.debug(`${devices.length} climate devices retrieved from API`);
    return devices;
  }

  async getDeviceStates(entityIds: string[]): Promise<DevicesState> {
    const out: DevicesState = {};
    for (const id of entityIds) {
      if (typeof id !== 'string' || !id) throw new HomeAssistantError('All device IDs must be non-empty strings.', '/api/states');
      out[id] = await this.getDeviceState(id);
    }
    return out;
  }

  async getDeviceState(entityId: string): Promise<DeviceState> {
    const path = `/api/states/${entityId}`;
    const data = await this.request('get', path);
    const parsed = EntityStateSchema.safeParse(data);
    if (!parsed.success) throw new HomeAssistantError(`unexpected state payload: ${formatIssues(parsed.error)}`, path);
    logger.info(`Device ${entityId} state successfully retrieved`);
    return extractDeviceState(parsed.data);
  }

  async setHvacMode(entityId: string, mode: HeatPumpMode): Promise<void> {
    await this.callService('set_hvac_mode', { entity_id: entityId, hvac_mode: mode });
  }

  async setTemperature(entityId: string, temperature: number): Promise<void> {
    await this.callService('set_temperature', { entity_id: entityId, temperature });
  }

  private async callService(service: string, body: { entity_id: string } & Record<string, unknown>): Promise<void> {
    await this.request('post', `/api/services/climate/${service}`, body);
    logger.info(`Device ${body.entity_id} requested to apply action ${JSON.stringify(body)}`);
  }

  private async request(method: 'get' | 'post', path: string, body?: unknown): Promise<unknown> {
    try {
      const res = method === 'get'
        ? await this.http.get<unknown>(path)
        : await this.http.post<unknown>(path, body);
      return res.data;
    } catch (e) {
      if (axios.isAxiosError(e)) {
        const status = e.response?.status ?? null;
        throw new HomeAssistantError(`${method.toUpperCase()} ${path} failed: ${e.message}`, path, status);
      }
      throw e;
    }
  }
}

/** Reads through `inner`, logs commands instead of sending them */
export class DryRunDeviceClient implements DeviceClient {
  constructor(private readonly inner: DeviceClient) {}

  listDevices(): Promise<string[]> {
    return this.inner.listDevices();
  }

  getDeviceStates(entityIds: string[]): Promise<DevicesState> {
    return this.inner.getDeviceStates(entityIds);
  }

  async setHvacMode(entityId: string, mode: HeatPumpMode): Promise<void> {
    logger.info(`[dry-run] ${entityId}: set_hvac_mode ${mode}`);
  }

  async setTemperature(entityId: string, temperature: number): Promise<void> {
    logger.info(`[dry-run] ${entityId}: set_temperature ${temperature}`);
  }
}
