import express from 'express';
import { afterAll, beforeAll, describe, expect, it, vi } from 'vitest';
import { HomeAssistantError } from './errors.js';
import { DryRunDeviceClient, extractDeviceState, HomeAssistantClient } from './ha_client.js';
import { logger } from './logger.js';
import { FakeDeviceClient, listen, type RunningServer } from './test_support.js';

const entities = [
  {
    entity_id: 'climate.living',
    state: 'heat',
    last_changed: '2024-01-15T09:00:00+00:00',
    attributes: { current_temperature: 19.5, temperature: 21, hvac_modes: ['off', 'heat'] },
  },
  {
    entity_id: 'climate.heat_pump',
    state: 'Cool',
    last_changed: '2024-01-15T08:00:00+00:00',
    attributes: { current_temperature: 22, temperature: 23 },
  },
  {
    entity_id: 'weather.home',
    state: 'Sunny',
    last_changed: '2024-01-15T07:00:00+00:00',
    attributes: { temperature: -3 },
  },
  { entity_id: 'sensor.outdoor', state: '12.5', last_changed: '2024-01-15T06:00:00+00:00', attributes: {} },
  { entity_id: 'light.kitchen', state: 'on', last_changed: null, attributes: {} },
];

interface ServiceCall {
  service: string;
  body: unknown;
  auth: string | undefined;
}

describe('HomeAssistantClient', () => {
  const calls: ServiceCall[] = [];
  let server: RunningServer;
  let client: HomeAssistantClient;

  beforeAll(async () => {
    const app = express();
    app.use(express.json());
    app.get('/api/states', (_req, res) => {
      res.json(entities);
    });
    app.get('/api/states/:id', (req, res) => {
      const e = entities.find(x => x.entity_id === req.params.id);
      if (!e) return res.status(404).json({ message: 'Entity not found.' });
      return res.json(e);
    });
    app.post('/api/services/climate/:service', (req, res) => {
      calls.push({ service: req.params.service, body: req.body, auth: req.header('authorization') });
      res.json([]);
    });
    server = await listen(app);
    client = new HomeAssistantClient({ baseUrl: server.url, token: 'test-token' });
  });

  afterAll(async () => {
    await server.close();
  });

  it('lists climate and weather entities', async () => {
    expect(await client.listDevices()).toEqual(['climate.living', 'climate.heat_pump', 'weather.home']);
  });

  it('reads the fields each domain needs', async () => {
    expect(await client.getDeviceStates(['climate.living', 'weather.home', 'sensor.outdoor'])).toEqual({
      'climate.living': {
        state: 'heat',
        last_changed: '2024-01-15T09:00:00+00:00',
        current_temperature: 19.5,
        temperature: 21,
      },
      'weather.home': { state: 'sunny', last_changed: '2024-01-15T07:00:00+00:00', temperature: -3 },
      'sensor.outdoor': { state: '12.5', last_changed: '2024-01-15T06:00:00+00:00' },
    });
  });

  it('wraps HTTP failures with the status and path', async () => {
    await expect(client.getDeviceStates(['climate.missing'])).rejects.toMatchObject({
      name: 'HomeAssistantError',
      status: 404,
      path: '/api/states/climate.missing',
    });
  });

  it('rejects empty entity ids', async () => {
    await expect(client.getDeviceStates([''])).rejects.toThrow(HomeAssistantError);
  });

  it('calls the climate services with the bearer token', async () => {
    calls.length = 0;
    await client.setHvacMode('climate.heat_pump', 'heat');
    await client.setTemperature('climate.living', 20.5);
    expect(calls).toEqual([
      { service: 'set_hvac_mode', body: { entity_id: 'climate.heat_pump', hvac_mode: 'heat' }, auth: 'Bearer test-token' },
      { service: 'set_temperature', body: { entity_id: 'climate.living', temperature: 20.5 }, auth: 'Bearer test-token' },
    ]);
  });
});

describe('extractDeviceState', () => {
  it('lowercases string values and keeps numbers', () => {
    expect(extractDeviceState({
      entity_id: 'climate.office',
      state: 'HEAT',
      last_changed: undefined,
      attributes: { current_temperature: 'n/a', temperature: 19 },
    })).toEqual({ state: 'heat', last_changed: null, current_temperature: 'n/a', temperature: 19 });
  });
});

describe('DryRunDeviceClient', () => {
  it('reads through and logs commands without sending them', async () => {
    const info = vi.spyOn(logger, 'info');
    const inner = new FakeDeviceClient({ 'climate.living': { state: 'heat', last_changed: null, temperature: 20 } });
    const dry = new DryRunDeviceClient(inner);

    expect(await dry.listDevices()).toEqual(['climate.living']);
    expect((await dry.getDeviceStates(['climate.living']))['climate.living']?.temperature).toBe(20);

    await dry.setHvacMode('climate.living', 'off');
    await dry.setTemperature('climate.living', 18);
    expect(info.mock.calls).toEqual([
      ['[dry-run] climate.living: set_hvac_mode off'],
      ['[dry-run] climate.living: set_temperature 18'],
    ]);
    expect(inner.commands).toEqual([]);
  });
});
