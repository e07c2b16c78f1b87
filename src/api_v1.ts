// src/api_v1.ts
import express from 'express';
import { logger } from './logger.js';
import type { Controller } from './loop.js';
import { dayTypeOf, targetAt } from './schedule.js';
import type { CycleReport, HeatPumpMode } from './types.js';

const MODE_CODE: Record<HeatPumpMode, number> = { heat: 1, off: 0, cool: -1 };

/** Flat document for Telegraf's inputs.http json parser: one tag, numeric fields */
export function toMetrics(buildingId: string, report: CycleReport | null): Record<string, string | number> {
  const out: Record<string, string | number> = { building_id: buildingId };
  if (!report) return out;

  out.cycle_ok = report.ok ? 1 : 0;
  out.commands_sent = report.commands.length;
  out.peak_event_active = report.peak_event ? 1 : 0;
  if (report.outside_temperature !== null) out.outside_temperature = report.outside_temperature;
  if (report.heat_pump_mode !== null) out.heat_pump_mode = MODE_CODE[report.heat_pump_mode];
  if (report.heat_pump_cop !== null) out.heat_pump_cop = report.heat_pump_cop;

  const hp = report.actions?.heat_pump;
  if (hp?.setpoint != null) out.heat_pump_setpoint = hp.setpoint;
  for (const [zoneId, setpoint] of Object.entries(report.actions?.zones ?? {})) {
    out[`setpoint_${zoneId.replace(/^climate\./, '')}`] = setpoint;
  }
  return out;
}

export function createApiV1(controller: Controller, apiKeys: string[]): express.Router {
  const router = express.Router();

  /** --- bearer auth, only when API_KEYS is set --- */
  function requireAuth(req: express.Request, res: express.Response, next: express.NextFunction) {
    if (!apiKeys.length) return next();
    const hdr = req.header('authorization') || '';
    const token = hdr.startsWith('Bearer ') ? hdr.slice(7) : '';
    if (!token || !apiKeys.includes(token)) {
      return res.status(401).json({ error: { code: 'UNAUTHORIZED', message: 'Invalid API key' } });
    }
    next();
  }

  /** health */
  router.get('/healthz', (_req, res) => {
    res.type('application/json').send({ ok: true, ts: new Date().toISOString() });
  });

  router.get('/status', requireAuth, (_req, res) => {
    const report = controller.lastReport();
    if (!report) return res.status(503).json({ error: { code: 'NO_CYCLE', message: 'No control cycle has completed yet' } });
    return res.json({ building_id: controller.buildingId, ...report });
  });

  router.get('/metrics', requireAuth, (_req, res) => {
    res.set('Cache-Control', 'no-store');
    res.json(toMetrics(controller.buildingId, controller.lastReport()));
  });

  router.get('/zones', requireAuth, (_req, res) => {
    try {
      const now = new Date();
      const minute = now.getHours() * 60 + now.getMinutes();
      const items = controller.store.zoneIds().map(id => {
        const s = controller.store.zoneSettings(id);
        return {
          entity_id: id,
          heat_pump_impact: s?.heat_pump_impact ?? 0,
          preconditioning: s?.preconditioning ?? false,
          flexibility: s?.flexibility ?? { upward: 0, downward: 0 },
          scheduled_target: s ? targetAt(minute, dayTypeOf(now), s.schedule) : null,
        };
      });
      return res.json({ items });
    } catch (e) {
      logger.error('GET /v1/zones failed', e);
      return res.status(500).json({ error: { code: 'CONFIG_ERROR', message: e instanceof Error ? e.message : 'internal error' } });
    }
  });

  /** run a cycle now, outside the schedule */
  router.post('/cycle', requireAuth, async (_req, res) => {
    const report = await controller.runCycle();
    if (!report) return res.status(409).json({ error: { code: 'BUSY', message: 'A control cycle is already running' } });
    return res.status(report.ok ? 200 : 500).json(report);
  });

  return router;
}
