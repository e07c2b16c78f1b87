#!/usr/bin/env node
// src/index.ts
import 'dotenv/config';
import { createApp } from './app.js';
import { loadCopModels } from './cop.js';
import { DryRunDeviceClient, HomeAssistantClient, type DeviceClient } from './ha_client.js';
import { configureLogging, logger } from './logger.js';
import { Controller, CycleScheduler } from './loop.js';
import { AutoPeakEventSource } from './peak_events.js';
import { loadSettingsOrExit, serveStatusApi, Service } from './service.js';
import { ZoneConfigStore } from './zones.js';

async function main() {
  const settings = loadSettingsOrExit();
  if (!settings) return;
  configureLogging({ level: settings.logLevel, logsDir: settings.logsDir, toFile: settings.logToFile });
  logger.info(`Starting controller module for building ${settings.buildingId} ...`);

  const ha = new HomeAssistantClient({ baseUrl: settings.haBaseUrl, token: settings.haToken });
  const client: DeviceClient = settings.dryRun ? new DryRunDeviceClient(ha) : ha;
  if (settings.dryRun) logger.warn('DRY_RUN enabled: commands are logged, not sent');

  const controller = new Controller({
    client,
    store: new ZoneConfigStore(settings.configFilePath, settings.heatPumpEntityId),
    copModels: settings.heatPumpEnabled ? loadCopModels(settings.heatPumpConfigFilePath) : null,
    peakEvents: new AutoPeakEventSource(settings),
    settings,
  });

  const server = serveStatusApi(createApp(controller, settings.apiKeys), settings.port);
  const service = new Service({
    controller,
    scheduler: new CycleScheduler(() => controller.runCycle()),
    closeServer: () => server.close(),
  });
  process.on('SIGINT', () => service.stop('SIGINT'));
  process.on('SIGTERM', () => service.stop('SIGTERM'));

  await service.run();
}

main().catch(e => {
  logger.error('Fatal error', e);
  process.exit(1);
});
