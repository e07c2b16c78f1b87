// src/executor.ts
import type { DeviceClient } from './ha_client.js';
import { logger } from './logger.js';
import type { Command, ControlActions, DevicesState } from './types.js';

/**
 * Commands needed to move the devices from `states` to `actions`.
 * Values already in place produce nothing.
 */
export function planCommands(actions: ControlActions, states: DevicesState, heatPumpEntityId: string): Command[] {
  const commands: Command[] = [];
  const hp = actions.heat_pump;

  if (hp) {
    const current = states[heatPumpEntityId];
    if (hp.state === current?.state) {
      logger.info('No change to heat pump state requested');
    } else {
      commands.push({ entity_id: heatPumpEntityId, service: 'set_hvac_mode', hvac_mode: hp.state });
    }

    if (hp.state === 'off') {
      logger.info('Heat pump turned off, skipping setpoint adjustment');
    } else if (hp.setpoint === null) {
      logger.info('No heat pump setpoint available');
    } else if (hp.setpoint === current?.temperature) {
      logger.info('No change to heat pump setpoint requested');
    } else {
      commands.push({ entity_id: heatPumpEntityId, service: 'set_temperature', temperature: hp.setpoint });
    }
  }

  for (const [zoneId, setpoint] of Object.entries(actions.zones)) {
    if (setpoint === states[zoneId]?.temperature) {
      logger.info(`No change to zone ${zoneId} temperature requested`);
      continue;
    }
    commands.push({ entity_id: zoneId, service: 'set_temperature', temperature: setpoint });
  }
  return commands;
}

export async function executeControlActions(
  client: DeviceClient,
  actions: ControlActions,
  states: DevicesState,
  heatPumpEntityId: string,
): Promise<Command[]> {
  const commands = planCommands(actions, states, heatPumpEntityId);
  if (!commands.length) {
    logger.info('No control actions to execute');
    return commands;
  }

  for (const c of commands) {
    if (c.service === 'set_hvac_mode') {
      logger.info(`Setting ${c.entity_id} HVAC mode to ${c.hvac_mode}`);
      await client.setHvacMode(c.entity_id, c.hvac_mode);
    } else {
      logger.info(`Setting ${c.entity_id} setpoint to ${c.temperature} C`);
      await client.setTemperature(c.entity_id, c.temperature);
    }
  }
  return commands;
}
