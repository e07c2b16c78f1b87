#!/usr/bin/env node
// src/telegraf.ts
import 'dotenv/config';
import { spawn } from 'node:child_process';
import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import { Command } from 'commander';
import { loadAddonOptions, type AddonOptions } from './config.js';
import { ConfigError } from './errors.js';
import { logger } from './logger.js';

export const DEFAULT_TELEGRAF_CONF = '/etc/telegraf/telegraf.conf';

export interface TelegrafLaunch {
  command: string;
  args: string[];
  env: Record<string, string | undefined>;
}

type Env = Record<string, string | undefined>;

/**
 * `telegraf --config <conf> --watch-config poll` with HEMS_API_BASE_URL and
 * BUILDING_ID exported. The config path comes from the CLI flag, then the
 * `telegraf_config_path` option, then $CONF, then the stock location.
 */
export function resolveTelegrafLaunch(options: AddonOptions, env: Env, flags: { config?: string; binary?: string } = {}): TelegrafLaunch {
  const hemsApiBaseUrl = env.HEMS_API_BASE_URL || options.hems_api_base_url;
  const buildingId = env.BUILDING_ID || options.building_id;
  const missing = [
    hemsApiBaseUrl ? null : 'hems_api_base_url',
    buildingId ? null : 'building_id',
  ].filter((k): k is string => k !== null);
  if (missing.length) throw new ConfigError(`missing add-on option(s): ${missing.join(', ')}`);

  const conf = flags.config || options.telegraf_config_path || env.CONF || DEFAULT_TELEGRAF_CONF;

  return {
    command: flags.binary || 'telegraf',
    args: ['--config', conf, '--watch-config', 'poll'],
    env: { ...env, HEMS_API_BASE_URL: hemsApiBaseUrl, BUILDING_ID: buildingId },
  };
}

function run(launch: TelegrafLaunch): Promise<number> {
  return new Promise((resolve, reject) => {
    const child = spawn(launch.command, launch.args, { env: launch.env, stdio: 'inherit' });
    const forward = (sig: NodeJS.Signals) => child.kill(sig);
    process.on('SIGINT', forward);
    process.on('SIGTERM', forward);
    child.on('error', reject);
    child.on('exit', code => resolve(code ?? 1));
  });
}

async function cli(argv: string[]) {
  const program = new Command()
    .name('hems-telegraf')
    .description('Start Telegraf with the add-on configuration')
    .option('-c, --config <path>', 'Telegraf configuration file')
    .option('--binary <path>', 'Telegraf executable', 'telegraf')
    .option('--options <path>', 'add-on options file', process.env.OPTIONS_FILE_PATH ?? '/data/options.json');
  program.parse(argv);
  const flags = program.opts<{ config?: string; binary: string; options: string }>();

  const launch = resolveTelegrafLaunch(loadAddonOptions(flags.options), process.env, flags);
  logger.info(`Starting Telegraf with config ${launch.args[1]}`);
  process.exitCode = await run(launch);
}

function invokedDirectly(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return fs.realpathSync(entry) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

if (invokedDirectly()) {
  cli(process.argv).catch(e => {
    logger.error('Telegraf launcher failed', e);
    process.exit(1);
  });
}
