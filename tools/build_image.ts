#!/usr/bin/env node
// tools/build_image.ts
import { spawn } from 'node:child_process';
import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { Command } from 'commander';

export type BuildType = 'normal' | 'multi';

export const IMAGE_NAME = 'rueda1208/controller';
export const VERSION = '1.1.3';
export const MULTI_PLATFORMS = ['linux/amd64', 'linux/arm64'];

export interface DockerInvocation {
  command: 'docker';
  args: string[];
}

export function parseBuildType(raw: string | undefined): BuildType {
  const v = raw ?? 'normal';
  if (v === 'normal' || v === 'multi') return v;
  throw new Error(`unknown build type "${v}" (expected "normal" or "multi")`);
}

/**
 * `multi` builds linux/amd64 + linux/arm64 with buildx and pushes both tags;
 * `normal` builds for the current platform and keeps the image local.
 */
export function dockerInvocation(type: BuildType, image = IMAGE_NAME, version = VERSION): DockerInvocation {
  const common = ['-f', 'Dockerfile', '-t', `${image}:${version}`, '-t', `${image}:latest`, '--no-cache'];
  if (type === 'multi') {
    return {
      command: 'docker',
      args: ['buildx', 'build', '--platform', MULTI_PLATFORMS.join(','), ...common, '--push', '.'],
    };
  }
  return { command: 'docker', args: ['build', ...common, '.'] };
}

function run(inv: DockerInvocation, cwd: string): Promise<number> {
  return new Promise((resolve, reject) => {
    const child = spawn(inv.command, inv.args, { cwd, stdio: 'inherit' });
    child.on('error', reject);
    child.on('exit', code => resolve(code ?? 1));
  });
}

async function cli(argv: string[]) {
  const program = new Command()
    .name('hems-build-image')
    .description('Build the controller image (normal: current platform, multi: amd64+arm64 and push)')
    .argument('[type]', 'normal | multi', 'normal')
    .option('--image <name>', 'image repository', process.env.IMAGE_NAME ?? IMAGE_NAME)
    .option('--tag <version>', 'version tag', VERSION)
    .option('--context <dir>', 'build context', process.cwd());
  program.parse(argv);

  const type = parseBuildType(program.args[0]);
  const opts = program.opts<{ image: string; tag: string; context: string }>();
  const context = path.resolve(opts.context);
  console.log(`Project root: ${context}`);
  console.log(type === 'multi'
    ? 'Building and pushing multi-architecture image...'
    : 'Building normal image for current platform...');

  const code = await run(dockerInvocation(type, opts.image, opts.tag), context);
  if (code !== 0) {
    console.error(`docker exited with code ${code}`);
    process.exit(code);
  }
  console.log('Build complete!');
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
    console.error(e instanceof Error ? e.message : e);
    process.exit(1);
  });
}
