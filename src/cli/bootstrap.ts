#!/usr/bin/env node

import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { Command } from 'commander';
import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';

import { toErrorMessage } from '../utils/errors.js';
import { registerMessagingCommands, type MessagingDependencies } from './commands/messaging.js';

const modulePath = fileURLToPath(import.meta.url);

const packageManifestSchema = z.object({ version: z.string().optional() });

/** Walk up from `startDir` to the nearest package.json. */
export function findPackageJson(startDir: string): string | undefined {
  let dir = startDir;
  while (dir !== path.dirname(dir)) {
    const candidate = path.join(dir, 'package.json');
    if (fs.existsSync(candidate)) {
      return candidate;
    }
    dir = path.dirname(dir);
  }
  return undefined;
}

export function resolveCliVersion(env: NodeJS.ProcessEnv = process.env): string {
  if (env.TOPICWIRE_VERSION) {
    return env.TOPICWIRE_VERSION;
  }

  const manifestPath = findPackageJson(path.dirname(modulePath));
  if (!manifestPath) return 'unknown';

  try {
    const manifest = packageManifestSchema.safeParse(JSON.parse(fs.readFileSync(manifestPath, 'utf-8')));
    return manifest.success ? (manifest.data.version ?? 'unknown') : 'unknown';
  } catch {
    return 'unknown';
  }
}

export function createProgram(overrides: Partial<MessagingDependencies> = {}): Command {
  const program = new Command();

  program
    .name('topicwire')
    .description('Topic pub/sub over a self-healing WebSocket connection')
    .version(resolveCliVersion(), '-V, --version', 'Output the version number');

  registerMessagingCommands(program, overrides);

  return program;
}

export async function runCli(argv: string[] = process.argv): Promise<void> {
  dotenvConfig();
  await createProgram().parseAsync(argv);
}

function isEntrypoint(): boolean {
  const invocationPath = process.argv[1];
  if (!invocationPath) {
    return false;
  }
  try {
    return fs.realpathSync(invocationPath) === fs.realpathSync(modulePath);
  } catch {
    return path.resolve(invocationPath) === modulePath;
  }
}

if (isEntrypoint()) {
  runCli().catch((err: unknown) => {
    console.error(toErrorMessage(err));
    process.exit(1);
  });
}
