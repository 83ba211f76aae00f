import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import type { ExecutionTimings } from './types.js';

export const DEFAULT_WEB_PORT = 8023; // HTTP (80) + Telnet (23)

export interface CliOptions {
  showVersion: boolean;
  noWebUI: boolean;
  webPort: number;
  timings: Partial<ExecutionTimings>;
}

export interface VersionInfo {
  name: string;
  version: string;
  description?: string;
  license?: string;
}

const PositiveInteger = z.coerce.number().int().positive();

const PackageJsonSchema = z.object({
  name: z.string(),
  version: z.string(),
  description: z.string().optional(),
  license: z.string().optional(),
});

const TIMING_FLAGS = new Map<string, keyof ExecutionTimings>([
  ['--poll-interval', 'pollIntervalMs'],
  ['--idle-threshold', 'idleThresholdMs'],
  ['--grace-delay', 'graceDelayMs'],
  ['--slow-floor', 'slowCommandFloorMs'],
]);

function readPositiveInteger(flag: string, value: string | undefined): number {
  const parsed = PositiveInteger.safeParse(value);
  if (!parsed.success) {
    throw new Error(`${flag} expects a positive integer, got ${value ?? 'nothing'}`);
  }
  return parsed.data;
}

export function parseArgs(argv: string[]): CliOptions {
  const timings: Partial<ExecutionTimings> = {};
  let webPort = DEFAULT_WEB_PORT;

  for (let i = 0; i < argv.length; i++) {
    const flag = argv[i];
    if (flag === '--web-port') {
      webPort = readPositiveInteger(flag, argv[++i]);
      continue;
    }
    const timingKey = TIMING_FLAGS.get(flag);
    if (timingKey) {
      timings[timingKey] = readPositiveInteger(flag, argv[++i]);
    }
  }

  return {
    showVersion: argv.includes('--version'),
    noWebUI: argv.includes('--no-web-ui'),
    webPort,
    timings,
  };
}

export function getVersionInfo(): VersionInfo {
  try {
    const __filename = fileURLToPath(import.meta.url);
    const packageJsonPath = join(dirname(__filename), '..', 'package.json');
    return PackageJsonSchema.parse(JSON.parse(readFileSync(packageJsonPath, 'utf8')));
  } catch (error) {
    console.error(`Failed to read package.json: ${error instanceof Error ? error.message : String(error)}`);
    return {
      name: 'telnet-mcp',
      version: 'unknown',
      description: 'MCP server for Telnet console sessions on network devices',
    };
  }
}
