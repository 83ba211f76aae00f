import type { DeviceProfile, ExecutionTimings } from './types.js';

export const DEFAULT_PROFILE_NAME = 'cisco_ios';

export const DEFAULT_EXECUTION_TIMINGS: ExecutionTimings = {
  pollIntervalMs: 100,
  idleThresholdMs: 1000,
  graceDelayMs: 200,
  // ping sends 5 probes with a 2 s timeout each
  slowCommandFloorMs: 12000,
  readChunkSize: 4096,
};

// Matched case-insensitively against the start of the trimmed command
export const SLOW_COMMAND_PREFIXES: readonly string[] = [
  'ping',
  'traceroute',
  'tracert',
  'show tech',
  'copy',
  'write',
  'reload',
  'debug',
];

export const DEFAULT_DEVICE_PROFILES: Record<string, DeviceProfile> = {
  cisco_ios: {
    name: 'cisco_ios',
    description: 'IOS-style CLI: wakes the console, leaves configuration mode, disables paging',
    lineTerminator: '\r\n',
    wakeCount: 3,
    wakeDelayMs: 100,
    probe: '?',
    probeCount: 5,
    probeDelayMs: 300,
    drainReadTimeoutMs: 100,
    drainLimitMs: 5000,
    settleDelayMs: 300,
    configMarker: '(config',
    exitCommand: 'end',
    paginationCommand: 'terminal length 0',
  },

  raw: {
    name: 'raw',
    description: 'Wakes the console and discards the banner without sending any command',
    lineTerminator: '\r\n',
    wakeCount: 3,
    wakeDelayMs: 100,
    probeCount: 0,
    probeDelayMs: 0,
    drainReadTimeoutMs: 100,
    drainLimitMs: 5000,
    settleDelayMs: 300,
    configMarker: '',
  },
};

export function getProfileByName(name: string): DeviceProfile | undefined {
  return DEFAULT_DEVICE_PROFILES[name];
}

export function listAvailableProfiles(): string[] {
  return Object.keys(DEFAULT_DEVICE_PROFILES);
}

export function createCustomProfile(base: DeviceProfile, overrides: Partial<DeviceProfile>): DeviceProfile {
  return {
    ...base,
    ...overrides,
    name: overrides.name ?? `${base.name}-custom`,
  };
}

export function resolveTimings(overrides: Partial<ExecutionTimings> = {}): ExecutionTimings {
  return { ...DEFAULT_EXECUTION_TIMINGS, ...overrides };
}

export function isSlowCommand(command: string): boolean {
  const normalized = command.trim().toLowerCase();
  return SLOW_COMMAND_PREFIXES.some(prefix => normalized.startsWith(prefix));
}

export function effectiveWaitMs(command: string, requestedMs: number, floorMs: number): number {
  return isSlowCommand(command) ? Math.max(requestedMs, floorMs) : requestedMs;
}
