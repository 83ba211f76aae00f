export interface Endpoint {
  host: string;
  port: number;
}

export interface DeviceProfile {
  name: string;
  description: string;
  lineTerminator: string;
  wakeCount: number;
  wakeDelayMs: number;
  // Benign query valid in every mode; omitted for consoles that must not see it
  probe?: string;
  probeCount: number;
  probeDelayMs: number;
  drainReadTimeoutMs: number;
  drainLimitMs: number;
  settleDelayMs: number;
  configMarker: string;
  exitCommand?: string;
  paginationCommand?: string;
}

export interface ExecutionTimings {
  pollIntervalMs: number;
  idleThresholdMs: number;
  graceDelayMs: number;
  slowCommandFloorMs: number;
  readChunkSize: number;
}

/**
 * Byte stream to a console device. Reads resolve with an empty string when
 * nothing arrives within the timeout; they reject only on a broken stream.
 */
export interface TelnetStream {
  readonly closed: boolean;
  write(text: string): void;
  flush(): Promise<void>;
  readWithTimeout(maxBytes: number, timeoutMs: number): Promise<string>;
  close(): void;
}

export type TransportOpener = (host: string, port: number, timeoutMs: number) => Promise<TelnetStream>;

export interface SessionSummary {
  sessionId: string;
  host: string;
  port: number;
  connectedAt: string;
  profile: string;
  lastDeviceMode: string;
  historyCount: number;
}

export interface ConnectResult {
  sessionId: string;
  deviceMode: string;
}

export interface ExecuteResult {
  output: string;
  deviceMode: string;
  executionTime: number;
}

export interface OutputChunk {
  output: string;
  totalLength: number;
  offset: number;
  length: number;
  hasMore: boolean;
  nextOffset?: number;
}

export type LogFn = (message: string, sessionId?: string) => void;
