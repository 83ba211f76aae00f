import { EventEmitter } from 'node:events';
import PQueue from 'p-queue';
import { errorMessage } from './errors.js';
import { PromptDetector, UNKNOWN_MODE } from './prompt-detector.js';
import type { DeviceProfile, Endpoint, LogFn, SessionSummary, TelnetStream } from './types.js';

export function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export interface TelnetSessionInit {
  id: string;
  endpoint: Endpoint;
  profile: DeviceProfile;
  stream: TelnetStream;
  readChunkSize: number;
  log: LogFn;
}

export class TelnetSession {
  private static readonly MAX_HISTORY_SIZE = 10;

  public readonly id: string;
  public readonly endpoint: Endpoint;
  public readonly profile: DeviceProfile;
  public readonly createdAt: Date = new Date();
  public readonly readChunkSize: number;
  public lastActivity: Date = new Date();
  public history: string[] = [];
  public lastOutput = '';
  public lastDeviceMode: string = UNKNOWN_MODE;

  private readonly stream: TelnetStream;
  private readonly logFn: LogFn;
  // One command in flight per device; the console has no multiplexing
  private readonly queue = new PQueue({ concurrency: 1 });
  private readonly events = new EventEmitter();
  private released = false;

  constructor(init: TelnetSessionInit) {
    this.id = init.id;
    this.endpoint = init.endpoint;
    this.profile = init.profile;
    this.stream = init.stream;
    this.readChunkSize = init.readChunkSize;
    this.logFn = init.log;
  }

  public get closed(): boolean {
    return this.released || this.stream.closed;
  }

  /** True once `close()` ran; a device hang-up alone leaves this false. */
  public get disconnected(): boolean {
    return this.released;
  }

  public runExclusive<T>(task: () => Promise<T>): Promise<T> {
    return this.queue.add<T>(task, { throwOnTimeout: true });
  }

  public log(message: string): void {
    this.logFn(message, this.id);
  }

  public async send(text: string): Promise<void> {
    this.stream.write(text);
    await this.stream.flush();
  }

  public async read(timeoutMs: number): Promise<string> {
    const text = await this.stream.readWithTimeout(this.readChunkSize, timeoutMs);
    if (text) {
      this.events.emit('data', text);
    }
    return text;
  }

  /** Subscribes to every chunk read from the device. Returns the unsubscribe function. */
  public onData(listener: (text: string) => void): () => void {
    this.events.on('data', listener);
    return () => {
      this.events.off('data', listener);
    };
  }

  public recordCommand(command: string, output: string): void {
    if (command.trim()) {
      this.history.push(command);
    }
    if (this.history.length > TelnetSession.MAX_HISTORY_SIZE) {
      this.history = this.history.slice(-TelnetSession.MAX_HISTORY_SIZE);
    }
    this.lastOutput = output;
    this.lastDeviceMode = PromptDetector.detectMode(output);
    this.lastActivity = new Date();
  }

  /**
   * Brings a freshly opened console to the top-level, pagination-free state.
   * Silence and failed writes are logged and skipped; no step is required to
   * succeed.
   */
  public async initialize(): Promise<void> {
    const profile = this.profile;
    const eol = profile.lineTerminator;

    // Clears "Press RETURN to get started"
    for (let i = 0; i < profile.wakeCount; i++) {
      await this.sendQuietly(eol, 'wake');
      await delay(profile.wakeDelayMs);
    }

    if (profile.probe) {
      for (let i = 0; i < profile.probeCount; i++) {
        await this.sendQuietly(profile.probe + eol, 'probe');
        await delay(profile.probeDelayMs);
      }
    }

    const banner = await this.drain();
    this.log(`Baseline drained ${banner.length} chars, mode ${PromptDetector.detectMode(banner)}`);

    if (profile.exitCommand && PromptDetector.isConfigMode(banner, profile.configMarker)) {
      this.log(`Configuration mode detected, sending "${profile.exitCommand}"`);
      await this.sendQuietly(profile.exitCommand + eol, 'exit');
      await delay(profile.settleDelayMs);
      await this.drain();
    }

    if (profile.paginationCommand) {
      await this.sendQuietly(profile.paginationCommand + eol, 'pagination');
      await delay(profile.settleDelayMs);
      await this.drain();
    }

    this.lastActivity = new Date();
  }

  /** Reads until a bounded read comes back empty, capped by the profile's drain limit. */
  public async drain(): Promise<string> {
    const deadline = Date.now() + this.profile.drainLimitMs;
    let output = '';
    while (Date.now() < deadline) {
      let data: string;
      try {
        data = await this.read(this.profile.drainReadTimeoutMs);
      } catch (error) {
        this.log(`Drain stopped: ${errorMessage(error)}`);
        break;
      }
      if (!data) {
        break;
      }
      output += data;
    }
    return output;
  }

  /** Releases the transport. Returns false when it was already released. */
  public close(): boolean {
    if (this.released) {
      return false;
    }
    this.released = true;
    this.events.removeAllListeners();
    try {
      this.stream.close();
    } catch (error) {
      this.log(`Close failed: ${errorMessage(error)}`);
    }
    return true;
  }

  public toSummary(): SessionSummary {
    return {
      sessionId: this.id,
      host: this.endpoint.host,
      port: this.endpoint.port,
      connectedAt: this.createdAt.toISOString(),
      profile: this.profile.name,
      lastDeviceMode: this.lastDeviceMode,
      historyCount: this.history.length,
    };
  }

  private async sendQuietly(text: string, step: string): Promise<void> {
    try {
      await this.send(text);
    } catch (error) {
      this.log(`Baseline ${step} write failed: ${errorMessage(error)}`);
    }
  }
}
