import { v4 as uuidv4 } from 'uuid';
import { CommandExecutor, SessionLookup } from './command-executor.js';
import { DebugLog } from './debug-log.js';
import { DEFAULT_PROFILE_NAME, getProfileByName, listAvailableProfiles, resolveTimings } from './device-profiles.js';
import { ConnectionError, UnknownSessionError, errorMessage } from './errors.js';
import { PromptDetector } from './prompt-detector.js';
import { TelnetSession } from './session.js';
import { openTelnet } from './telnet-transport.js';
import type {
  ConnectResult,
  DeviceProfile,
  Endpoint,
  ExecuteResult,
  ExecutionTimings,
  OutputChunk,
  SessionSummary,
  TelnetStream,
  TransportOpener,
} from './types.js';

export interface SessionManagerOptions {
  openTransport?: TransportOpener;
  timings?: Partial<ExecutionTimings>;
  debugLog?: DebugLog;
}

export interface CreateSessionOptions {
  timeoutMs: number;
  profile: DeviceProfile;
}

export class SessionManager implements SessionLookup {
  private sessions: Map<string, TelnetSession> = new Map();
  private readonly MAX_OUTPUT_SIZE = 50 * 1024; // 50KB limit for MCP responses
  private readonly CONNECT_PROMPT_WAIT_MS = 1000;

  public readonly timings: ExecutionTimings;
  private readonly executor: CommandExecutor;
  private readonly openTransport: TransportOpener;
  private readonly debugLog: DebugLog;

  constructor(options: SessionManagerOptions = {}) {
    this.openTransport = options.openTransport ?? openTelnet;
    this.timings = resolveTimings(options.timings);
    this.debugLog = options.debugLog ?? new DebugLog();
    this.executor = new CommandExecutor(this, this.timings);
  }

  public log(message: string, sessionId?: string): void {
    this.debugLog.log(message, sessionId);
  }

  public getDebugLogs(sessionId?: string): string[] {
    return this.debugLog.getLogs(sessionId);
  }

  public getLogStats(): { totalSessions: number; totalLogs: number; globalLogs: number } {
    return this.debugLog.getStats();
  }

  public truncateForMCPResponse(output: string): { text: string; truncated: boolean } {
    if (output.length <= this.MAX_OUTPUT_SIZE) {
      return { text: output, truncated: false };
    }

    const keepSize = Math.floor(this.MAX_OUTPUT_SIZE * 0.8); // Keep 80% of max size
    return {
      text: '[...output truncated. Total length: ' + output.length + ' chars, showing last ' + keepSize + ' chars...]\n' +
        output.slice(-keepSize),
      truncated: true,
    };
  }

  public resolveProfile(name?: string): DeviceProfile {
    const profileName = name ?? DEFAULT_PROFILE_NAME;
    const profile = getProfileByName(profileName);
    if (!profile) {
      throw new Error(`Profile '${profileName}' not found. Available profiles: ${listAvailableProfiles().join(', ')}`);
    }
    return profile;
  }

  /**
   * Opens the transport and runs the baseline sequence. The session is
   * registered only once both succeed.
   */
  public async createSession(endpoint: Endpoint, options: CreateSessionOptions): Promise<TelnetSession> {
    const target = `${endpoint.host}:${endpoint.port}`;
    this.log(`Connecting to ${target} (timeout ${options.timeoutMs}ms, profile ${options.profile.name})`);

    let stream: TelnetStream;
    try {
      stream = await this.openWithTimeout(endpoint, options.timeoutMs);
    } catch (error) {
      this.log(`Connection to ${target} failed: ${errorMessage(error)}`);
      throw new ConnectionError(endpoint, errorMessage(error));
    }

    const session = new TelnetSession({
      id: uuidv4(),
      endpoint,
      profile: options.profile,
      stream,
      readChunkSize: this.timings.readChunkSize,
      log: (message, sessionId) => this.log(message, sessionId),
    });

    try {
      await session.initialize();
    } catch (error) {
      this.discard(session);
      throw new ConnectionError(endpoint, `initialization failed: ${errorMessage(error)}`);
    }

    if (session.closed) {
      this.discard(session);
      throw new ConnectionError(endpoint, 'connection closed by device');
    }

    this.sessions.set(session.id, session);
    session.log(`Session ready for ${target}`);
    return session;
  }

  public getSession(sessionId: string): TelnetSession {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new UnknownSessionError(sessionId);
    }
    return session;
  }

  public listSessions(): SessionSummary[] {
    return Array.from(this.sessions.values()).map(session => session.toSummary());
  }

  public destroySession(sessionId: string): boolean {
    const session = this.getSession(sessionId);
    this.sessions.delete(sessionId);
    session.close();
    this.debugLog.clear(sessionId);
    this.log(`Session ${sessionId} disconnected from ${session.endpoint.host}:${session.endpoint.port}`);
    return true;
  }

  public closeAll(): void {
    for (const sessionId of Array.from(this.sessions.keys())) {
      this.destroySession(sessionId);
    }
  }

  public async connect(host: string, port: number, timeoutMs: number, profileName?: string): Promise<ConnectResult> {
    const profile = this.resolveProfile(profileName);
    const session = await this.createSession({ host, port }, { timeoutMs, profile });

    // An empty line makes the device reprint its prompt
    const output = await this.executor.run(session.id, '', this.CONNECT_PROMPT_WAIT_MS);
    if (session.closed) {
      this.sessions.delete(session.id);
      this.discard(session);
      throw new ConnectionError({ host, port }, 'connection closed by device');
    }
    return {
      sessionId: session.id,
      deviceMode: PromptDetector.detectMode(output),
    };
  }

  public async execute(sessionId: string, command: string, waitMs: number): Promise<ExecuteResult> {
    const startTime = Date.now();
    const output = await this.executor.run(sessionId, command, waitMs);
    return {
      output,
      deviceMode: PromptDetector.detectMode(output),
      executionTime: Date.now() - startTime,
    };
  }

  public disconnect(sessionId: string): boolean {
    return this.destroySession(sessionId);
  }

  public getFullOutput(sessionId: string, offset: number = 0, limit: number = 40000): OutputChunk {
    const fullOutput = this.getSession(sessionId).lastOutput;

    const totalLength = fullOutput.length;
    const endPos = Math.min(offset + limit, totalLength);
    const outputChunk = fullOutput.slice(offset, endPos);
    const hasMore = endPos < totalLength;

    return {
      output: outputChunk,
      totalLength,
      offset,
      length: outputChunk.length,
      hasMore,
      nextOffset: hasMore ? endPos : undefined,
    };
  }

  // Drops a session that never reached the caller
  private discard(session: TelnetSession): void {
    session.close();
    this.debugLog.clear(session.id);
    this.log(`Discarded session for ${session.endpoint.host}:${session.endpoint.port}`);
  }

  private openWithTimeout(endpoint: Endpoint, timeoutMs: number): Promise<TelnetStream> {
    return new Promise((resolve, reject) => {
      let settled = false;
      const timer = setTimeout(() => {
        settled = true;
        reject(new Error(`timed out after ${timeoutMs}ms`));
      }, timeoutMs);

      this.openTransport(endpoint.host, endpoint.port, timeoutMs).then(
        stream => {
          if (settled) {
            // Opened after the caller gave up
            stream.close();
            return;
          }
          settled = true;
          clearTimeout(timer);
          resolve(stream);
        },
        (error: unknown) => {
          if (settled) {
            this.log(`Late open failure for ${endpoint.host}:${endpoint.port}: ${errorMessage(error)}`);
            return;
          }
          settled = true;
          clearTimeout(timer);
          reject(error);
        }
      );
    });
  }
}
