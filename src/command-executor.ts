import { effectiveWaitMs } from './device-profiles.js';
import { UnknownSessionError, errorMessage } from './errors.js';
import { PromptDetector } from './prompt-detector.js';
import { TelnetSession, delay } from './session.js';
import type { ExecutionTimings } from './types.js';

export interface SessionLookup {
  /** Throws UnknownSessionError for ids that are not registered. */
  getSession(sessionId: string): TelnetSession;
}

/**
 * Sends one command and collects its output. A console gives no end-of-output
 * marker, so the loop stops when the buffer ends on a prompt, either as the
 * prompt arrives or after a stretch of silence, and otherwise at the deadline.
 */
export class CommandExecutor {
  constructor(
    private readonly sessions: SessionLookup,
    private readonly timings: ExecutionTimings
  ) {}

  public async run(sessionId: string, command: string, maxWaitMs: number): Promise<string> {
    const session = this.sessions.getSession(sessionId);

    return session.runExclusive(async () => {
      // Disconnected while this run waited its turn
      if (session.disconnected) {
        throw new UnknownSessionError(sessionId);
      }
      const output = await this.readUntilPrompt(session, command, maxWaitMs);
      session.recordCommand(command, output);
      return output;
    });
  }

  private async readUntilPrompt(session: TelnetSession, command: string, maxWaitMs: number): Promise<string> {
    const { pollIntervalMs, idleThresholdMs, graceDelayMs, slowCommandFloorMs } = this.timings;

    const waitMs = effectiveWaitMs(command, maxWaitMs, slowCommandFloorMs);
    if (waitMs !== maxWaitMs) {
      session.log(`Slow command "${command}", waiting up to ${waitMs}ms`);
    }

    try {
      await session.send(command + session.profile.lineTerminator);
    } catch (error) {
      session.log(`Write of "${command}" failed: ${errorMessage(error)}`);
    }

    const startTime = Date.now();
    const deadline = startTime + waitMs;
    let lastDataTime = startTime;
    let output = '';

    while (Date.now() < deadline) {
      if (session.closed) {
        session.log(`Stream closed after ${output.length} chars`);
        return output;
      }

      const remaining = deadline - Date.now();
      let data: string;
      try {
        data = await session.read(Math.min(pollIntervalMs, remaining));
      } catch (error) {
        session.log(`Read error ignored: ${errorMessage(error)}`);
        await delay(Math.min(pollIntervalMs, Math.max(0, deadline - Date.now())));
        continue;
      }

      if (data) {
        output += data;
        lastDataTime = Date.now();

        if (PromptDetector.endsWithPrompt(output)) {
          // Absorb a trailing fragment printed just after the prompt
          await delay(graceDelayMs);
          output += await this.readQuietly(session, pollIntervalMs);
          return output;
        }
      } else {
        const silence = Date.now() - lastDataTime;
        if (silence >= idleThresholdMs && output && PromptDetector.endsWithPrompt(output)) {
          return output;
        }
      }
    }

    session.log(`No prompt within ${waitMs}ms, returning ${output.length} chars`);
    return output;
  }

  private async readQuietly(session: TelnetSession, timeoutMs: number): Promise<string> {
    try {
      return await session.read(timeoutMs);
    } catch (error) {
      session.log(`Trailing read failed: ${errorMessage(error)}`);
      return '';
    }
  }
}
