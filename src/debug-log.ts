export class DebugLog {
  private sessionLogs: Map<string, string[]> = new Map();
  private globalLogs: string[] = [];
  private readonly maxLogsPerSession: number;
  private readonly maxGlobalLogs: number;
  private readonly echo: boolean;

  constructor(options: { maxLogsPerSession?: number; maxGlobalLogs?: number; echo?: boolean } = {}) {
    this.maxLogsPerSession = options.maxLogsPerSession ?? 50;
    this.maxGlobalLogs = options.maxGlobalLogs ?? 100;
    this.echo = options.echo ?? true;
  }

  public log(message: string, sessionId?: string): void {
    const timestamp = new Date().toISOString();
    const logEntry = `${timestamp}: ${message}`;

    if (sessionId) {
      let sessionLogArray = this.sessionLogs.get(sessionId);
      if (!sessionLogArray) {
        sessionLogArray = [];
        this.sessionLogs.set(sessionId, sessionLogArray);
      }
      sessionLogArray.push(logEntry);

      if (sessionLogArray.length > this.maxLogsPerSession) {
        sessionLogArray.splice(0, sessionLogArray.length - this.maxLogsPerSession);
      }
    } else {
      this.globalLogs.push(logEntry);

      if (this.globalLogs.length > this.maxGlobalLogs) {
        this.globalLogs.splice(0, this.globalLogs.length - this.maxGlobalLogs);
      }
    }

    // stdout carries the MCP protocol
    if (this.echo) {
      console.error(logEntry);
    }
  }

  public getLogs(sessionId?: string): string[] {
    if (sessionId) {
      return this.sessionLogs.get(sessionId) ?? [];
    }
    // Recent entries only, responses go back to a model with a token budget
    return this.globalLogs.slice(-20);
  }

  public clear(sessionId?: string): void {
    if (sessionId) {
      this.sessionLogs.delete(sessionId);
    } else {
      this.sessionLogs.clear();
      this.globalLogs = [];
    }
  }

  public getStats(): { totalSessions: number; totalLogs: number; globalLogs: number } {
    const totalLogs = Array.from(this.sessionLogs.values()).reduce((sum, logs) => sum + logs.length, 0);
    return {
      totalSessions: this.sessionLogs.size,
      totalLogs,
      globalLogs: this.globalLogs.length,
    };
  }
}
