import type { Endpoint } from './types.js';

export class ConnectionError extends Error {
  public readonly endpoint: Endpoint;

  constructor(endpoint: Endpoint, reason: string) {
    super(`Connection to ${endpoint.host}:${endpoint.port} failed: ${reason}`);
    this.name = 'ConnectionError';
    this.endpoint = endpoint;
  }
}

export class UnknownSessionError extends Error {
  public readonly sessionId: string;

  constructor(sessionId: string) {
    super(`Session ${sessionId} not found`);
    this.name = 'UnknownSessionError';
    this.sessionId = sessionId;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
