import express from 'express';
import { Server, createServer } from 'http';
import { WebSocket, WebSocketServer } from 'ws';
import type { VersionInfo } from './cli-options.js';
import { UnknownSessionError, errorMessage } from './errors.js';
import type { SessionManager } from './session-manager.js';

export function createWebApp(sessionManager: SessionManager, versionInfo: VersionInfo): express.Express {
  const app = express();

  app.get('/', (_req, res) => {
    res.json({
      name: versionInfo.name,
      version: versionInfo.version,
      sessions: sessionManager.listSessions().length,
      logs: sessionManager.getLogStats()
    });
  });

  app.get('/api/sessions', (_req, res) => {
    res.json({ sessions: sessionManager.listSessions() });
  });

  app.get('/api/session/:sessionId', (req, res) => {
    try {
      const session = sessionManager.getSession(req.params.sessionId);
      res.json({
        ...session.toSummary(),
        history: session.history,
        lastActivity: session.lastActivity.toISOString()
      });
    } catch (error) {
      if (error instanceof UnknownSessionError) {
        res.status(404).json({ error: error.message });
        return;
      }
      res.status(500).json({ error: errorMessage(error) });
    }
  });

  return app;
}

/**
 * Mirrors everything read from a session's device to browser clients on
 * /terminal?sessionId=<id>. The mirror is read-only: the executor is the
 * device's only writer.
 */
export function attachTerminalMirror(httpServer: Server, sessionManager: SessionManager): WebSocketServer {
  const wss = new WebSocketServer({ server: httpServer, path: '/terminal' });

  wss.on('connection', (ws: WebSocket, req) => {
    const requestUrl = new URL(req.url ?? '', 'http://localhost');
    const sessionId = requestUrl.searchParams.get('sessionId');

    if (!sessionId) {
      ws.send('Error: sessionId is required\r\n');
      ws.close();
      return;
    }

    let unsubscribe: () => void;
    try {
      const session = sessionManager.getSession(sessionId);
      unsubscribe = session.onData(data => {
        if (ws.readyState === WebSocket.OPEN) {
          ws.send(data);
        }
      });
    } catch (error) {
      ws.send(`Error: ${errorMessage(error)}\r\n`);
      ws.close();
      return;
    }

    sessionManager.log(`WebSocket mirror attached`, sessionId);

    ws.on('message', () => {
      sessionManager.log(`WebSocket input ignored, mirror is read-only`, sessionId);
    });

    ws.on('close', () => {
      unsubscribe();
      sessionManager.log(`WebSocket mirror detached`, sessionId);
    });
  });

  return wss;
}

// Find available port starting from basePort
export function findAvailablePort(startPort: number): Promise<number> {
  return new Promise((resolve, reject) => {
    const probe = createServer();

    probe.listen(startPort, () => {
      const address = probe.address();
      const port = typeof address === 'object' && address ? address.port : startPort;
      probe.close(() => {
        resolve(port);
      });
    });

    probe.on('error', (err: NodeJS.ErrnoException) => {
      if (err.code === 'EADDRINUSE') {
        findAvailablePort(startPort + 1).then(resolve, reject);
      } else {
        reject(err);
      }
    });
  });
}

export async function startWebServer(
  sessionManager: SessionManager,
  basePort: number,
  versionInfo: VersionInfo
): Promise<{ server: Server; port: number }> {
  const httpServer = createServer(createWebApp(sessionManager, versionInfo));
  attachTerminalMirror(httpServer, sessionManager);

  const port = await findAvailablePort(basePort);
  await new Promise<void>((resolve, reject) => {
    httpServer.once('error', reject);
    httpServer.listen(port, () => {
      httpServer.off('error', reject);
      resolve();
    });
  });

  console.error(`Web monitor available at http://localhost:${port}`);
  console.error(`Mirror a session: ws://localhost:${port}/terminal?sessionId=YOUR_SESSION_ID`);
  console.error(`Use --no-web-ui to disable the web monitor`);
  return { server: httpServer, port };
}
