import { describe, it, expect, afterEach } from 'vitest';
import { Server, Socket, createServer } from 'node:net';
import { DO, IAC, OPT_TERMINAL_TYPE, WILL } from '../telnet-codec.js';
import { openTelnet } from '../telnet-transport.js';
import type { TelnetStream } from '../types.js';

interface FakeConsole {
  server: Server;
  port: number;
  connected: Promise<Socket>;
}

function startFakeConsole(): Promise<FakeConsole> {
  return new Promise(resolve => {
    let onConnect: (socket: Socket) => void = () => undefined;
    const connected = new Promise<Socket>(resolveSocket => {
      onConnect = resolveSocket;
    });
    const server = createServer(socket => onConnect(socket));
    server.listen(0, '127.0.0.1', () => {
      const address = server.address();
      const port = typeof address === 'object' && address ? address.port : 0;
      resolve({ server, port, connected });
    });
  });
}

function collect(socket: Socket, byteCount: number): Promise<Buffer> {
  return new Promise(resolve => {
    const chunks: Buffer[] = [];
    let total = 0;
    const onData = (chunk: Buffer) => {
      chunks.push(chunk);
      total += chunk.length;
      if (total >= byteCount) {
        socket.off('data', onData);
        resolve(Buffer.concat(chunks));
      }
    };
    socket.on('data', onData);
  });
}

describe('TelnetTransport', () => {
  let fake: FakeConsole | undefined;
  let stream: TelnetStream | undefined;

  afterEach(async () => {
    stream?.close();
    stream = undefined;
    if (fake) {
      const sockets = await Promise.race([fake.connected, Promise.resolve(null)]);
      sockets?.destroy();
      await new Promise(resolve => fake?.server.close(resolve));
      fake = undefined;
    }
  });

  it('delivers device text and answers negotiation', async () => {
    fake = await startFakeConsole();
    stream = await openTelnet('127.0.0.1', fake.port, 1000);
    const device = await fake.connected;

    const reply = collect(device, 3);
    device.write(Buffer.concat([
      Buffer.from([IAC, DO, OPT_TERMINAL_TYPE]),
      Buffer.from('\r\nSW1>', 'ascii'),
    ]));

    let text = '';
    while (text.length < '\r\nSW1>'.length) {
      text += await stream.readWithTimeout(4096, 1000);
    }
    expect(text).toBe('\r\nSW1>');
    expect(await reply).toEqual(Buffer.from([IAC, WILL, OPT_TERMINAL_TYPE]));
  });

  it('returns an empty string when the device stays silent', async () => {
    fake = await startFakeConsole();
    stream = await openTelnet('127.0.0.1', fake.port, 1000);

    const started = Date.now();
    expect(await stream.readWithTimeout(4096, 50)).toBe('');
    expect(Date.now() - started).toBeGreaterThanOrEqual(40);
  });

  it('hands out at most maxBytes per read', async () => {
    fake = await startFakeConsole();
    stream = await openTelnet('127.0.0.1', fake.port, 1000);
    const device = await fake.connected;

    device.write('abcdef');
    await new Promise(resolve => setTimeout(resolve, 30));
    expect(await stream.readWithTimeout(4, 1000)).toBe('abcd');
    expect(await stream.readWithTimeout(4, 1000)).toBe('ef');
  });

  it('sends written text to the device', async () => {
    fake = await startFakeConsole();
    stream = await openTelnet('127.0.0.1', fake.port, 1000);
    const device = await fake.connected;

    const received = collect(device, 'show version\r\n'.length);
    stream.write('show version\r\n');
    await stream.flush();

    expect((await received).toString('utf8')).toBe('show version\r\n');
  });

  it('rejects reads and writes once closed', async () => {
    fake = await startFakeConsole();
    stream = await openTelnet('127.0.0.1', fake.port, 1000);

    stream.close();
    expect(stream.closed).toBe(true);
    expect(() => stream?.write('x')).toThrow('Telnet stream is closed');
    await expect(stream.readWithTimeout(4096, 50)).rejects.toThrow('Telnet stream is closed');
  });

  it('notices when the device hangs up', async () => {
    fake = await startFakeConsole();
    stream = await openTelnet('127.0.0.1', fake.port, 1000);
    const device = await fake.connected;

    device.end('bye\r\n');
    expect(await stream.readWithTimeout(4096, 1000)).toBe('bye\r\n');
    await expect(stream.readWithTimeout(4096, 1000)).rejects.toThrow('Telnet stream is closed');
    expect(stream.closed).toBe(true);
  });

  it('fails to open a port nobody listens on', async () => {
    const probe = await startFakeConsole();
    const port = probe.port;
    await new Promise(resolve => probe.server.close(resolve));

    await expect(openTelnet('127.0.0.1', port, 1000)).rejects.toThrow();
  });
});
