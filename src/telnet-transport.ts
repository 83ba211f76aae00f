import { Socket, createConnection } from 'node:net';
import { StringDecoder } from 'node:string_decoder';
import { TelnetCodec } from './telnet-codec.js';
import type { TelnetStream } from './types.js';

/**
 * Buffered Telnet connection. Negotiation bytes are answered inline and never
 * reach readers; everything else is decoded as UTF-8 and queued until read.
 */
export class TelnetTransport implements TelnetStream {
  private buffer = '';
  private waiters: Array<() => void> = [];
  private isClosed = false;
  private failure: Error | null = null;
  private readonly decoder = new StringDecoder('utf8');
  private readonly codec = new TelnetCodec();

  constructor(private readonly socket: Socket) {
    socket.on('data', (chunk: Buffer) => this.onData(chunk));
    socket.on('error', (error: Error) => {
      this.failure = error;
      this.wake();
    });
    socket.on('close', () => {
      this.isClosed = true;
      this.wake();
    });
  }

  public get closed(): boolean {
    return this.isClosed;
  }

  public write(text: string): void {
    if (this.isClosed) {
      throw new Error('Telnet stream is closed');
    }
    this.socket.write(TelnetCodec.encode(text));
  }

  public flush(): Promise<void> {
    if (this.isClosed || !this.socket.writableNeedDrain) {
      return Promise.resolve();
    }
    return new Promise(resolve => {
      const done = () => {
        this.socket.off('drain', done);
        this.socket.off('close', done);
        resolve();
      };
      this.socket.on('drain', done);
      this.socket.on('close', done);
    });
  }

  /** `maxBytes` counts decoded characters. */
  public async readWithTimeout(maxBytes: number, timeoutMs: number): Promise<string> {
    if (!this.buffer) {
      this.throwIfBroken();
      await this.waitForData(timeoutMs);
    }
    if (!this.buffer) {
      this.throwIfBroken();
      return '';
    }
    const text = this.buffer.slice(0, maxBytes);
    this.buffer = this.buffer.slice(text.length);
    return text;
  }

  public close(): void {
    if (this.isClosed) {
      return;
    }
    this.isClosed = true;
    this.socket.destroy();
    this.wake();
  }

  private onData(chunk: Buffer): void {
    const { data, replies } = this.codec.decode(chunk);
    for (const reply of replies) {
      if (!this.socket.destroyed) {
        this.socket.write(reply);
      }
    }
    const text = this.decoder.write(data);
    if (text) {
      this.buffer += text;
      this.wake();
    }
  }

  private throwIfBroken(): void {
    if (this.failure) {
      throw this.failure;
    }
    if (this.isClosed) {
      throw new Error('Telnet stream is closed');
    }
  }

  private waitForData(timeoutMs: number): Promise<void> {
    return new Promise(resolve => {
      const done = () => {
        clearTimeout(timer);
        this.waiters = this.waiters.filter(waiter => waiter !== done);
        resolve();
      };
      const timer = setTimeout(done, Math.max(0, timeoutMs));
      this.waiters.push(done);
    });
  }

  private wake(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter();
    }
  }
}

export function openTelnet(host: string, port: number, timeoutMs: number): Promise<TelnetStream> {
  return new Promise((resolve, reject) => {
    const socket = createConnection({ host, port });

    const onError = (error: Error) => {
      clearTimeout(timer);
      socket.destroy();
      reject(error);
    };

    const timer = setTimeout(() => {
      socket.off('error', onError);
      socket.destroy();
      reject(new Error(`timed out after ${timeoutMs}ms`));
    }, timeoutMs);

    socket.once('error', onError);
    socket.once('connect', () => {
      clearTimeout(timer);
      socket.off('error', onError);
      socket.setNoDelay(true);
      resolve(new TelnetTransport(socket));
    });
  });
}
