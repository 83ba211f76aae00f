import { describe, it, expect, beforeEach } from 'vitest';
import {
  DO,
  DONT,
  IAC,
  OPT_ECHO,
  OPT_SUPPRESS_GO_AHEAD,
  OPT_TERMINAL_TYPE,
  SB,
  SE,
  TelnetCodec,
  WILL,
  WONT,
} from '../telnet-codec.js';

const OPT_NAWS = 31;
const OPT_LINEMODE = 34;

describe('TelnetCodec', () => {
  let codec: TelnetCodec;

  beforeEach(() => {
    codec = new TelnetCodec();
  });

  it('passes plain data through untouched', () => {
    const { data, replies } = codec.decode(Buffer.from('SW1#', 'ascii'));
    expect(data.toString('ascii')).toBe('SW1#');
    expect(replies).toEqual([]);
  });

  it('turns an escaped IAC into a literal 0xFF byte', () => {
    const { data } = codec.decode(Buffer.from([0x41, IAC, IAC, 0x42]));
    expect([...data]).toEqual([0x41, 0xff, 0x42]);
  });

  it('removes negotiation from the data stream', () => {
    const { data, replies } = codec.decode(Buffer.from([0x41, IAC, WILL, OPT_ECHO, 0x42]));
    expect(data.toString('ascii')).toBe('AB');
    expect(replies).toEqual([Buffer.from([IAC, DO, OPT_ECHO])]);
  });

  it('accepts the options a line-oriented client supports', () => {
    const { replies } = codec.decode(Buffer.from([
      IAC, DO, OPT_TERMINAL_TYPE,
      IAC, DO, OPT_SUPPRESS_GO_AHEAD,
      IAC, WILL, OPT_SUPPRESS_GO_AHEAD,
    ]));
    expect(replies).toEqual([
      Buffer.from([IAC, WILL, OPT_TERMINAL_TYPE]),
      Buffer.from([IAC, WILL, OPT_SUPPRESS_GO_AHEAD]),
      Buffer.from([IAC, DO, OPT_SUPPRESS_GO_AHEAD]),
    ]);
  });

  it('refuses everything else', () => {
    const { replies } = codec.decode(Buffer.from([IAC, DO, OPT_NAWS, IAC, WILL, OPT_LINEMODE, IAC, DONT, OPT_ECHO]));
    expect(replies).toEqual([
      Buffer.from([IAC, WONT, OPT_NAWS]),
      Buffer.from([IAC, DONT, OPT_LINEMODE]),
      Buffer.from([IAC, WONT, OPT_ECHO]),
    ]);
  });

  it('answers a repeated request only once', () => {
    const first = codec.decode(Buffer.from([IAC, DO, OPT_NAWS]));
    const second = codec.decode(Buffer.from([IAC, DO, OPT_NAWS]));
    expect(first.replies).toHaveLength(1);
    expect(second.replies).toEqual([]);
  });

  it('keeps parser state across chunk boundaries', () => {
    const first = codec.decode(Buffer.from([0x53, IAC]));
    const second = codec.decode(Buffer.from([DO, OPT_TERMINAL_TYPE, 0x57]));
    expect(first.data.toString('ascii')).toBe('S');
    expect(first.replies).toEqual([]);
    expect(second.data.toString('ascii')).toBe('W');
    expect(second.replies).toEqual([Buffer.from([IAC, WILL, OPT_TERMINAL_TYPE])]);
  });

  it('reports its terminal type when asked', () => {
    const { data, replies } = codec.decode(Buffer.from([IAC, SB, OPT_TERMINAL_TYPE, 1, IAC, SE]));
    expect(data.length).toBe(0);
    expect(replies).toEqual([
      Buffer.concat([
        Buffer.from([IAC, SB, OPT_TERMINAL_TYPE, 0]),
        Buffer.from('VT100', 'ascii'),
        Buffer.from([IAC, SE]),
      ]),
    ]);
  });

  it('ignores subnegotiation it does not understand', () => {
    const { data, replies } = codec.decode(Buffer.from([IAC, SB, OPT_NAWS, 0, 80, 0, 24, IAC, SE, 0x3e]));
    expect(data.toString('ascii')).toBe('>');
    expect(replies).toEqual([]);
  });

  it('encodes outgoing text as UTF-8', () => {
    expect(TelnetCodec.encode('show version\r\n')).toEqual(Buffer.from('show version\r\n', 'utf8'));
  });
});
