export const IAC = 255;
export const DONT = 254;
export const DO = 253;
export const WONT = 252;
export const WILL = 251;
export const SB = 250;
export const SE = 240;

export const OPT_ECHO = 1;
export const OPT_SUPPRESS_GO_AHEAD = 3;
export const OPT_TERMINAL_TYPE = 24;

const TTYPE_IS = 0;
const TTYPE_SEND = 1;
const TERMINAL_TYPE = 'VT100';

type DecodeState = 'data' | 'iac' | 'option' | 'subnegotiation' | 'subnegotiation-iac';

export interface DecodedChunk {
  data: Buffer;
  replies: Buffer[];
}

/**
 * Splits a raw Telnet byte stream into application data and the negotiation
 * replies owed to the server. State survives across chunks, so a command cut
 * by a TCP segment boundary is still recognized.
 */
export class TelnetCodec {
  // Options we let the server enable on its side
  private static readonly ACCEPTED_REMOTE = new Set([OPT_ECHO, OPT_SUPPRESS_GO_AHEAD]);
  // Options we agree to enable on our side
  private static readonly ACCEPTED_LOCAL = new Set([OPT_SUPPRESS_GO_AHEAD, OPT_TERMINAL_TYPE]);

  private state: DecodeState = 'data';
  private verb = 0;
  private subnegotiation: number[] = [];
  private readonly sentReplies = new Set<string>();

  public decode(chunk: Buffer): DecodedChunk {
    const data: number[] = [];
    const replies: Buffer[] = [];

    for (const byte of chunk) {
      switch (this.state) {
        case 'data':
          if (byte === IAC) {
            this.state = 'iac';
          } else {
            data.push(byte);
          }
          break;

        case 'iac':
          if (byte === IAC) {
            data.push(IAC);
            this.state = 'data';
          } else if (byte === DO || byte === DONT || byte === WILL || byte === WONT) {
            this.verb = byte;
            this.state = 'option';
          } else if (byte === SB) {
            this.subnegotiation = [];
            this.state = 'subnegotiation';
          } else {
            // NOP, GA, AYT and friends carry nothing we act on
            this.state = 'data';
          }
          break;

        case 'option': {
          const reply = this.negotiate(this.verb, byte);
          if (reply) {
            replies.push(reply);
          }
          this.state = 'data';
          break;
        }

        case 'subnegotiation':
          if (byte === IAC) {
            this.state = 'subnegotiation-iac';
          } else {
            this.subnegotiation.push(byte);
          }
          break;

        case 'subnegotiation-iac':
          if (byte === SE) {
            const reply = this.answerSubnegotiation(this.subnegotiation);
            if (reply) {
              replies.push(reply);
            }
            this.state = 'data';
          } else {
            if (byte === IAC) {
              this.subnegotiation.push(IAC);
            }
            this.state = 'subnegotiation';
          }
          break;
      }
    }

    return { data: Buffer.from(data), replies };
  }

  /** Outgoing text as UTF-8, which never contains an IAC byte, so nothing needs doubling. */
  public static encode(text: string): Buffer {
    return Buffer.from(text, 'utf8');
  }

  private negotiate(verb: number, option: number): Buffer | null {
    let response: number;
    switch (verb) {
      case DO:
        response = TelnetCodec.ACCEPTED_LOCAL.has(option) ? WILL : WONT;
        break;
      case WILL:
        response = TelnetCodec.ACCEPTED_REMOTE.has(option) ? DO : DONT;
        break;
      case DONT:
        response = WONT;
        break;
      default:
        response = DONT;
        break;
    }

    // Each reply goes out at most once per connection
    const key = `${response}:${option}`;
    if (this.sentReplies.has(key)) {
      return null;
    }
    this.sentReplies.add(key);
    return Buffer.from([IAC, response, option]);
  }

  private answerSubnegotiation(payload: number[]): Buffer | null {
    if (payload[0] === OPT_TERMINAL_TYPE && payload[1] === TTYPE_SEND) {
      return Buffer.concat([
        Buffer.from([IAC, SB, OPT_TERMINAL_TYPE, TTYPE_IS]),
        Buffer.from(TERMINAL_TYPE, 'ascii'),
        Buffer.from([IAC, SE]),
      ]);
    }
    return null;
  }
}
