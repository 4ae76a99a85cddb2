import { Samp } from './types';
import { config } from './config';
import { decodeRconLine, encodeRconRequest, replyHeader } from './packet';
import { defaultDetector } from './encoding';
import { createLogger, type Logger } from './logger';
import { requirePrefix } from './transport';
import {
  InvalidRconPasswordError,
  MissingRconPasswordError,
  RconDisabledError,
} from './errors';
import { now } from './utils';

const password = Symbol('password');

export type MeasurePing = (options: Samp.QueryOptions) => Promise<number>;

export interface RconSessionOptions {
  transport: Samp.Transport;
  password?: string;
  /**
   * @description Fresh round-trip measurement, taken before every command.
   * */
  measurePing: MeasurePing;
  detector?: Samp.EncodingDetector;
  logger?: Logger;
}

/**
 * @description Sends RCON commands and collects their output.
 *
 * Replies come as one line per datagram, with no sequence number, count or terminator. The
 * output is therefore considered complete once no datagram arrived before the deadline, which
 * starts at `variance × ping` and is pushed back by the time spent waiting for each line.
 * */
export class RconSession {
  private readonly transport: Samp.Transport;
  private readonly [password]: string | undefined;
  private readonly measurePing: MeasurePing;
  private readonly detector: Samp.EncodingDetector;
  private readonly logger: Logger;

  /**
   * @private
   * @description Log prefix
   * */
  private get logprefix() {
    return `SAMP ${this.transport.host}:${this.transport.port}`;
  }

  constructor(options: RconSessionOptions) {
    this.transport = options.transport;
    this[password] = options.password;
    this.measurePing = options.measurePing;
    this.detector = options.detector ?? defaultDetector;
    this.logger = options.logger ?? createLogger('rcon');
  }

  /**
   * @description Run a command and return its output, lines joined with `\n`.
   * @throws {MissingRconPasswordError} No password configured; nothing is sent.
   * @throws {SampEncodingError} Password or command fits no supported code page; nothing is sent.
   * @throws {RconDisabledError} Not a single line came back.
   * @throws {InvalidRconPasswordError} The server rejected the password.
   * */
  public async send(command: string, options: Samp.QueryOptions = {}): Promise<string> {
    const secret = this[password];
    if (!secret) {
      throw new MissingRconPasswordError();
    }
    const payload = encodeRconRequest(secret, command);

    const rtt = await this.measurePing(options);
    await this.transport.send(Samp.Opcode.RCON, payload);

    const header = replyHeader(requirePrefix(this.transport), Samp.Opcode.RCON);
    const lines: string[] = [];
    let deadline = now() + config.protocol.variance * rtt;

    for (;;) {
      const waitStart = now();
      const body = await this.transport.receive(header, { deadline, signal: options.signal });
      if (body === null) {
        break;
      }
      lines.push(decodeRconLine(body, this.detector).text);
      deadline += now() - waitStart;
    }

    this.logger.debug(`${this.logprefix} RCON command done`, {
      command,
      lines: lines.length,
      rtt,
    });

    if (!lines.length) {
      throw new RconDisabledError(this.logprefix);
    }
    const output = lines.join('\n');
    if (output === config.protocol.invalidRconPassword) {
      throw new InvalidRconPasswordError(this.logprefix);
    }
    return output;
  }
}
