/**
 * In-process SA-MP server for tests. Binds a UDP socket on 127.0.0.1 and answers queries
 * the way a real server does, with configurable delays.
 */

import { createSocket, type RemoteInfo } from 'dgram';
import { Samp } from '../types';
import { config } from '../config';
import {
  decodeRconRequest,
  encodePlayerList,
  encodeRconLine,
  encodeRuleList,
  encodeServerInfo,
} from '../packet';
import { FixedDetector } from '../encoding';

const HEADER_SIZE = 10;

export interface ScheduledReply {
  /**
   * @description Milliseconds after the request was received.
   * */
  delay: number;
  datagram: Buffer;
}

export interface MockRequest {
  opcode: string;
  payload: Buffer;
}

export interface MockSampServerOptions {
  /**
   * @description Delay before answering a ping, which sets the client's measured latency.
   * */
  pingDelay?: number;
  info?: Samp.ServerInfo;
  players?: Samp.PlayerList;
  rules?: Samp.RuleList;
  /**
   * @description Answer the open.mp probe.
   * */
  omp?: boolean;
  /**
   * @description Unset means RCON is disabled: `x` requests are ignored.
   * */
  rconPassword?: string;
  /**
   * @description Lines printed by an RCON command.
   * */
  rconHandler?: (command: string) => string[];
  /**
   * @description Delay before each RCON line, counted from the previous one.
   * */
  rconSpacing?: number;
  /**
   * @description Replaces the default reply to a request when it returns an array.
   * */
  override?: (request: MockRequest, header: Buffer) => ScheduledReply[] | undefined;
}

export const DEFAULT_INFO: Samp.ServerInfo = {
  password: false,
  players: 2,
  maxPlayers: 50,
  name: 'Test Server',
  gamemode: 'Freeroam',
  language: 'English',
  encodings: { name: 'ascii', gamemode: 'ascii', language: 'ascii' },
};

export class MockSampServer {
  public readonly requests: MockRequest[] = [];
  private readonly socket = createSocket('udp4');
  private readonly timers = new Set<NodeJS.Timeout>();
  private client: RemoteInfo | null = null;
  private lastHeader: Buffer | null = null;

  constructor(private readonly options: MockSampServerOptions = {}) {
    this.socket.on('message', (msg, rinfo) => this.handleMessage(msg, rinfo));
  }

  /**
   * @description Bind to an ephemeral port and return it.
   * */
  public start(): Promise<number> {
    return new Promise((resolve, reject) => {
      this.socket.once('error', reject);
      this.socket.bind(0, '127.0.0.1', () => {
        this.socket.off('error', reject);
        resolve(this.socket.address().port);
      });
    });
  }

  public stop(): Promise<void> {
    for (const timer of this.timers) {
      clearTimeout(timer);
    }
    this.timers.clear();
    return new Promise((resolve) => this.socket.close(() => resolve()));
  }

  /**
   * @description Send a raw datagram to the last client seen.
   * */
  public push(datagram: Buffer): void {
    if (!this.client) {
      throw new Error('No client has talked to the mock server yet');
    }
    this.socket.send(datagram, this.client.port, this.client.address);
  }

  /**
   * @description Header of the last request, as echoed in replies.
   * */
  public get header(): Buffer {
    if (!this.lastHeader) {
      throw new Error('No request received yet');
    }
    return this.lastHeader;
  }

  private handleMessage(msg: Buffer, rinfo: RemoteInfo): void {
    if (msg.length <= HEADER_SIZE || !msg.subarray(0, 4).equals(config.protocol.magic)) {
      return;
    }
    this.client = rinfo;
    const header = msg.subarray(0, HEADER_SIZE);
    this.lastHeader = header;
    const request: MockRequest = {
      opcode: String.fromCharCode(msg[HEADER_SIZE]),
      payload: msg.subarray(HEADER_SIZE + 1),
    };
    this.requests.push(request);

    const replies = this.options.override?.(request, header) ?? this.defaultReplies(request, header);
    for (const { delay, datagram } of replies) {
      this.schedule(delay, datagram, rinfo);
    }
  }

  private defaultReplies(request: MockRequest, header: Buffer): ScheduledReply[] {
    const reply = (body: Buffer, delay = 0): ScheduledReply[] => [
      { delay, datagram: Buffer.concat([header, Buffer.from(request.opcode, 'ascii'), body]) },
    ];

    switch (request.opcode) {
      case Samp.Opcode.PING:
        return reply(request.payload, this.options.pingDelay ?? 0);
      case Samp.Opcode.INFO:
        return reply(encodeServerInfo(this.options.info ?? DEFAULT_INFO));
      case Samp.Opcode.PLAYERS:
        return reply(encodePlayerList(this.options.players ?? []));
      case Samp.Opcode.RULES:
        return reply(encodeRuleList(this.options.rules ?? []));
      case Samp.Opcode.OPEN_MP:
        return this.options.omp ? reply(request.payload) : [];
      case Samp.Opcode.RCON:
        return this.rconReplies(request, header);
      default:
        return [];
    }
  }

  private rconReplies(request: MockRequest, header: Buffer): ScheduledReply[] {
    const { rconPassword, rconHandler, rconSpacing = 0 } = this.options;
    if (rconPassword === undefined) {
      return [];
    }
    const { password, command } = decodeRconRequest(
      request.payload,
      new FixedDetector('windows-1252'),
    );
    const lines =
      password === rconPassword
        ? rconHandler?.(command) ?? []
        : [config.protocol.invalidRconPassword];

    return lines.map((line, i) => ({
      delay: (i + 1) * rconSpacing,
      datagram: Buffer.concat([header, Buffer.from(Samp.Opcode.RCON, 'ascii'), encodeRconLine(line)]),
    }));
  }

  private schedule(delay: number, datagram: Buffer, rinfo: RemoteInfo): void {
    const timer = setTimeout(() => {
      this.timers.delete(timer);
      this.socket.send(datagram, rinfo.port, rinfo.address);
    }, delay);
    this.timers.add(timer);
  }
}
