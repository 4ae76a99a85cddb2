import type { Logger } from './logger';

export namespace Samp {
  /**
   * @description Request/reply opcodes. The server echoes the opcode of the request in its reply.
   * */
  export enum Opcode {
    PING = 'p',
    INFO = 'i',
    PLAYERS = 'c',
    RULES = 'r',
    OPEN_MP = 'o',
    RCON = 'x',
  }

  /**
   * @description Text decoded from the wire, together with the encoding it was decoded with.
   * */
  export interface DecodedText {
    text: string;
    encoding: string;
  }

  /**
   * @description Strategy used to guess the encoding of inbound strings.
   * Returns `null` when it cannot tell.
   * */
  export interface EncodingDetector {
    detect(bytes: Buffer): string | null;
  }

  export interface ServerInfo {
    password: boolean;
    players: number;
    maxPlayers: number;
    name: string;
    gamemode: string;
    language: string;
    /**
     * @description Encodings detected for each text field. Diagnostic only.
     * */
    encodings: {
      name: string;
      gamemode: string;
      language: string;
    };
  }

  export interface PlayerInfo {
    name: string;
    score: number;
  }

  export type PlayerList = PlayerInfo[];

  export interface Rule {
    name: string;
    value: string;
    encoding: string;
  }

  export type RuleList = Rule[];

  export interface Transport {
    readonly host: string;
    readonly port: number;
    readonly connected: boolean;
    readonly prefix: Buffer | null;

    connect(): Promise<void>;

    disconnect(): void;

    send(opcode: Opcode, payload?: Buffer): Promise<void>;

    receive(header: Buffer, options?: ReceiveOptions & { deadline?: undefined }): Promise<Buffer>;
    receive(header: Buffer, options: ReceiveOptions): Promise<Buffer | null>;
  }

  export interface ReceiveOptions {
    /**
     * @description Absolute monotonic time (ms, `performance.now()` clock) after which
     * the wait resolves with `null`.
     * */
    deadline?: number;
    /**
     * @description Only accept datagrams equal to the header, with no trailing body.
     * */
    exact?: boolean;
    signal?: AbortSignal;
  }

  export interface ClientOptions {
    /**
     * @description Host name / IPv4.
     * */
    host: string;
    /**
     * @description Port number.
     * */
    port: number;
    /**
     * @description RCON password. Required by `rcon()` only.
     * */
    rconPassword?: string;
    /**
     * @description Encoding detector for inbound text.
     * @default JschardetDetector
     * */
    detector?: EncodingDetector;
    logger?: Logger;
  }

  export interface QueryOptions {
    /**
     * @description Aborts the wait for a reply. The client imposes no timeout of its own
     * on ping, info, players and rules.
     * */
    signal?: AbortSignal;
  }
}
