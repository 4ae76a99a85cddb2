import { createSocket, Socket } from 'dgram';
import { lookup } from 'dns/promises';
import { Samp } from './types';
import { config } from './config';
import { buildPrefix } from './packet';
import { createLogger, type Logger } from './logger';
import { ipv4ToBuffer, now, prefixError } from './utils';

type Waiter = {
  header: Buffer;
  exact: boolean;
  resolve: (body: Buffer | null) => void;
  reject: (err: unknown) => void;
};

/**
 * @description Correlation prefix of a transport that has sent at least once.
 * */
export function requirePrefix(transport: Samp.Transport): Buffer {
  const { prefix } = transport;
  if (!prefix) {
    throw new Error(`SAMP ${transport.host}:${transport.port} socket is not connected`);
  }
  return prefix;
}

export type TransportOptions = Pick<Samp.ClientOptions, 'host' | 'port' | 'logger'>;

/**
 * @description One UDP association with a server. The socket is opened lazily on the first
 * `send()` and is connected, so the kernel only hands us datagrams from that peer.
 *
 * Replies carry no request id: only one `receive()` may be pending at a time.
 * */
export class UdpTransport implements Samp.Transport {
  public readonly port: number;
  private $host: string;
  private $socket: Socket | null = null;
  private $prefix: Buffer | null = null;
  private $connectPromise: Promise<void> | null = null;
  private $waiter: Waiter | null = null;
  private readonly $inbox: Buffer[] = [];
  // bumped by disconnect() so an open() in flight knows to give up
  private $generation = 0;
  private readonly logger: Logger;

  /**
   * @private
   * @description Log prefix
   * */
  private get logprefix() {
    return `SAMP ${this.$host}:${this.port}`;
  }

  /**
   * @description Configured host until connected, resolved IPv4 address afterwards.
   * */
  public get host(): string {
    return this.$host;
  }

  public get connected(): boolean {
    return this.$socket !== null;
  }

  /**
   * @description `"SAMP"` + address + port, or `null` before the first connect.
   * */
  public get prefix(): Buffer | null {
    return this.$prefix;
  }

  /**
   * @description Datagrams waiting for the next `receive()`.
   * */
  public get queuedDatagrams(): number {
    return this.$inbox.length;
  }

  constructor(options: TransportOptions) {
    this.$host = options.host;
    this.port = options.port;
    this.logger = options.logger ?? createLogger('transport');
  }

  /**
   * @description Resolve the host and open the socket.
   * If called while connecting, will return a promise that resolves as soon as the socket is ready.
   * */
  public async connect(): Promise<void> {
    if (this.$socket) {
      return;
    }
    if (!this.$connectPromise) {
      this.$connectPromise = this.open().finally(() => {
        this.$connectPromise = null;
      });
    }
    return this.$connectPromise;
  }

  /**
   * @description Close the socket. A pending `receive()` or `connect()` is rejected; the next
   * `send()` reconnects.
   * */
  public disconnect(): void {
    this.$generation++;
    const socket = this.$socket;
    this.$socket = null;
    this.$prefix = null;
    this.$inbox.length = 0;
    this.$waiter?.reject(new Error(`${this.logprefix} disconnected`));
    socket?.close();
  }

  /**
   * @description Send `prefix + opcode + payload`, connecting first if needed.
   * */
  public async send(opcode: Samp.Opcode, payload: Buffer = Buffer.alloc(0)): Promise<void> {
    await this.connect();
    const socket = this.$socket;
    const prefix = this.$prefix;
    if (!socket || !prefix) {
      throw new Error(`${this.logprefix} socket is not connected`);
    }
    const datagram = Buffer.concat([prefix, Buffer.from(opcode, 'ascii'), payload]);
    this.logger.debug(`${this.logprefix} send '${opcode}'`, { bytes: datagram.length });
    return new Promise((resolve, reject) => {
      socket.send(datagram, (err) => {
        if (err) {
          reject(prefixError(this.logprefix, err));
        } else {
          resolve();
        }
      });
    });
  }

  /**
   * @description Wait for a datagram starting with `header` and return what follows it.
   * Other datagrams are discarded. Without a deadline the wait is unbounded.
   * */
  public receive(
    header: Buffer,
    options?: Samp.ReceiveOptions & { deadline?: undefined },
  ): Promise<Buffer>;
  /**
   * @description Same as above, resolving `null` once `options.deadline` is reached.
   * */
  public receive(header: Buffer, options: Samp.ReceiveOptions): Promise<Buffer | null>;
  public async receive(
    header: Buffer,
    options: Samp.ReceiveOptions = {},
  ): Promise<Buffer | null> {
    const { deadline, exact = false, signal } = options;
    if (!this.$socket) {
      throw new Error(`${this.logprefix} socket is not connected`);
    }
    if (this.$waiter) {
      throw new Error(`${this.logprefix} another receive is already pending`);
    }

    let queued = this.$inbox.shift();
    while (queued) {
      const body = this.match(queued, header, exact);
      if (body) {
        return body;
      }
      this.discard(queued);
      queued = this.$inbox.shift();
    }

    signal?.throwIfAborted();

    return new Promise<Buffer | null>((resolve, reject) => {
      let timer: NodeJS.Timeout | null = null;
      const cleanup = () => {
        this.$waiter = null;
        if (timer) {
          clearTimeout(timer);
        }
        signal?.removeEventListener('abort', handleAbort);
      };
      const handleAbort = () => {
        cleanup();
        reject(signal?.reason);
      };

      this.$waiter = {
        header,
        exact,
        resolve: (body) => {
          cleanup();
          resolve(body);
        },
        reject: (err) => {
          cleanup();
          reject(err);
        },
      };
      if (deadline !== undefined) {
        timer = setTimeout(() => this.$waiter?.resolve(null), Math.max(0, deadline - now()));
      }
      signal?.addEventListener('abort', handleAbort, { once: true });
    });
  }

  private async open(): Promise<void> {
    const generation = this.$generation;
    let address: string;
    try {
      ({ address } = await lookup(this.$host, { family: 4 }));
    } catch (err) {
      throw prefixError(this.logprefix, err);
    }
    if (generation !== this.$generation) {
      throw new Error(`${this.logprefix} disconnected`);
    }
    if (address !== this.$host) {
      this.logger.debug(`${this.logprefix} resolved to ${address}`);
      this.$host = address;
    }

    const socket = createSocket('udp4');
    await new Promise<void>((resolve, reject) => {
      const handleConnectionError = (err: Error) => {
        socket.close();
        reject(prefixError(this.logprefix, err));
      };
      socket.once('error', handleConnectionError);
      socket.connect(this.port, address, () => {
        socket.off('error', handleConnectionError);
        resolve();
      });
    });

    if (generation !== this.$generation) {
      socket.close();
      throw new Error(`${this.logprefix} disconnected`);
    }

    socket
      .on('message', (datagram: Buffer) => this.handleMessage(datagram))
      .on('error', (err) => this.handleError(err));
    this.$socket = socket;
    this.$prefix = buildPrefix(ipv4ToBuffer(address), this.port);
  }

  /**
   * @private
   * @description Hand a datagram to the pending receive, or queue it for the next one.
   * */
  private handleMessage(datagram: Buffer): void {
    const waiter = this.$waiter;
    if (!waiter) {
      if (this.$inbox.length >= config.transport.maxQueuedDatagrams) {
        this.discard(this.$inbox.shift());
      }
      this.$inbox.push(datagram);
      return;
    }
    const body = this.match(datagram, waiter.header, waiter.exact);
    if (body) {
      waiter.resolve(body);
    } else {
      this.discard(datagram);
    }
  }

  /**
   * @private
   * @description Error handler for the pending receive.
   * */
  private handleError(err: Error): void {
    const waiter = this.$waiter;
    if (!waiter) {
      this.logger.warn(`${this.logprefix} ${err.message}`);
      return;
    }
    waiter.reject(prefixError(this.logprefix, err));
  }

  private match(datagram: Buffer, header: Buffer, exact: boolean): Buffer | null {
    if (datagram.length < header.length) {
      return null;
    }
    if (!datagram.subarray(0, header.length).equals(header)) {
      return null;
    }
    const body = datagram.subarray(header.length);
    if (exact && body.length) {
      return null;
    }
    return body;
  }

  private discard(datagram: Buffer | undefined): void {
    if (datagram) {
      this.logger.debug(`${this.logprefix} discarded unexpected datagram`, {
        bytes: datagram.length,
      });
    }
  }
}
