import { Samp } from './types';
import { UdpTransport } from './transport';
import { RconSession } from './rcon';
import { defaultDetector } from './encoding';
import * as query from './query';

export class SampClient {
  public readonly transport: Samp.Transport;
  private readonly detector: Samp.EncodingDetector;
  private readonly $rcon: RconSession;

  public connected(): boolean {
    return this.transport.connected;
  }

  /**
   * @description Construct a query/RCON client. No I/O happens until the first request.
   * One request may be in flight at a time; use one client per concurrent caller.
   * @example
   * ```ts
   * const client = new SampClient({ host: '127.0.0.1', port: 7777, rconPassword: 'changeme' });
   * console.log(await client.info());
   * client.disconnect();
   * ```
   * */
  constructor(options: Samp.ClientOptions) {
    this.transport = new UdpTransport(options);
    this.detector = options.detector ?? defaultDetector;
    this.$rcon = new RconSession({
      transport: this.transport,
      password: options.rconPassword,
      measurePing: (pingOptions) => this.ping(pingOptions),
      detector: this.detector,
      logger: options.logger,
    });
  }

  /**
   * @description Resolve the host and open the socket. Requests do this on their own.
   * */
  public async connect(): Promise<void> {
    await this.transport.connect();
  }

  public disconnect(): void {
    return this.transport.disconnect();
  }

  /**
   * @description Round-trip time in milliseconds. Unbounded unless `options.signal` aborts it.
   * */
  public async ping(options?: Samp.QueryOptions): Promise<number> {
    return query.ping(this.transport, options);
  }

  public async info(options?: Samp.QueryOptions): Promise<Samp.ServerInfo> {
    return query.info(this.transport, this.detector, options);
  }

  public async players(options?: Samp.QueryOptions): Promise<Samp.PlayerList> {
    return query.players(this.transport, options);
  }

  public async rules(options?: Samp.QueryOptions): Promise<Samp.RuleList> {
    return query.rules(this.transport, this.detector, options);
  }

  /**
   * @description `true` when the server answers the open.mp probe within `5 × ping`.
   * */
  public async isOmp(options?: Samp.QueryOptions): Promise<boolean> {
    return query.isOmp(this.transport, options);
  }

  /**
   * @description Run an RCON command.
   * @param {string} command Command.
   * @param {Samp.QueryOptions} [options] Options
   * */
  public async rcon(command: string, options?: Samp.QueryOptions): Promise<string> {
    return this.$rcon.send(command, options);
  }
}
