import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Samp } from './types';
import { UdpTransport } from './transport';
import { buildPrefix } from './packet';
import { now } from './utils';
import { MockSampServer } from './__mocks__/mock-samp-server';

const nonce = Buffer.from([1, 2, 3, 4]);

describe('UdpTransport', () => {
  let server: MockSampServer;
  let port: number;
  let transport: UdpTransport;

  beforeEach(async () => {
    // the tests push replies themselves
    server = new MockSampServer({ override: () => [] });
    port = await server.start();
    transport = new UdpTransport({ host: '127.0.0.1', port });
  });

  afterEach(async () => {
    transport.disconnect();
    await server.stop();
  });

  async function sendPing(): Promise<Buffer> {
    await transport.send(Samp.Opcode.PING, nonce);
    await vi.waitFor(() => expect(server.requests).toHaveLength(1));
    return server.header;
  }

  it('connects on first send and derives the prefix', async () => {
    expect(transport.connected).toBe(false);
    expect(transport.prefix).toBeNull();

    await sendPing();

    expect(transport.connected).toBe(true);
    expect(transport.prefix).toEqual(buildPrefix(Buffer.from([127, 0, 0, 1]), port));
    expect(server.header).toEqual(transport.prefix);
    expect(server.requests[0]).toEqual({ opcode: 'p', payload: nonce });
  });

  it('computes the prefix from the resolved address', async () => {
    transport = new UdpTransport({ host: 'localhost', port });
    await transport.connect();
    expect(transport.host).toBe('127.0.0.1');
    expect(transport.prefix).toEqual(buildPrefix(Buffer.from([127, 0, 0, 1]), port));
  });

  it('shares one pending connect between callers', async () => {
    await Promise.all([transport.connect(), transport.connect()]);
    expect(transport.connected).toBe(true);
  });

  it('discards datagrams that do not match the header', async () => {
    const header = await sendPing();
    const infoHeader = Buffer.concat([header, Buffer.from('i')]);

    server.push(Buffer.from('not a samp packet'));
    server.push(Buffer.concat([header, Buffer.from('c'), Buffer.from([0, 0])]));
    server.push(Buffer.concat([infoHeader, Buffer.from([9, 9])]));

    expect(await transport.receive(infoHeader)).toEqual(Buffer.from([9, 9]));
  });

  it('requires an empty body in exact mode', async () => {
    const header = await sendPing();
    const pingHeader = Buffer.concat([header, Buffer.from('p'), nonce]);

    server.push(Buffer.concat([pingHeader, Buffer.from([0])]));
    server.push(pingHeader);

    const body = await transport.receive(pingHeader, { exact: true });
    expect(body).toHaveLength(0);
  });

  it('resolves null once the deadline passes', async () => {
    const header = await sendPing();
    const start = now();
    const body = await transport.receive(header, { deadline: start + 30 });
    expect(body).toBeNull();
    expect(now() - start).toBeGreaterThanOrEqual(25);
  });

  it('returns a datagram that arrives before the deadline', async () => {
    const header = await sendPing();
    setTimeout(() => server.push(Buffer.concat([header, Buffer.from('x'), Buffer.from([0])])), 10);
    const body = await transport.receive(Buffer.concat([header, Buffer.from('x')]), {
      deadline: now() + 500,
    });
    expect(body).toEqual(Buffer.from([0]));
  });

  it('rejects with the abort reason', async () => {
    const header = await sendPing();
    const controller = new AbortController();
    setTimeout(() => controller.abort(new Error('stop waiting')), 10);
    await expect(transport.receive(header, { signal: controller.signal })).rejects.toThrow(
      'stop waiting',
    );
  });

  it('allows a single pending receive and rejects it on disconnect', async () => {
    const header = await sendPing();
    const first = transport.receive(header);

    await expect(transport.receive(header)).rejects.toThrow('another receive is already pending');

    transport.disconnect();
    await expect(first).rejects.toThrow(`SAMP 127.0.0.1:${port} disconnected`);
    expect(transport.connected).toBe(false);
  });

  it('keeps datagrams that arrive before receive is called', async () => {
    const header = await sendPing();
    const infoHeader = Buffer.concat([header, Buffer.from('i')]);

    server.push(Buffer.concat([infoHeader, Buffer.from([7])]));
    await vi.waitFor(() => expect(transport.queuedDatagrams).toBe(1));

    expect(await transport.receive(infoHeader)).toEqual(Buffer.from([7]));
    expect(transport.queuedDatagrams).toBe(0);
  });

  it('drops the oldest queued datagram when the inbox is full', async () => {
    const header = await sendPing();
    const rconHeader = Buffer.concat([header, Buffer.from('x')]);

    for (let i = 0; i < 65; i++) {
      server.push(Buffer.concat([rconHeader, Buffer.from([i])]));
    }
    await vi.waitFor(() => expect(transport.queuedDatagrams).toBe(64));

    expect(await transport.receive(rconHeader)).toEqual(Buffer.from([1]));
    expect(transport.queuedDatagrams).toBe(63);
  });

  it('forgets queued datagrams on disconnect', async () => {
    const header = await sendPing();
    server.push(Buffer.concat([header, Buffer.from('i')]));
    await vi.waitFor(() => expect(transport.queuedDatagrams).toBe(1));

    transport.disconnect();
    expect(transport.queuedDatagrams).toBe(0);
  });

  it('abandons a connect that is still in flight on disconnect', async () => {
    const pending = transport.connect();
    transport.disconnect();

    await expect(pending).rejects.toThrow(`SAMP 127.0.0.1:${port} disconnected`);
    expect(transport.connected).toBe(false);
    expect(transport.prefix).toBeNull();

    await transport.connect();
    expect(transport.connected).toBe(true);
  });

  it('refuses to receive before connecting', async () => {
    await expect(transport.receive(Buffer.from('SAMP'))).rejects.toThrow('socket is not connected');
  });
});
