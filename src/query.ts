import { randomBytes } from 'crypto';
import { Samp } from './types';
import { config } from './config';
import { decodePlayerList, decodeRuleList, decodeServerInfo, replyHeader } from './packet';
import { defaultDetector } from './encoding';
import { requirePrefix } from './transport';
import { now } from './utils';

/**
 * @description Send a bare opcode and wait (unbounded) for the body of its reply.
 * */
async function request(
  transport: Samp.Transport,
  opcode: Samp.Opcode,
  options: Samp.QueryOptions,
): Promise<Buffer> {
  await transport.send(opcode);
  return transport.receive(replyHeader(requirePrefix(transport), opcode), {
    signal: options.signal,
  });
}

/**
 * @description Round-trip time in milliseconds. The random nonce only serves to tell our reply
 * apart from stray or duplicated ones.
 * */
export async function ping(
  transport: Samp.Transport,
  options: Samp.QueryOptions = {},
): Promise<number> {
  const nonce = randomBytes(config.protocol.nonceSize);
  const start = now();
  await transport.send(Samp.Opcode.PING, nonce);
  await transport.receive(replyHeader(requirePrefix(transport), Samp.Opcode.PING, nonce), {
    exact: true,
    signal: options.signal,
  });
  return now() - start;
}

export async function info(
  transport: Samp.Transport,
  detector: Samp.EncodingDetector = defaultDetector,
  options: Samp.QueryOptions = {},
): Promise<Samp.ServerInfo> {
  return decodeServerInfo(await request(transport, Samp.Opcode.INFO, options), detector);
}

/**
 * @description Servers with more than 100 players online don't answer this at all.
 * */
export async function players(
  transport: Samp.Transport,
  options: Samp.QueryOptions = {},
): Promise<Samp.PlayerList> {
  return decodePlayerList(await request(transport, Samp.Opcode.PLAYERS, options));
}

export async function rules(
  transport: Samp.Transport,
  detector: Samp.EncodingDetector = defaultDetector,
  options: Samp.QueryOptions = {},
): Promise<Samp.RuleList> {
  return decodeRuleList(await request(transport, Samp.Opcode.RULES, options), detector);
}

/**
 * @description Whether the server runs open.mp. Only open.mp answers the `o` opcode, so a
 * reply within `variance × ping` means yes and silence means no.
 * */
export async function isOmp(
  transport: Samp.Transport,
  options: Samp.QueryOptions = {},
): Promise<boolean> {
  const latency = await ping(transport, options);
  const nonce = randomBytes(config.protocol.nonceSize);
  await transport.send(Samp.Opcode.OPEN_MP, nonce);
  const reply = await transport.receive(
    replyHeader(requirePrefix(transport), Samp.Opcode.OPEN_MP, nonce),
    {
      exact: true,
      deadline: now() + config.protocol.variance * latency,
      signal: options.signal,
    },
  );
  return reply !== null;
}
