import { Samp } from './types';
import { config } from './config';
import { PacketReader, PacketWriter } from './codec';
import { defaultDetector } from './encoding';

/**
 * @description Correlation prefix shared by every datagram of a session:
 * `"SAMP"`, the server's IPv4 address and its port (little-endian).
 * */
export function buildPrefix(address: Buffer, port: number): Buffer {
  const portBuffer = Buffer.alloc(2);
  portBuffer.writeUInt16LE(port, 0);
  return Buffer.concat([config.protocol.magic, address, portBuffer]);
}

/**
 * @description Header a reply to `opcode` starts with, optionally followed by the echoed nonce.
 * */
export function replyHeader(prefix: Buffer, opcode: Samp.Opcode, nonce?: Buffer): Buffer {
  const parts = [prefix, Buffer.from(opcode, 'ascii')];
  if (nonce) {
    parts.push(nonce);
  }
  return Buffer.concat(parts);
}

export function decodeServerInfo(
  body: Buffer,
  detector: Samp.EncodingDetector = defaultDetector,
): Samp.ServerInfo {
  const reader = new PacketReader(body, detector);
  const password = reader.bool();
  const players = reader.uint16();
  const maxPlayers = reader.uint16();
  const name = reader.string(4);
  const gamemode = reader.string(4);
  const language = reader.string(4);
  reader.assertConsumed('server info');

  return {
    password,
    players,
    maxPlayers,
    name: name.text,
    gamemode: gamemode.text,
    language: language.text,
    encodings: {
      name: name.encoding,
      gamemode: gamemode.encoding,
      language: language.encoding,
    },
  };
}

export function encodeServerInfo(info: Samp.ServerInfo): Buffer {
  return new PacketWriter()
    .bool(info.password)
    .uint16(info.players)
    .uint16(info.maxPlayers)
    .text(info.name, info.encodings.name, 4)
    .text(info.gamemode, info.encodings.gamemode, 4)
    .text(info.language, info.encodings.language, 4)
    .toBuffer();
}

export function decodePlayerList(body: Buffer): Samp.PlayerList {
  const reader = new PacketReader(body);
  const count = reader.uint16();
  const players: Samp.PlayerList = [];
  for (let i = 0; i < count; i++) {
    const name = reader.asciiString(1);
    const score = reader.int32();
    players.push({ name, score });
  }
  reader.assertConsumed('player list');
  return players;
}

export function encodePlayerList(players: Samp.PlayerList): Buffer {
  const writer = new PacketWriter().uint16(players.length);
  for (const player of players) {
    writer.text(player.name, 'ascii', 1).int32(player.score);
  }
  return writer.toBuffer();
}

export function decodeRuleList(
  body: Buffer,
  detector: Samp.EncodingDetector = defaultDetector,
): Samp.RuleList {
  const reader = new PacketReader(body, detector);
  const count = reader.uint16();
  const rules: Samp.RuleList = [];
  for (let i = 0; i < count; i++) {
    const name = reader.asciiString(1);
    const value = reader.string(1);
    rules.push({ name, value: value.text, encoding: value.encoding });
  }
  reader.assertConsumed('rule list');
  return rules;
}

export function encodeRuleList(rules: Samp.RuleList): Buffer {
  const writer = new PacketWriter().uint16(rules.length);
  for (const rule of rules) {
    writer.text(rule.name, 'ascii', 1).text(rule.value, rule.encoding, 1);
  }
  return writer.toBuffer();
}

/**
 * @description One RCON reply datagram carries exactly one line.
 * */
export function decodeRconLine(
  body: Buffer,
  detector: Samp.EncodingDetector = defaultDetector,
): Samp.DecodedText {
  const reader = new PacketReader(body, detector);
  const line = reader.string(1);
  reader.assertConsumed('RCON line');
  return line;
}

export function encodeRconLine(line: string): Buffer {
  return new PacketWriter().string(line, 1).toBuffer();
}

/**
 * @description RCON request payload. Throws `SampEncodingError` before anything is sent
 * when either string has no supported code page.
 * */
export function encodeRconRequest(password: string, command: string): Buffer {
  return new PacketWriter().string(password, 1).string(command, 1).toBuffer();
}

/**
 * @description Inverse of `encodeRconRequest`, for peers and tests.
 * */
export function decodeRconRequest(
  body: Buffer,
  detector: Samp.EncodingDetector = defaultDetector,
): { password: string; command: string } {
  const reader = new PacketReader(body, detector);
  const password = reader.string(1).text;
  const command = reader.string(1).text;
  reader.assertConsumed('RCON request');
  return { password, command };
}
