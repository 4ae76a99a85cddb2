import { describe, it, expect } from 'vitest';
import { Samp } from './types';
import {
  buildPrefix,
  decodePlayerList,
  decodeRconLine,
  decodeRconRequest,
  decodeRuleList,
  decodeServerInfo,
  encodePlayerList,
  encodeRconLine,
  encodeRconRequest,
  encodeRuleList,
  encodeServerInfo,
  replyHeader,
} from './packet';
import { FixedDetector } from './encoding';
import { SampDecodeError } from './errors';

const cyrillic = new FixedDetector('windows-1251');

describe('buildPrefix', () => {
  it('is magic, address and little-endian port', () => {
    expect(buildPrefix(Buffer.from([127, 0, 0, 1]), 7777)).toEqual(
      Buffer.from([0x53, 0x41, 0x4d, 0x50, 127, 0, 0, 1, 0x61, 0x1e]),
    );
  });

  it('appends opcode and nonce to reply headers', () => {
    const prefix = buildPrefix(Buffer.from([10, 0, 0, 2]), 1);
    expect(replyHeader(prefix, Samp.Opcode.PING, Buffer.from([1, 2, 3, 4]))).toEqual(
      Buffer.concat([prefix, Buffer.from([0x70, 1, 2, 3, 4])]),
    );
  });
});

describe('server info', () => {
  const info: Samp.ServerInfo = {
    password: true,
    players: 12,
    maxPlayers: 100,
    name: 'Русский сервер',
    gamemode: 'RP',
    language: 'Русский',
    encodings: { name: 'windows-1251', gamemode: 'windows-1251', language: 'windows-1251' },
  };

  it('round-trips', () => {
    expect(decodeServerInfo(encodeServerInfo(info), cyrillic)).toEqual(info);
  });

  it('uses 4-byte length fields', () => {
    const body = encodeServerInfo({ ...info, name: 'A', gamemode: '', language: '' });
    expect(body).toEqual(
      Buffer.from([0x01, 0x0c, 0x00, 0x64, 0x00, 1, 0, 0, 0, 0x41, 0, 0, 0, 0, 0, 0, 0, 0]),
    );
  });

  it('rejects trailing bytes', () => {
    const body = Buffer.concat([encodeServerInfo(info), Buffer.from([0])]);
    expect(() => decodeServerInfo(body, cyrillic)).toThrow(SampDecodeError);
  });

  it('rejects truncated packets', () => {
    const body = encodeServerInfo(info);
    expect(() => decodeServerInfo(body.subarray(0, body.length - 1), cyrillic)).toThrow(
      SampDecodeError,
    );
  });
});

describe('player list', () => {
  const players: Samp.PlayerList = [
    { name: 'Alice', score: 10 },
    { name: 'Bob', score: -3 },
  ];

  it('round-trips', () => {
    expect(decodePlayerList(encodePlayerList(players))).toEqual(players);
  });

  it('decodes an empty roster', () => {
    expect(decodePlayerList(Buffer.from([0, 0]))).toEqual([]);
  });

  it('rejects a count larger than the entries present', () => {
    const body = encodePlayerList(players);
    body.writeUInt16LE(3, 0);
    expect(() => decodePlayerList(body)).toThrow(SampDecodeError);
  });

  it('rejects a count smaller than the entries present', () => {
    const body = encodePlayerList(players);
    body.writeUInt16LE(1, 0);
    expect(() => decodePlayerList(body)).toThrow('Malformed player list');
  });
});

describe('rule list', () => {
  const rules: Samp.RuleList = [
    { name: 'mapname', value: 'Сан Фиерро', encoding: 'windows-1251' },
    { name: 'version', value: '0.3.7', encoding: 'windows-1251' },
  ];

  it('round-trips', () => {
    expect(decodeRuleList(encodeRuleList(rules), cyrillic)).toEqual(rules);
  });

  it('rejects trailing bytes', () => {
    const body = Buffer.concat([encodeRuleList(rules), Buffer.from([1, 2])]);
    expect(() => decodeRuleList(body, cyrillic)).toThrow('Malformed rule list: 2 unexpected');
  });
});

describe('rcon', () => {
  it('encodes password then command with 1-byte lengths', () => {
    expect(encodeRconRequest('pw', 'echo')).toEqual(
      Buffer.from([0x02, 0x70, 0x77, 0x04, 0x65, 0x63, 0x68, 0x6f]),
    );
    expect(decodeRconRequest(encodeRconRequest('pw', 'echo'), cyrillic)).toEqual({
      password: 'pw',
      command: 'echo',
    });
  });

  it('reads exactly one line per datagram', () => {
    expect(decodeRconLine(encodeRconLine('a=1'), cyrillic)).toEqual({
      text: 'a=1',
      encoding: 'windows-1251',
    });
    const twoLines = Buffer.concat([encodeRconLine('a=1'), encodeRconLine('b=2')]);
    expect(() => decodeRconLine(twoLines, cyrillic)).toThrow(SampDecodeError);
  });
});
