import { describe, it, expect, afterEach } from 'vitest';
import { main } from './query';
import { MockSampServer } from '../__mocks__/mock-samp-server';

describe('samp-query', () => {
  let server: MockSampServer | null = null;

  afterEach(async () => {
    await server?.stop();
    server = null;
  });

  it('prints usage', async () => {
    expect(await main([])).toBe('Usage: samp-query host port [rcon_password]');
  });

  it('rejects invalid ports', async () => {
    expect(await main(['127.0.0.1', '99999'])).toBe('Invalid port: 99999');
    expect(await main(['127.0.0.1', '77x'])).toBe('Invalid port: 77x');
  });

  it('prints everything the server reports', async () => {
    server = new MockSampServer({
      pingDelay: 20,
      players: [{ name: 'Alice', score: 3 }],
      rules: [{ name: 'version', value: '0.3.7', encoding: 'ascii' }],
      omp: true,
    });
    const port = await server.start();
    const lines: string[] = [];

    expect(await main(['127.0.0.1', String(port)], (line) => lines.push(line))).toBeNull();

    expect(lines[0]).toMatch(/^Ping: \d+ms$/);
    expect(lines.slice(1)).toEqual([
      'Name: Test Server\nGamemode: Freeroam\nLanguage: English\nPlayers: 2/50\nPassword: No',
      'Online (1):',
      '  Alice (3)',
      'Uses open.mp: Yes',
      'Rules:',
      '  version = 0.3.7',
      "You didn't specify a RCON password.",
    ]);
  });

  it('prints RCON output when given a password', async () => {
    server = new MockSampServer({
      pingDelay: 20,
      rconPassword: 'test-secret',
      rconHandler: (command) => [`ran ${command}`],
    });
    const port = await server.start();
    const lines: string[] = [];

    await main(['127.0.0.1', String(port), 'test-secret'], (line) => lines.push(line));

    expect(lines.slice(-2)).toEqual(['ran varlist', 'ran players']);
  });
});
