import { SampClient } from '../client';
import { Samp } from '../types';
import {
  InvalidRconPasswordError,
  MissingRconPasswordError,
  RconDisabledError,
} from '../errors';
import { isTimeout, parsePort, type Print, timeoutSignal } from './utils';

function formatInfo(info: Samp.ServerInfo): string {
  return [
    `Name: ${info.name}`,
    `Gamemode: ${info.gamemode}`,
    `Language: ${info.language}`,
    `Players: ${info.players}/${info.maxPlayers}`,
    `Password: ${info.password ? 'Yes' : 'No'}`,
  ].join('\n');
}

/**
 * @description `samp-query host port [rcon_password]`: dump everything a server tells about itself.
 * Returns the message to exit with, or `null` on success.
 * */
export async function main(args: string[], print: Print = console.log): Promise<string | null> {
  if (args.length < 2 || args.length > 3) {
    return 'Usage: samp-query host port [rcon_password]';
  }
  const [host, portArg, rconPassword] = args;
  const port = parsePort(portArg);
  if (port === null) {
    return `Invalid port: ${portArg}`;
  }

  const client = new SampClient({ host, port, rconPassword });
  try {
    const ping = await client.ping();
    print(`Ping: ${ping.toFixed(0)}ms`);
    print(formatInfo(await client.info()));

    try {
      const players = await client.players({ signal: timeoutSignal(2 * ping) });
      print(`Online (${players.length}):`);
      for (const player of players) {
        print(`  ${player.name} (${player.score})`);
      }
    } catch (err) {
      if (!isTimeout(err)) {
        throw err;
      }
      print('More than 100 players online, no info returned');
    }

    print(`Uses open.mp: ${(await client.isOmp()) ? 'Yes' : 'No'}`);

    print('Rules:');
    for (const rule of await client.rules()) {
      print(`  ${rule.name} = ${rule.value}`);
    }

    try {
      print(await client.rcon('varlist'));
      print(await client.rcon('players'));
    } catch (err) {
      if (err instanceof MissingRconPasswordError) {
        print("You didn't specify a RCON password.");
      } else if (err instanceof RconDisabledError) {
        print('RCON is disabled.');
      } else if (err instanceof InvalidRconPasswordError) {
        print('Invalid RCON password.');
      } else {
        throw err;
      }
    }
  } finally {
    client.disconnect();
  }
  return null;
}
