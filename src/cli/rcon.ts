import { createInterface, type Interface } from 'readline/promises';
import { SampClient } from '../client';
import { InvalidRconPasswordError, RconDisabledError } from '../errors';
import {
  confirm,
  isConnectionRefused,
  isTimeout,
  parsePort,
  type Print,
  Prompt,
  timeoutSignal,
} from './utils';

export interface ShellOptions {
  print?: Print;
  /**
   * @description Readline interface to read commands from. Defaults to stdin/stdout.
   * */
  rl?: Interface;
  /**
   * @description Milliseconds allowed for ping, info and the open.mp check on startup.
   * @default 5000
   * */
  connectTimeout?: number;
  /**
   * @description Milliseconds allowed for one command, given the last startup ping.
   * @default (ping) => (ping + 5000) * 10
   * */
  commandTimeout?: (ping: number) => number;
}

type Session = Required<Pick<ShellOptions, 'connectTimeout' | 'commandTimeout'>> & {
  client: SampClient;
  prompt: Prompt;
  print: Print;
  host: string;
  port: number;
};

function underline(text: string, char: string): string {
  return `${text}\n${char.repeat(text.length)}`;
}

/**
 * @description `samp-rcon host port rcon_password`: interactive RCON shell.
 * Returns the message to exit with, or `null` on success.
 * */
export async function main(args: string[], options: ShellOptions = {}): Promise<string | null> {
  const print = options.print ?? console.log;
  print(underline('samp-query RCON client', '='));
  print('');

  if (args.length !== 3) {
    return 'Usage: samp-rcon host port rcon_password';
  }
  const [host, portArg, rconPassword] = args;
  const port = parsePort(portArg);
  if (port === null) {
    return `Invalid port: ${portArg}`;
  }

  const client = new SampClient({ host, port, rconPassword });
  const rl = options.rl ?? createInterface({ input: process.stdin, output: process.stdout });
  const prompt = new Prompt(rl);
  rl.on('SIGINT', () => prompt.close());
  try {
    return await shell({
      client,
      prompt,
      print,
      host,
      port,
      connectTimeout: options.connectTimeout ?? 5000,
      commandTimeout: options.commandTimeout ?? ((ping) => (ping + 5000) * 10),
    });
  } finally {
    prompt.close();
    client.disconnect();
  }
}

async function shell(session: Session): Promise<string | null> {
  const { client, prompt, print, host, port } = session;
  print(`Connecting to ${host}:${port}...`);

  let ping: number;
  try {
    const signal = timeoutSignal(session.connectTimeout);
    ping = await client.ping({ signal });
    const info = await client.info({ signal });
    const isOmp = await client.isOmp({ signal });

    print('Connected.');
    print('');
    print(underline('Server info:', '-'));
    print(`Name: ${info.name}`);
    print(`Gamemode: ${info.gamemode}`);
    print(`Language: ${info.language}`);
    print(`Players: ${info.players}/${info.maxPlayers}`);
    print(`Ping: ${ping.toFixed(0)}ms`);
    print(`Password: ${info.password ? 'Yes' : 'No'}`);
    print(`Is open.mp: ${isOmp ? 'Yes' : 'No'}`);
    print('');
  } catch (err) {
    if (isTimeout(err) || isConnectionRefused(err)) {
      return `Server at ${host}:${port} is offline.`;
    }
    throw err;
  }

  try {
    await client.rcon('echo');
  } catch (err) {
    if (err instanceof RconDisabledError) {
      return `RCON is disabled on ${host}:${port}.`;
    }
    if (err instanceof InvalidRconPasswordError) {
      return `Invalid RCON password for ${host}:${port}.`;
    }
    throw err;
  }

  for (;;) {
    const input = await prompt.ask(`rcon@${host}:${port} # `);
    if (input === null) {
      print('');
      break;
    }
    const command = input.trim();
    if (!command) {
      continue;
    }
    if (command === 'quit') {
      break;
    }

    if (command === 'exit') {
      if (!(await confirm(prompt, print, 'Are you sure you want to shut your server down?'))) {
        continue;
      }
      try {
        await client.rcon(command);
      } catch (err) {
        // a server that shut down doesn't answer
        if (!(err instanceof RconDisabledError)) {
          throw err;
        }
      }
      break;
    }

    try {
      const signal = timeoutSignal(session.commandTimeout(ping));
      print(await client.rcon(command, { signal }));
    } catch (err) {
      if (isTimeout(err)) {
        print(`Unknown command or variable: ${command}`);
      } else if (err instanceof RconDisabledError) {
        print('No response.');
      } else {
        throw err;
      }
    }
  }

  print('Goodbye, have a nice day!');
  return null;
}
