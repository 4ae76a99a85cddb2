import type { Interface } from 'readline/promises';

export type Print = (line: string) => void;

export function parsePort(value: string): number | null {
  if (!/^\d+$/.test(value)) {
    return null;
  }
  const port = Number(value);
  return port > 0 && port <= 0xffff ? port : null;
}

/**
 * @description Reason of a signal created with `AbortSignal.timeout()`.
 * */
export function isTimeout(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'name' in err && err.name === 'TimeoutError';
}

export function isConnectionRefused(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ECONNREFUSED';
}

/**
 * @description `AbortSignal.timeout()` takes whole milliseconds.
 * */
export function timeoutSignal(ms: number): AbortSignal {
  return AbortSignal.timeout(Math.max(1, Math.ceil(ms)));
}

/**
 * @description Readline wrapper that remembers the input was closed (EOF or Ctrl+C), since
 * `question()` on a closed interface throws.
 * */
export class Prompt {
  private $closed = false;

  constructor(private readonly rl: Interface) {
    rl.once('close', () => {
      this.$closed = true;
    });
  }

  public get closed(): boolean {
    return this.$closed;
  }

  /**
   * @description Ask a question; `null` once the input is closed.
   * */
  public ask(text: string): Promise<string | null> {
    if (this.$closed) {
      return Promise.resolve(null);
    }
    return new Promise((resolve, reject) => {
      const handleClose = () => resolve(null);
      this.rl.once('close', handleClose);
      this.rl.question(text).then(
        (answer) => {
          this.rl.off('close', handleClose);
          resolve(answer);
        },
        (err: unknown) => {
          this.rl.off('close', handleClose);
          // no-op when the close already settled this promise
          reject(err);
        },
      );
    });
  }

  public close(): void {
    if (!this.$closed) {
      this.rl.close();
    }
  }
}

/**
 * @description Yes/no prompt, uppercase choice being the default.
 * */
export async function confirm(
  prompt: Prompt,
  print: Print,
  text: string,
  defaultValue = false,
): Promise<boolean> {
  const choices = defaultValue ? 'Y/n' : 'y/N';
  const valid = ['y', 'yes', 'n', 'no'];

  for (;;) {
    const answer = await prompt.ask(`${text} (${choices}) `);
    if (answer === null) {
      print('');
      return false;
    }
    const response = answer.trim().toLowerCase();
    if (!response) {
      return defaultValue;
    }
    if (!valid.includes(response)) {
      print(
        `Invalid response: '${response}'. Valid choices are: ${valid.map((choice) => `'${choice}'`).join(', ')}`,
      );
      continue;
    }
    return response.startsWith('y');
  }
}
