import { isIPv4 } from 'net';

/**
 * @description Clone original error properties, except for 'message' and 'stack', to the target error.
 * */
export function cloneErrorProperties<T extends Error>(original: unknown, target: T): T {
  if (typeof original !== 'object' || original === null) {
    return target;
  }
  const exclude = ['message', 'stack'];
  for (const [key, value] of Object.entries(original)) {
    if (exclude.includes(key)) continue;
    Object.defineProperty(target, key, {
      value,
      enumerable: true,
      writable: true,
      configurable: true,
    });
  }
  return target;
}

/**
 * @description Re-throwable copy of `err` whose message carries `logprefix`.
 * */
export function prefixError(logprefix: string, err: unknown): Error {
  return cloneErrorProperties(err, new Error(`${logprefix} ${toErrorMessage(err)}`));
}

export function toErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === 'string') return err;
  return String(err);
}

/**
 * @description Four network-order bytes of a dotted IPv4 address.
 * */
export function ipv4ToBuffer(address: string): Buffer {
  if (!isIPv4(address)) {
    throw new TypeError(`Not an IPv4 address: ${address}`);
  }
  return Buffer.from(address.split('.').map(Number));
}

export function now(): number {
  return performance.now();
}
