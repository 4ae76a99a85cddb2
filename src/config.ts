/**
 * Protocol constants and runtime settings.
 *
 * Only logging reads the environment; everything about a server comes from the client options.
 */

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVEL_NAMES: readonly LogLevelName[] = ['debug', 'info', 'warn', 'error', 'silent'];

function parseLogLevelName(value: string | undefined): LogLevelName {
  const name = value?.toLowerCase();
  return LOG_LEVEL_NAMES.find((level) => level === name) ?? 'warn';
}

export const config = {
  protocol: {
    magic: Buffer.from('SAMP', 'ascii'),
    // upper bound on the max/min latency ratio of a healthy link
    variance: 5,
    nonceSize: 4,
    // outbound text is tried against these code pages, in order
    codePages: [
      'windows-1250',
      'windows-1251',
      'windows-1252',
      'windows-1253',
      'windows-1254',
      'windows-1255',
      'windows-1256',
      'windows-1257',
      'windows-1258',
    ],
    // SA-MP clients run on Windows: inbound text is in one of its code pages, or UTF-8
    detectEncodings: [
      'ascii',
      'UTF-8',
      'windows-1250',
      'windows-1251',
      'windows-1252',
      'windows-1253',
      'windows-1255',
    ],
    fallbackEncoding: 'ascii',
    invalidRconPassword: 'Invalid RCON password.',
  },

  transport: {
    // datagrams kept while no receive() is pending
    maxQueuedDatagrams: 64,
  },

  logging: {
    level: parseLogLevelName(process.env.SAMP_LOG_LEVEL),
  },
};
