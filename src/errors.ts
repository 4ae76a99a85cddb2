export type SampErrorCode =
  | 'MISSING_RCON_PASSWORD'
  | 'INVALID_RCON_PASSWORD'
  | 'RCON_DISABLED'
  | 'DECODE_FAILED'
  | 'ENCODE_FAILED';

/**
 * @description Base class of every error raised by the protocol layer itself.
 * Socket and DNS errors are not wrapped in it; they keep their own type and `code`.
 * */
export class SampError extends Error {
  public readonly code: SampErrorCode;

  constructor(code: SampErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * @description `rcon()` was called on a client constructed without a password.
 * */
export class MissingRconPasswordError extends SampError {
  constructor() {
    super('MISSING_RCON_PASSWORD', 'No RCON password configured');
  }
}

/**
 * @description The server answered with its rejection line.
 * */
export class InvalidRconPasswordError extends SampError {
  constructor(logprefix: string) {
    super('INVALID_RCON_PASSWORD', `${logprefix} Invalid RCON password`);
  }
}

/**
 * @description No reply line arrived within the collection window. The protocol can't tell a
 * disabled RCON apart from an unreachable one or from a command with no output.
 * */
export class RconDisabledError extends SampError {
  constructor(logprefix: string) {
    super('RCON_DISABLED', `${logprefix} RCON is disabled or did not respond`);
  }
}

export class SampDecodeError extends SampError {
  constructor(message: string) {
    super('DECODE_FAILED', message);
  }
}

export class SampEncodingError extends SampError {
  public readonly text: string;

  constructor(text: string, message: string) {
    super('ENCODE_FAILED', message);
    this.text = text;
  }
}
