export { SampClient } from './client';
export { Samp } from './types';
export { UdpTransport, type TransportOptions } from './transport';
export { RconSession, type RconSessionOptions, type MeasurePing } from './rcon';
export { PacketReader, PacketWriter, type LengthWidth } from './codec';
export {
  JschardetDetector,
  FixedDetector,
  defaultDetector,
  decodeText,
  encodeText,
} from './encoding';
export {
  buildPrefix,
  replyHeader,
  decodeServerInfo,
  encodeServerInfo,
  decodePlayerList,
  encodePlayerList,
  decodeRuleList,
  encodeRuleList,
  decodeRconLine,
  encodeRconLine,
  encodeRconRequest,
  decodeRconRequest,
} from './packet';
export {
  SampError,
  MissingRconPasswordError,
  InvalidRconPasswordError,
  RconDisabledError,
  SampDecodeError,
  SampEncodingError,
  type SampErrorCode,
} from './errors';
export { ConsoleLogger, LogLevel, createLogger, type Logger } from './logger';
