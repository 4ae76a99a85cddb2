import * as iconv from 'iconv-lite';
import * as jschardet from 'jschardet';
import { Samp } from './types';
import { config } from './config';
import { SampEncodingError } from './errors';

// jschardet names iconv-lite spells differently
const JSCHARDET_ALIASES: Record<string, string> = {
  'x-mac-cyrillic': 'maccyrillic',
};

/**
 * @description Statistical detection through jschardet, limited to `config.protocol.detectEncodings`.
 * Returns `null` for encodings iconv-lite cannot decode.
 * */
export class JschardetDetector implements Samp.EncodingDetector {
  constructor(private readonly candidates: string[] = config.protocol.detectEncodings) {}

  public detect(bytes: Buffer): string | null {
    if (!bytes.length) {
      return null;
    }
    const { encoding } = jschardet.detect(bytes, { detectEncodings: this.candidates });
    if (!encoding) {
      return null;
    }
    const name = JSCHARDET_ALIASES[encoding.toLowerCase()] ?? encoding;
    return iconv.encodingExists(name) ? name : null;
  }
}

/**
 * @description Always answers the same encoding.
 * @example
 * ```ts
 * const client = new SampClient({ host, port, detector: new FixedDetector('windows-1251') });
 * ```
 * */
export class FixedDetector implements Samp.EncodingDetector {
  constructor(private readonly encoding: string) {}

  public detect(): string {
    return this.encoding;
  }
}

export const defaultDetector: Samp.EncodingDetector = new JschardetDetector();

export function decodeText(
  bytes: Buffer,
  detector: Samp.EncodingDetector = defaultDetector,
): Samp.DecodedText {
  const detected = detector.detect(bytes);
  const encoding =
    detected !== null && iconv.encodingExists(detected)
      ? detected
      : config.protocol.fallbackEncoding;
  return { text: iconv.decode(bytes, encoding), encoding };
}

/**
 * @description Encode under the first code page that represents `text` without loss.
 * */
export function encodeText(text: string): { bytes: Buffer; encoding: string } {
  for (const encoding of config.protocol.codePages) {
    const bytes = iconv.encode(text, encoding);
    // iconv-lite substitutes unmappable characters instead of throwing
    if (iconv.decode(bytes, encoding) === text) {
      return { bytes, encoding };
    }
  }
  throw new SampEncodingError(
    text,
    `Cannot encode ${JSON.stringify(text)} in any of ${config.protocol.codePages.join(', ')}`,
  );
}
