import * as iconv from 'iconv-lite';
import { Samp } from './types';
import { SampDecodeError, SampEncodingError } from './errors';
import { decodeText, defaultDetector, encodeText } from './encoding';

export type LengthWidth = 1 | 4;

/**
 * @description Sequential little-endian reader over one datagram body.
 * Every read past the end throws a `SampDecodeError`.
 * @example
 * ```ts
 * const reader = new PacketReader(body);
 * const count = reader.uint16();
 * reader.assertConsumed();
 * ```
 * */
export class PacketReader {
  private $offset = 0;

  constructor(
    private readonly buffer: Buffer,
    private readonly detector: Samp.EncodingDetector = defaultDetector,
  ) {}

  public get offset(): number {
    return this.$offset;
  }

  public get remaining(): number {
    return this.buffer.length - this.$offset;
  }

  public bool(): boolean {
    return this.take(1)[0] !== 0;
  }

  public uint8(): number {
    return this.take(1).readUInt8(0);
  }

  public uint16(): number {
    return this.take(2).readUInt16LE(0);
  }

  public uint32(): number {
    return this.take(4).readUInt32LE(0);
  }

  public int32(): number {
    return this.take(4).readInt32LE(0);
  }

  /**
   * @description Length-prefixed string, encoding detected from its bytes.
   * */
  public string(width: LengthWidth): Samp.DecodedText {
    return decodeText(this.take(this.length(width)), this.detector);
  }

  /**
   * @description Length-prefixed string known to be 7-bit clean.
   * */
  public asciiString(width: LengthWidth): string {
    return this.take(this.length(width)).toString('ascii');
  }

  /**
   * @description Throw unless every byte has been read.
   * */
  public assertConsumed(what = 'packet'): void {
    if (this.remaining !== 0) {
      throw new SampDecodeError(
        `Malformed ${what}: ${this.remaining} unexpected trailing byte(s)`,
      );
    }
  }

  private length(width: LengthWidth): number {
    return width === 1 ? this.uint8() : this.uint32();
  }

  private take(size: number): Buffer {
    if (size > this.remaining) {
      throw new SampDecodeError(
        `Truncated packet: need ${size} byte(s) at offset ${this.$offset}, ${this.remaining} left`,
      );
    }
    const chunk = this.buffer.subarray(this.$offset, this.$offset + size);
    this.$offset += size;
    return chunk;
  }
}

/**
 * @description Little-endian writer, the inverse of `PacketReader`.
 * */
export class PacketWriter {
  private readonly $chunks: Buffer[] = [];

  public bool(value: boolean): this {
    return this.uint8(value ? 1 : 0);
  }

  public uint8(value: number): this {
    const chunk = Buffer.alloc(1);
    chunk.writeUInt8(value, 0);
    return this.push(chunk);
  }

  public uint16(value: number): this {
    const chunk = Buffer.alloc(2);
    chunk.writeUInt16LE(value, 0);
    return this.push(chunk);
  }

  public uint32(value: number): this {
    const chunk = Buffer.alloc(4);
    chunk.writeUInt32LE(value, 0);
    return this.push(chunk);
  }

  public int32(value: number): this {
    const chunk = Buffer.alloc(4);
    chunk.writeInt32LE(value, 0);
    return this.push(chunk);
  }

  /**
   * @description Length-prefixed raw bytes.
   * */
  public bytes(value: Buffer, width: LengthWidth): this {
    const max = width === 1 ? 0xff : 0xffffffff;
    if (value.length > max) {
      throw new SampEncodingError(
        value.toString('latin1'),
        `String of ${value.length} bytes does not fit a ${width}-byte length field`,
      );
    }
    if (width === 1) {
      this.uint8(value.length);
    } else {
      this.uint32(value.length);
    }
    return this.push(value);
  }

  /**
   * @description Length-prefixed string, encoded under the first code page able to represent it.
   * */
  public string(value: string, width: LengthWidth): this {
    return this.bytes(encodeText(value).bytes, width);
  }

  /**
   * @description Length-prefixed string in a given encoding.
   * */
  public text(value: string, encoding: string, width: LengthWidth): this {
    return this.bytes(iconv.encode(value, encoding), width);
  }

  public toBuffer(): Buffer {
    return Buffer.concat(this.$chunks);
  }

  private push(chunk: Buffer): this {
    this.$chunks.push(chunk);
    return this;
  }
}
