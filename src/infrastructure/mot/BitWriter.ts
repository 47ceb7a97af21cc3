import { EncodingError } from '../../utils/errors';

/**
 * Accumulates big-endian bit fields into a byte buffer
 */
export class BitWriter {
  private readonly bytes: number[] = [];
  private current = 0;
  private bitCount = 0;

  /**
   * Append the low `width` bits of `value`, most significant bit first
   */
  public write(value: number, width: number): this {
    if (!Number.isInteger(value) || value < 0 || value >= 2 ** width) {
      throw new EncodingError(`Value ${value} does not fit in ${width} bits`);
    }
    for (let bit = width - 1; bit >= 0; bit--) {
      // Division keeps fields wider than 31 bits exact
      const set = Math.floor(value / 2 ** bit) % 2;
      this.current = (this.current << 1) | set;
      this.bitCount++;
      if (this.bitCount === 8) {
        this.bytes.push(this.current);
        this.current = 0;
        this.bitCount = 0;
      }
    }
    return this;
  }

  public writeBytes(data: Uint8Array): this {
    if (this.bitCount !== 0) {
      throw new EncodingError('Byte data must start on a byte boundary');
    }
    for (const byte of data) {
      this.bytes.push(byte);
    }
    return this;
  }

  public toBuffer(): Buffer {
    if (this.bitCount !== 0) {
      throw new EncodingError(`${this.bitCount} bits left over; fields must fill whole bytes`);
    }
    return Buffer.from(this.bytes);
  }
}
