/**
 * CRC-16 used by MSC data groups and packets: polynomial x^16 + x^12 + x^5 + 1,
 * register preset to all ones, result complemented.
 */
export function crc16(data: Uint8Array): number {
  let crc = 0xffff;
  for (const byte of data) {
    crc ^= byte << 8;
    for (let bit = 0; bit < 8; bit++) {
      crc = crc & 0x8000 ? ((crc << 1) ^ 0x1021) & 0xffff : (crc << 1) & 0xffff;
    }
  }
  return ~crc & 0xffff;
}

/**
 * Return `data` followed by its CRC, big-endian
 */
export function withCrc(data: Buffer): Buffer {
  const crc = Buffer.alloc(2);
  crc.writeUInt16BE(crc16(data), 0);
  return Buffer.concat([data, crc]);
}
