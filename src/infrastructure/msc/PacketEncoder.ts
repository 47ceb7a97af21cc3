import { BitWriter } from '../mot/BitWriter';
import { withCrc } from '../mot/Crc16';
import { EncodingError } from '../../utils/errors';

export const PACKET_SIZES = [24, 48, 72, 96] as const;
export type PacketSize = (typeof PACKET_SIZES)[number];

const PACKET_OVERHEAD = 5; // 3 header bytes + 2 CRC bytes
const MAX_ADDRESS = 1023;

export function isPacketSize(value: number): value is PacketSize {
  return PACKET_SIZES.some((size) => size === value);
}

export interface PacketOptions {
  address: number;
  packetSize: PacketSize;
  /** Total packet count is rounded up to a multiple of this with padding packets */
  padding?: number;
}

interface PacketFields {
  continuityIndex: number;
  first: boolean;
  last: boolean;
  address: number;
  data: Buffer;
}

/**
 * Packet mode framing of MSC data groups
 */
export class PacketEncoder {
  private readonly address: number;
  private readonly packetSize: PacketSize;
  private readonly padding: number;
  private continuityIndex = 0;

  constructor(options: PacketOptions) {
    if (!Number.isInteger(options.address) || options.address < 1 || options.address > MAX_ADDRESS) {
      throw new EncodingError(`Packet address must be between 1 and ${MAX_ADDRESS}`);
    }
    if (!isPacketSize(options.packetSize)) {
      throw new EncodingError(`Packet size must be one of ${PACKET_SIZES.join(', ')}`);
    }
    this.address = options.address;
    this.packetSize = options.packetSize;
    this.padding = options.padding ?? 1;
    if (!Number.isInteger(this.padding) || this.padding < 1) {
      throw new EncodingError('Padding must be a positive integer');
    }
  }

  /**
   * Useful data bytes carried by one packet
   */
  public get capacity(): number {
    return this.packetSize - PACKET_OVERHEAD;
  }

  public encodeTransportPackets(dataGroups: readonly Buffer[]): Buffer[] {
    const packets: Buffer[] = [];

    for (const dataGroup of dataGroups) {
      const chunks = Math.max(1, Math.ceil(dataGroup.length / this.capacity));
      for (let index = 0; index < chunks; index++) {
        packets.push(
          this.encodePacket({
            continuityIndex: this.nextContinuityIndex(),
            first: index === 0,
            last: index === chunks - 1,
            address: this.address,
            data: dataGroup.subarray(index * this.capacity, (index + 1) * this.capacity),
          })
        );
      }
    }

    while (packets.length % this.padding !== 0) {
      packets.push(this.paddingPacket());
    }

    return packets;
  }

  /**
   * Padding packet: address 0, no useful data
   */
  public paddingPacket(): Buffer {
    return this.encodePacket({ continuityIndex: 0, first: true, last: true, address: 0, data: Buffer.alloc(0) });
  }

  private nextContinuityIndex(): number {
    const value = this.continuityIndex;
    this.continuityIndex = (this.continuityIndex + 1) % 4;
    return value;
  }

  private encodePacket(fields: PacketFields): Buffer {
    const header = new BitWriter()
      .write(PACKET_SIZES.indexOf(this.packetSize), 2)
      .write(fields.continuityIndex, 2)
      .write(fields.first ? 1 : 0, 1)
      .write(fields.last ? 1 : 0, 1)
      .write(fields.address, 10)
      .write(0, 1) // command: data packet
      .write(fields.data.length, 7)
      .toBuffer();

    const dataField = Buffer.alloc(this.capacity);
    fields.data.copy(dataField);
    return withCrc(Buffer.concat([header, dataField]));
  }
}

/**
 * Function form of PacketEncoder for one-shot encoding
 */
export function encodeTransportPackets(
  dataGroups: readonly Buffer[],
  address: number,
  packetSize: PacketSize,
  padding = 1
): Buffer[] {
  return new PacketEncoder({ address, packetSize, padding }).encodeTransportPackets(dataGroups);
}
