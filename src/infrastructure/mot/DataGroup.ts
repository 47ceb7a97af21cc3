import { EncodingError } from '../../utils/errors';
import { BitWriter } from './BitWriter';
import { withCrc } from './Crc16';

export const DataGroupType = {
  header: 3,
  body: 4,
  directory: 6,
} as const;

export type DataGroupTypeValue = (typeof DataGroupType)[keyof typeof DataGroupType];

const MAX_SEGMENT_SIZE = 2 ** 13 - 1;

/**
 * Split an object into MOT segments of at most `segmentSize` bytes.
 * An empty object still yields one empty segment.
 */
export function segment(data: Buffer, segmentSize: number): Buffer[] {
  if (!Number.isInteger(segmentSize) || segmentSize < 1 || segmentSize > MAX_SEGMENT_SIZE) {
    throw new EncodingError(`Invalid segment size ${segmentSize}`);
  }
  if (data.length === 0) {
    return [Buffer.alloc(0)];
  }
  const segments: Buffer[] = [];
  for (let offset = 0; offset < data.length; offset += segmentSize) {
    segments.push(data.subarray(offset, offset + segmentSize));
  }
  return segments;
}

export interface DataGroupSegment {
  type: DataGroupTypeValue;
  continuityIndex: number;
  transportId: number;
  segmentNumber: number;
  last: boolean;
  data: Buffer;
}

/**
 * MSC data group carrying one MOT segment:
 * data group header, session header, segment header, segment data, CRC.
 */
export function encodeDataGroup(segmentInfo: DataGroupSegment): Buffer {
  const header = new BitWriter()
    // data group header
    .write(0, 1) // extension flag
    .write(1, 1) // CRC flag
    .write(1, 1) // segment flag
    .write(1, 1) // user access flag
    .write(segmentInfo.type, 4)
    .write(segmentInfo.continuityIndex % 16, 4)
    .write(0, 4) // repetition index
    // session header: segment field
    .write(segmentInfo.last ? 1 : 0, 1)
    .write(segmentInfo.segmentNumber, 15)
    // session header: user access field
    .write(0, 3) // rfa
    .write(1, 1) // transport id flag
    .write(2, 4) // length indicator
    .write(segmentInfo.transportId, 16)
    // segment header
    .write(0, 3) // repetition count
    .write(segmentInfo.data.length, 13)
    .toBuffer();

  return withCrc(Buffer.concat([header, segmentInfo.data]));
}
