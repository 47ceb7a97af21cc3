import { AssembledObject } from '../../domain/carousel/AssembledObject';
import { config } from '../../config/env';
import { EncodingError } from '../../utils/errors';
import { createLogger } from '../../utils/logger';
import { BitWriter } from './BitWriter';
import { DataGroupType, DataGroupTypeValue, encodeDataGroup, segment } from './DataGroup';
import { ParameterId, encodeHeader, encodeParameter } from './MotHeader';

const logger = createLogger('MotDirectoryEncoder');

export type DirectoryParameter = { kind: 'SortedHeaderInformation' };

export interface MotDirectoryOptions {
  segmentSize?: number;
  carouselPeriod?: number; // tenths of a second, 0 = undefined
  directoryTransportId?: number;
}

const MAX_OBJECTS = 0xffff;

/**
 * Encodes a set of objects as a MOT directory carousel: the directory as
 * type 6 data groups, then every body as type 4 data groups.
 */
export class MotDirectoryEncoder {
  private readonly segmentSize: number;
  private readonly carouselPeriod: number;
  private readonly directoryTransportId: number;

  constructor(options: MotDirectoryOptions = {}) {
    this.segmentSize = options.segmentSize ?? config.mot.segmentSize;
    this.carouselPeriod = options.carouselPeriod ?? config.mot.carouselPeriod;
    this.directoryTransportId = options.directoryTransportId ?? 0;
  }

  /**
   * Transport ids are assigned from 1 in object order
   */
  public encodeDirectory(
    objects: readonly AssembledObject[],
    headerParameters: readonly DirectoryParameter[] = []
  ): Buffer[] {
    if (objects.length > MAX_OBJECTS) {
      throw new EncodingError(`Too many objects for one directory (${objects.length})`);
    }

    const entries = objects.map((object, index) => ({ transportId: index + 1, object }));
    const directory = this.buildDirectory(entries, headerParameters);

    const continuity = new Map<DataGroupTypeValue, number>();
    const dataGroups: Buffer[] = [
      ...this.toDataGroups(directory, DataGroupType.directory, this.directoryTransportId, continuity),
    ];
    for (const { transportId, object } of entries) {
      dataGroups.push(...this.toDataGroups(object.body, DataGroupType.body, transportId, continuity));
    }

    logger.debug(
      { objects: objects.length, directoryBytes: directory.length, dataGroups: dataGroups.length },
      'Encoded MOT directory carousel'
    );
    return dataGroups;
  }

  public buildDirectory(
    entries: ReadonlyArray<{ transportId: number; object: AssembledObject }>,
    headerParameters: readonly DirectoryParameter[]
  ): Buffer {
    const extension = Buffer.concat(
      headerParameters.map((parameter) => {
        switch (parameter.kind) {
          case 'SortedHeaderInformation':
            return encodeParameter(ParameterId.SortedHeaderInformation);
        }
      })
    );

    // Sorted header information promises entries ordered by content name
    const ordered = headerParameters.some((parameter) => parameter.kind === 'SortedHeaderInformation')
      ? [...entries].sort((a, b) => Buffer.compare(Buffer.from(a.object.name, 'latin1'), Buffer.from(b.object.name, 'latin1')))
      : entries;

    const body = Buffer.concat(
      ordered.flatMap(({ transportId, object }) => [
        new BitWriter().write(transportId, 16).toBuffer(),
        encodeHeader(object),
      ])
    );

    const directoryHeaderSize = 13;
    const directorySize = directoryHeaderSize + extension.length + body.length;

    const header = new BitWriter()
      .write(0, 1) // compression flag
      .write(0, 1) // rfu
      .write(directorySize, 30)
      .write(entries.length, 16)
      .write(this.carouselPeriod, 24)
      .write(0, 1) // rfu
      .write(0, 2) // rfu
      .write(this.segmentSize, 13)
      .write(extension.length, 16)
      .toBuffer();

    return Buffer.concat([header, extension, body]);
  }

  private toDataGroups(
    data: Buffer,
    type: DataGroupTypeValue,
    transportId: number,
    continuity: Map<DataGroupTypeValue, number>
  ): Buffer[] {
    const segments = segment(data, this.segmentSize);
    return segments.map((segmentData, index) => {
      const continuityIndex = continuity.get(type) ?? 0;
      continuity.set(type, (continuityIndex + 1) % 16);
      return encodeDataGroup({
        type,
        continuityIndex,
        transportId,
        segmentNumber: index,
        last: index === segments.length - 1,
        data: segmentData,
      });
    });
  }
}
