import { AssembledObject, MotParameter } from '../../domain/carousel/AssembledObject';
import { EncodingError } from '../../utils/errors';
import { BitWriter } from './BitWriter';
import { encodeMotTime } from './MotTime';

/**
 * Header extension parameter identifiers
 */
export const ParameterId = {
  SortedHeaderInformation: 0x00,
  ContentName: 0x0c,
  ScopeStart: 0x25,
  ScopeEnd: 0x26,
  ScopeId: 0x27,
} as const;

const HEADER_CORE_SIZE = 7;
const MAX_BODY_SIZE = 2 ** 28 - 1;
const MAX_HEADER_SIZE = 2 ** 13 - 1;

/**
 * Encode one header extension parameter. The length indicator is chosen from
 * the data length: none, one byte, four bytes, or a variable-length field.
 */
export function encodeParameter(id: number, data: Buffer = Buffer.alloc(0)): Buffer {
  const writer = new BitWriter();
  if (data.length === 0) {
    writer.write(0, 2).write(id, 6);
  } else if (data.length === 1) {
    writer.write(1, 2).write(id, 6);
  } else if (data.length === 4) {
    writer.write(2, 2).write(id, 6);
  } else {
    writer.write(3, 2).write(id, 6);
    if (data.length <= 0x7f) {
      writer.write(0, 1).write(data.length, 7);
    } else if (data.length <= 0x7fff) {
      writer.write(1, 1).write(data.length, 15);
    } else {
      throw new EncodingError(`Parameter 0x${id.toString(16)} is too long (${data.length} bytes)`);
    }
  }
  return Buffer.concat([writer.toBuffer(), data]);
}

/**
 * ContentName: character set indicator (ISO Latin-1 complete EBU set = 0) followed by the name
 */
export function encodeContentName(name: string): Buffer {
  return encodeParameter(ParameterId.ContentName, Buffer.concat([Buffer.from([0x00]), Buffer.from(name, 'latin1')]));
}

function encodeObjectParameter(parameter: MotParameter): Buffer {
  switch (parameter.kind) {
    case 'ScopeId':
      return encodeParameter(ParameterId.ScopeId, parameter.value);
    case 'ScopeStart':
      return encodeParameter(ParameterId.ScopeStart, encodeMotTime(parameter.value));
    case 'ScopeEnd':
      return encodeParameter(ParameterId.ScopeEnd, encodeMotTime(parameter.value));
  }
}

/**
 * MOT header: 7-byte core (body size, header size, content type, subtype)
 * followed by the extension with the content name and object parameters.
 */
export function encodeHeader(object: AssembledObject): Buffer {
  const extension = Buffer.concat([
    encodeContentName(object.name),
    ...object.parameters.map((parameter) => encodeObjectParameter(parameter)),
  ]);

  const headerSize = HEADER_CORE_SIZE + extension.length;
  if (object.body.length > MAX_BODY_SIZE) {
    throw new EncodingError(`Object ${object.name} body is too large (${object.body.length} bytes)`);
  }
  if (headerSize > MAX_HEADER_SIZE) {
    throw new EncodingError(`Object ${object.name} header is too large (${headerSize} bytes)`);
  }

  const core = new BitWriter()
    .write(object.body.length, 28)
    .write(headerSize, 13)
    .write(object.contentType.type, 6)
    .write(object.contentType.subtype, 9)
    .toBuffer();

  return Buffer.concat([core, extension]);
}
