import { Bearer } from '../bearer/Bearer';

/**
 * MOT content type / subtype pair
 */
export interface ContentType {
  type: number; // 6 bits
  subtype: number; // 9 bits
}

export const ContentTypes = {
  png: { type: 2, subtype: 3 },
  serviceInformation: { type: 7, subtype: 0 },
  programmeInformation: { type: 7, subtype: 1 },
} as const satisfies Record<string, ContentType>;

export type MotParameter =
  | { kind: 'ScopeId'; value: Buffer }
  | { kind: 'ScopeStart'; value: Date }
  | { kind: 'ScopeEnd'; value: Date };

/**
 * Named object handed to the MOT packaging stage
 */
export interface AssembledObject {
  name: string;
  body: Buffer;
  contentType: ContentType;
  parameters: MotParameter[];
}

/**
 * ScopeId of a whole ensemble: ECC(8) EId(16)
 */
export function ensembleScopeId(ensemble: { ecc: number; eid: number }): Buffer {
  const value = Buffer.alloc(3);
  value.writeUInt8(ensemble.ecc, 0);
  value.writeUInt16BE(ensemble.eid, 1);
  return value;
}

/**
 * ScopeId of one service component: ECC(8) EId(16) SId(16|32) SCIdS(8)
 */
export function serviceScopeId(bearer: Bearer): Buffer {
  const sidLength = bearer.isDataService() ? 4 : 2;
  const value = Buffer.alloc(3 + sidLength + 1);
  value.writeUInt8(bearer.ecc, 0);
  value.writeUInt16BE(bearer.eid, 1);
  if (sidLength === 4) {
    value.writeUInt32BE(bearer.sid, 3);
  } else {
    value.writeUInt16BE(bearer.sid, 3);
  }
  value.writeUInt8(bearer.scids, 3 + sidLength);
  return value;
}

export function findParameter<K extends MotParameter['kind']>(
  object: AssembledObject,
  kind: K
): Extract<MotParameter, { kind: K }> | undefined {
  return object.parameters.find(
    (parameter): parameter is Extract<MotParameter, { kind: K }> => parameter.kind === kind
  );
}
