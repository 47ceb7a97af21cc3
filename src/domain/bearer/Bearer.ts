/**
 * DAB bearer - ensemble, service and component identity of a broadcast carriage.
 *
 * URI form: dab:{gcc}.{eid}.{sid}.{scids}, where gcc is the first hex digit of
 * the SId followed by the ECC (e.g. dab:ce1.c185.c221.0).
 */
export class Bearer {
  public readonly ecc: number;
  public readonly eid: number;
  public readonly sid: number;
  public readonly scids: number;

  constructor(ecc: number, eid: number, sid: number, scids: number = 0) {
    if (!Number.isInteger(ecc) || ecc < 0 || ecc > 0xff) {
      throw new RangeError(`Invalid ECC: ${ecc}`);
    }
    if (!Number.isInteger(eid) || eid < 0 || eid > 0xffff) {
      throw new RangeError(`Invalid EId: ${eid}`);
    }
    if (!Number.isInteger(sid) || sid < 0 || sid > 0xffffffff) {
      throw new RangeError(`Invalid SId: ${sid}`);
    }
    if (!Number.isInteger(scids) || scids < 0 || scids > 0xf) {
      throw new RangeError(`Invalid SCIdS: ${scids}`);
    }
    this.ecc = ecc;
    this.eid = eid;
    this.sid = sid;
    this.scids = scids;
  }

  /**
   * Parse a dab: bearer URI. Returns null for anything that is not a DAB bearer.
   */
  public static parse(uri: string): Bearer | null {
    const match = /^dab:([0-9a-f])([0-9a-f]{2})\.([0-9a-f]{4})\.([0-9a-f]{4}|[0-9a-f]{8})\.([0-9a-f])$/i.exec(
      uri.trim()
    );
    if (!match) {
      return null;
    }

    const [, countryId, ecc, eid, sid, scids] = match;
    // The country id nibble must agree with the SId for 16-bit service ids
    if (sid.length === 4 && sid[0].toLowerCase() !== countryId.toLowerCase()) {
      return null;
    }

    return new Bearer(parseInt(ecc, 16), parseInt(eid, 16), parseInt(sid, 16), parseInt(scids, 16));
  }

  /**
   * Global country code: SId country nibble followed by the ECC
   */
  public get gcc(): string {
    return `${this.countryId.toString(16)}${hex(this.ecc, 2)}`;
  }

  public get countryId(): number {
    return this.isDataService() ? (this.sid >>> 20) & 0xf : (this.sid >>> 12) & 0xf;
  }

  /**
   * 32-bit SIds identify data services
   */
  public isDataService(): boolean {
    return this.sid > 0xffff;
  }

  public get uri(): string {
    return `dab:${this.gcc}.${this.hexEid}.${this.hexSid}.${this.scids.toString(16)}`;
  }

  public get hexEid(): string {
    return hex(this.eid, 4);
  }

  public get hexSid(): string {
    return hex(this.sid, this.isDataService() ? 8 : 4);
  }

  /**
   * Path segments used in RadioDNS document URLs: dab/{gcc}/{eid}/{sid}/{scids}
   */
  public get path(): string {
    return ['dab', this.gcc, this.hexEid, this.hexSid, this.scids.toString(16)].join('/');
  }

  public isSameMultiplex(other: { ecc: number; eid: number }): boolean {
    return this.ecc === other.ecc && this.eid === other.eid;
  }

  public equals(other: Bearer): boolean {
    return this.uri === other.uri;
  }

  public toString(): string {
    return this.uri;
  }
}

function hex(value: number, width: number): string {
  return value.toString(16).padStart(width, '0');
}
