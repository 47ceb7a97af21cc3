import { BitWriter } from './BitWriter';

// Modified Julian Date of the Unix epoch
const MJD_EPOCH = 40587;
const MS_PER_DAY = 86_400_000;
const MJD_LIMIT = 1 << 17;

export function modifiedJulianDate(date: Date): number {
  return MJD_EPOCH + Math.floor(date.getTime() / MS_PER_DAY);
}

/**
 * Whether the date's MJD fits the 17-bit field
 */
export function isEncodableMotTime(date: Date): boolean {
  const mjd = modifiedJulianDate(date);
  return Number.isInteger(mjd) && mjd >= 0 && mjd < MJD_LIMIT;
}

/**
 * MOT UTC time, long form (48 bits): validity, MJD, UTC flag, hours, minutes,
 * seconds and milliseconds.
 */
export function encodeMotTime(date: Date): Buffer {
  return new BitWriter()
    .write(1, 1) // validity
    .write(modifiedJulianDate(date), 17)
    .write(0, 2) // rfu
    .write(1, 1) // long form
    .write(date.getUTCHours(), 5)
    .write(date.getUTCMinutes(), 6)
    .write(date.getUTCSeconds(), 6)
    .write(date.getUTCMilliseconds(), 10)
    .toBuffer();
}
