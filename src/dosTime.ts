export interface DosDateTime {
  time: number;
  date: number;
}

/** Earliest instant a DOS timestamp can hold; the default for reproducible archives. */
export const DOS_EPOCH = new Date(Date.UTC(1980, 0, 1, 0, 0, 0));

/**
 * Convert to DOS date/time using UTC fields so output does not depend on
 * the host time zone. Dates before 1980 clamp to {@link DOS_EPOCH}.
 */
export function dateToDos(date: Date): DosDateTime {
  const source = date.getTime() < DOS_EPOCH.getTime() ? DOS_EPOCH : date;
  const year = Math.min(source.getUTCFullYear(), 2107);
  const month = source.getUTCMonth() + 1;
  const day = source.getUTCDate();
  const hours = source.getUTCHours();
  const minutes = source.getUTCMinutes();
  const seconds = Math.floor(source.getUTCSeconds() / 2);

  const dosTime = (hours << 11) | (minutes << 5) | seconds;
  const dosDate = ((year - 1980) << 9) | (month << 5) | day;

  return { time: dosTime & 0xffff, date: dosDate & 0xffff };
}

export function dosToDate(time: number, date: number): Date {
  const day = date & 0x1f;
  const month = (date >> 5) & 0x0f;
  const year = ((date >> 9) & 0x7f) + 1980;

  const second = (time & 0x1f) * 2;
  const minute = (time >> 5) & 0x3f;
  const hour = (time >> 11) & 0x1f;

  return new Date(Date.UTC(year, month - 1, day, hour, minute, second));
}
