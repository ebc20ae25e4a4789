// ======================================
//	DosDateTime.ts
// ======================================
// MS-DOS time/date fields used by the local and central headers

export interface DosDateTime {
  time: number;   // hour (5 bits) + minute (6 bits) + second/2 (5 bits)
  date: number;   // year-1980 (7 bits) + month (4 bits) + day (5 bits)
}

/** 1980-01-01 00:00:00, the earliest representable instant */
export const DOS_EPOCH: DosDateTime = { time: 0, date: (1 << 5) | 1 };

/**
 * Converts a JavaScript Date (local time) to DOS time/date words.
 * Dates before 1980 clamp to the DOS epoch.
 */
export function toDosDateTime(date: Date): DosDateTime {
  if (Number.isNaN(date.valueOf()) || date.getFullYear() < 1980) {
    return { ...DOS_EPOCH };
  }

  const year = date.getFullYear() - 1980;
  const month = date.getMonth() + 1;
  const day = date.getDate();

  const datePart = ((year & 0x7f) << 9) | ((month & 0x0f) << 5) | (day & 0x1f);
  const timePart = ((date.getHours() & 0x1f) << 11) | ((date.getMinutes() & 0x3f) << 5) | ((date.getSeconds() >> 1) & 0x1f);

  return { time: timePart, date: datePart };
}

/**
 * Converts DOS time/date words to a JavaScript Date
 * @returns Date object or null if both words are 0
 */
export function fromDosDateTime(time: number, date: number): Date | null {
  if (time === 0 && date === 0)
    return null;

  const year = ((date >> 9) & 0x7f) + 1980;
  const month = ((date >> 5) & 0x0f) - 1;
  const day = date & 0x1f;

  const hour = (time >> 11) & 0x1f;
  const minute = (time >> 5) & 0x3f;
  const second = (time & 0x1f) << 1;

  return new Date(year, month, day, hour, minute, second);
}
