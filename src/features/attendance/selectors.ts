import type { AttendanceRecord } from './types';

export const isOnShift = (record: AttendanceRecord | null | undefined): boolean =>
  Boolean(record?.checkIn && !record.checkOut);

export const workedMinutes = (checkIn: Date, checkOut: Date | null, now: Date = new Date()): number => {
  const end = checkOut ?? now;
  const diffMs = end.getTime() - checkIn.getTime();
  if (Number.isNaN(diffMs) || diffMs <= 0) {
    return 0;
  }
  return Math.floor(diffMs / (1000 * 60));
};

/** `Xh Ym` for a completed shift, `—` while either end is missing. */
export const shiftDurationLabel = (record: Pick<AttendanceRecord, 'checkIn' | 'checkOut'> | null): string => {
  if (!record?.checkIn || !record.checkOut) {
    return '—';
  }
  const minutes = workedMinutes(record.checkIn, record.checkOut);
  const hours = Math.floor(minutes / 60);
  const remainder = minutes % 60;
  return hours > 0 ? `${hours}h ${remainder}m` : `${remainder}m`;
};
