import { dateKeysInRange } from './dateKey';
import type { AttendanceRecord } from './types';

export type AttendanceFilter = 'all' | 'present' | 'absent';

export interface HistoryDay {
  date: string;
  present: boolean;
  record: AttendanceRecord | null;
}

export interface AttendanceHistory {
  fromKey: string;
  toKey: string;
  days: HistoryDay[];
  presentCount: number;
  absentCount: number;
}

export interface PresenceCounts {
  presentCount: number;
  absentCount: number;
}

const isPresent = (record: AttendanceRecord | null | undefined): boolean => Boolean(record?.checkIn);

/**
 * One row per calendar day in the range, newest first. Counts cover the whole range;
 * `filter` only narrows `days`.
 */
export const summarizeHistory = (
  records: AttendanceRecord[],
  fromKey: string,
  toKey: string,
  filter: AttendanceFilter = 'all',
): AttendanceHistory => {
  const byDate = new Map(records.map((record) => [record.date, record]));
  const allDays: HistoryDay[] = dateKeysInRange(fromKey, toKey).map((date) => {
    const record = byDate.get(date) ?? null;
    return { date, present: isPresent(record), record };
  });

  const presentCount = allDays.filter((day) => day.present).length;
  const days =
    filter === 'all' ? allDays : allDays.filter((day) => day.present === (filter === 'present'));

  return {
    fromKey,
    toKey,
    days,
    presentCount,
    absentCount: allDays.length - presentCount,
  };
};

export const countPresence = (records: Array<AttendanceRecord | null>): PresenceCounts => {
  const presentCount = records.filter(isPresent).length;
  return { presentCount, absentCount: records.length - presentCount };
};
