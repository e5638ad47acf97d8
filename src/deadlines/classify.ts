import { DateTime } from 'luxon';
import { ParseError } from '../errors.js';
import { logger } from '../logger.js';
import {
  ClassificationCounts,
  GroupedResult,
  Remaining,
  TaggedAssignment,
  UndatedAssignment,
  UpcomingAssignment,
  Weekday,
  WEEKDAYS,
} from '../types.js';
import { parseDueDate } from './dueDate.js';

const MS_PER_HOUR = 60 * 60 * 1000;
const MS_PER_DAY = 24 * MS_PER_HOUR;

export interface Classification {
  grouped: GroupedResult;
  counts: ClassificationCounts;
  discarded: TaggedAssignment[];
}

interface DatedRecord {
  record: TaggedAssignment;
  dueAt: Date;
}

export function emptyGroupedResult(): GroupedResult {
  const byWeekday: Record<Weekday, UpcomingAssignment[]> = {
    Monday: [],
    Tuesday: [],
    Wednesday: [],
    Thursday: [],
    Friday: [],
    Saturday: [],
    Sunday: [],
  };
  return { byWeekday, noDueDate: [] };
}

/**
 * Whole days, then whole hours of what is left. `now` after `dueAt` yields
 * zeroes.
 */
export function remainingUntil(dueAt: Date, now: Date): Remaining {
  const delta = Math.max(0, dueAt.getTime() - now.getTime());
  return {
    days: Math.floor(delta / MS_PER_DAY),
    hours: Math.floor((delta % MS_PER_DAY) / MS_PER_HOUR),
  };
}

export function sortByDueDate<T extends { dueAt: Date }>(items: readonly T[]): T[] {
  return [...items].sort((a, b) => a.dueAt.getTime() - b.dueAt.getTime());
}

function toUpcoming({ record, dueAt }: DatedRecord, now: Date, timezone: string): UpcomingAssignment {
  const local = DateTime.fromJSDate(dueAt, { zone: timezone });
  return {
    courseName: record.courseName,
    assignmentName: record.assignmentName,
    dueAt,
    localDue: local.toFormat('yyyy-MM-dd HH:mm'),
    zoneAbbreviation: local.toFormat('ZZZZ'),
    // luxon weekdays run 1 (Monday) to 7 (Sunday)
    weekday: WEEKDAYS[local.weekday - 1],
    remaining: remainingUntil(dueAt, now),
  };
}

/**
 * Split merged assignments into weekday buckets, the "No Due Date" bucket and
 * the discarded past ones. `now` is the single cutoff for the whole batch and
 * is inclusive: an assignment due exactly at `now` is upcoming.
 */
export function classifyAssignments(
  records: readonly TaggedAssignment[],
  now: Date,
  timezone: string
): Classification {
  const upcoming: DatedRecord[] = [];
  const undated: UndatedAssignment[] = [];
  const discarded: TaggedAssignment[] = [];
  let unparseable = 0;

  for (const record of records) {
    if (record.dueAt === null || record.dueAt === '') {
      undated.push({ courseName: record.courseName, assignmentName: record.assignmentName });
      continue;
    }

    let dueAt: Date;
    try {
      dueAt = parseDueDate(record.dueAt);
    } catch (error) {
      if (!(error instanceof ParseError)) throw error;
      logger.warn(`${error.message} on "${record.assignmentName}" (${record.courseName}); listing it without a due date`);
      unparseable += 1;
      undated.push({
        courseName: record.courseName,
        assignmentName: record.assignmentName,
        rawDueAt: record.dueAt,
      });
      continue;
    }

    if (dueAt.getTime() >= now.getTime()) {
      upcoming.push({ record, dueAt });
    } else {
      discarded.push(record);
    }
  }

  const grouped = emptyGroupedResult();
  for (const dated of sortByDueDate(upcoming)) {
    const entry = toUpcoming(dated, now, timezone);
    grouped.byWeekday[entry.weekday].push(entry);
  }
  grouped.noDueDate = undated;

  return {
    grouped,
    discarded,
    counts: {
      total: records.length,
      upcoming: upcoming.length,
      noDueDate: undated.length,
      unparseable,
      discarded: discarded.length,
    },
  };
}
