import { AxiosInstance } from 'axios';
import { z } from 'zod';

export interface DeadlinesConfig {
  apiToken: string;
  baseUrl: string;
  timezone: string;
  pageSize: number;
  timeoutMs: number;
}

/**
 * The slice of the HTTP client the fetcher and pipeline need. Auth headers are
 * already set on the instance.
 */
export type CanvasRequester = Pick<AxiosInstance, 'get'>;

// --- Canvas payloads ---

const canvasId = z.union([z.number(), z.string()]);

export const userSchema = z.object({
  id: canvasId,
  name: z.string().nullish(),
});

export const courseSchema = z.object({
  id: canvasId,
  name: z.string().nullish(),
});

export const assignmentSchema = z.object({
  name: z.string(),
  due_at: z.string().nullish(), // ISO 8601, UTC
});

// --- Pipeline records ---

export interface Identity {
  id: number | string;
  name: string;
}

export interface Enrollment {
  id: number | string;
  name: string;
}

/** An assignment as Canvas returned it, tagged with the course it came from. */
export interface TaggedAssignment {
  courseName: string;
  assignmentName: string;
  dueAt: string | null;
}

export const WEEKDAYS = [
  'Monday',
  'Tuesday',
  'Wednesday',
  'Thursday',
  'Friday',
  'Saturday',
  'Sunday',
] as const;

export type Weekday = (typeof WEEKDAYS)[number];

export const NO_DUE_DATE = 'No Due Date';

export interface Remaining {
  days: number;
  hours: number;
}

export interface UpcomingAssignment {
  courseName: string;
  assignmentName: string;
  dueAt: Date;
  localDue: string; // yyyy-MM-dd HH:mm in the report timezone
  zoneAbbreviation: string;
  weekday: Weekday;
  remaining: Remaining;
}

export interface UndatedAssignment {
  courseName: string;
  assignmentName: string;
  rawDueAt?: string; // set when the due date was present but unreadable
}

export interface GroupedResult {
  byWeekday: Record<Weekday, UpcomingAssignment[]>;
  noDueDate: UndatedAssignment[];
}

export interface ClassificationCounts {
  total: number;
  upcoming: number;
  noDueDate: number;
  unparseable: number;
  discarded: number;
}

export interface DeadlineReport {
  identity: Identity;
  courseCount: number;
  generatedAt: Date;
  timezone: string;
  grouped: GroupedResult;
  counts: ClassificationCounts;
}
