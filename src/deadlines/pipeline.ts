import { z } from 'zod';
import { AuthError, describeHttpError, TransportError } from '../errors.js';
import { logger } from '../logger.js';
import {
  assignmentSchema,
  CanvasRequester,
  courseSchema,
  DeadlineReport,
  Enrollment,
  Identity,
  TaggedAssignment,
  userSchema,
} from '../types.js';
import { fetchAllPages } from '../utils.js';
import { classifyAssignments } from './classify.js';
import { resolveTimezone } from './dueDate.js';
import { ProgressReporter, ProgressTracker, silentProgress } from './progress.js';

export interface PipelineOptions {
  timezone: string;
  progress?: ProgressReporter;
  /** Source of "now"; sampled once after every course has been fetched. */
  clock?: () => Date;
  pageSize?: number;
}

const UNNAMED_COURSE = 'Unnamed Course';

function parsePayload<S extends z.ZodTypeAny>(schema: S, data: unknown, url: string): z.infer<S> {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new TransportError(
      `Unexpected payload from ${url}: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'invalid'}`,
      url
    );
  }
  return parsed.data;
}

/**
 * Resolve who the token belongs to. Any failure here is an AuthError.
 */
export async function resolveIdentity(client: CanvasRequester): Promise<Identity> {
  const url = '/api/v1/users/self';
  let data: unknown;
  try {
    const response = await client.get<unknown>(url);
    data = response.data;
  } catch (error: unknown) {
    const { message, status } = describeHttpError(error);
    const reason = status === 401 || status === 403 ? 'invalid or expired token' : message;
    throw new AuthError(`Failed to authenticate: ${reason}`, status, { cause: error });
  }

  const parsed = userSchema.safeParse(data);
  if (!parsed.success) {
    throw new AuthError('Failed to authenticate: identity response did not include a user id');
  }
  return { id: parsed.data.id, name: parsed.data.name ?? 'Unknown user' };
}

export async function listActiveEnrollments(
  client: CanvasRequester,
  identity: Identity,
  pageSize = 100
): Promise<Enrollment[]> {
  const url = `/api/v1/users/${identity.id}/courses`;
  const records = await fetchAllPages(client, url, {
    enrollment_state: 'active',
    per_page: pageSize,
  });
  return parsePayload(z.array(courseSchema), records, url).map(course => ({
    id: course.id,
    name: course.name || UNNAMED_COURSE,
  }));
}

export async function listCourseAssignments(
  client: CanvasRequester,
  enrollment: Enrollment,
  pageSize = 100
): Promise<TaggedAssignment[]> {
  const url = `/api/v1/courses/${enrollment.id}/assignments`;
  const records = await fetchAllPages(client, url, { per_page: pageSize });
  return parsePayload(z.array(assignmentSchema), records, url).map(assignment => ({
    courseName: enrollment.name,
    assignmentName: assignment.name,
    dueAt: assignment.due_at ?? null,
  }));
}

/**
 * Fetch every active course's assignments and group the upcoming ones by
 * weekday in `options.timezone`.
 *
 * Courses are fetched one at a time in enumeration order and `progress` is
 * ticked after each, including courses without assignments. AuthError and
 * TransportError end the run; ticks already sent are not retracted.
 */
export async function runDeadlinePipeline(
  client: CanvasRequester,
  options: PipelineOptions
): Promise<DeadlineReport> {
  const clock = options.clock ?? (() => new Date());
  const timezone = resolveTimezone(options.timezone);

  logger.info('Authenticating user...');
  const identity = await resolveIdentity(client);
  logger.info(`Authenticated as ${identity.name} (User ID: ${identity.id})`);

  logger.info('Fetching active courses...');
  const enrollments = await listActiveEnrollments(client, identity, options.pageSize);
  logger.info(`Found ${enrollments.length} active courses.`);

  const tracker = new ProgressTracker(enrollments.length, options.progress ?? silentProgress);
  const merged: TaggedAssignment[] = [];
  for (const enrollment of enrollments) {
    logger.info(`Fetching assignments for ${enrollment.name}`);
    const assignments = await listCourseAssignments(client, enrollment, options.pageSize);
    merged.push(...assignments);
    tracker.advance();
  }

  const now = clock();
  const { grouped, counts } = classifyAssignments(merged, now, timezone);
  logger.info(`Upcoming assignments: ${counts.upcoming}`);
  logger.info(`No due date: ${counts.noDueDate}`);
  if (counts.discarded > 0) {
    logger.debug(`Skipped ${counts.discarded} past assignments`);
  }

  return {
    identity,
    courseCount: enrollments.length,
    generatedAt: now,
    timezone,
    grouped,
    counts,
  };
}
