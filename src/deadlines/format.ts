import { DeadlineReport, NO_DUE_DATE, UpcomingAssignment, UndatedAssignment, WEEKDAYS } from '../types.js';

export function progressPercent(completed: number, total: number): number {
  return Math.floor((completed / Math.max(total, 1)) * 100);
}

export function formatUpcoming(item: UpcomingAssignment): string {
  return [
    `[${item.courseName}] ${item.assignmentName}`,
    `   Due: ${item.localDue} ${item.zoneAbbreviation}`,
    `   In: ${item.remaining.days} days ${item.remaining.hours} hrs`,
  ].join('\n');
}

export function formatUndated(item: UndatedAssignment): string {
  return `[${item.courseName}] ${item.assignmentName}`;
}

/**
 * Render a report as the text a tool returns: one section per weekday, then
 * the "No Due Date" section.
 */
export function formatDeadlineReport(report: DeadlineReport): string {
  const sections = [`Authenticated as: ${report.identity.name} (ID: ${report.identity.id})`];

  for (const day of WEEKDAYS) {
    const items = report.grouped.byWeekday[day];
    const body = items.length > 0 ? items.map(formatUpcoming).join('\n\n') : 'No assignments due.';
    sections.push(`${day}:\n${body}`);
  }

  const undated = report.grouped.noDueDate;
  sections.push(
    `${NO_DUE_DATE}:\n${undated.length > 0 ? undated.map(formatUndated).join('\n') : 'No assignments without due dates.'}`
  );

  sections.push(
    `Courses: ${report.courseCount} | Upcoming: ${report.counts.upcoming} | No due date: ${report.counts.noDueDate} | Times in ${report.timezone}`
  );
  return sections.join('\n\n');
}
