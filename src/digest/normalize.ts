import * as chrono from 'chrono-node';
import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc.js';
import { CanvasAssignment, DigestAssignment, DueWindow } from '../types/index.js';

dayjs.extend(utc);

export const NO_DUE_DATE = 'No due date';
export const UNTITLED = 'Untitled';

/**
 * Strip the term and section noise Canvas appends to course names, e.g.
 * "MSBA-265-01-30797 Special Analytics Topics (Spring 2025)" becomes
 * "MSBA-265 Special Analytics Topics".
 */
export function cleanCourseName(name: string | null | undefined): string {
  if (!name) return UNTITLED;

  return name
    .replace(/\s*\([^)]+?\d{4}\)\s*$/, '')
    .replace(/\s*\((?:Spring|Fall|Summer|Winter)[^)]+\)\s*$/i, '')
    .replace(/-(?:\d{2}|ON\d?)-\d{5,}/gi, '')
    .replace(/\s{2,}/g, ' ')
    .trim();
}

// Date, optional time and optional zone: 2025-03-01, 2025-03-01T06:59:59Z, 2025-03-01 06:59:59.123-08:00
const ISO_8601 = /^\d{4}-\d{2}-\d{2}(?:[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/i;

export function parseDueDate(dueAt: string | null | undefined): Date | null {
  if (!dueAt || !ISO_8601.test(dueAt)) return null;
  // dayjs rolls impossible days such as 02-30 into the next month
  const day = dueAt.slice(0, 10);
  if (dayjs.utc(day).format('YYYY-MM-DD') !== day) return null;
  const parsed = dayjs.utc(dueAt);
  return parsed.isValid() ? parsed.toDate() : null;
}

export function formatDueDate(date: Date | null): string {
  return date ? dayjs.utc(date).format('YYYY-MM-DD') : NO_DUE_DATE;
}

export function toDigestAssignment(assignment: CanvasAssignment): DigestAssignment {
  return {
    name: assignment.name?.trim() || UNTITLED,
    dueAt: assignment.due_at ?? null,
    published: assignment.published ?? true,
  };
}

/**
 * Ascending by due instant; assignments without a (parsable) due date go last
 * and keep their relative order.
 */
export function sortAssignments(assignments: DigestAssignment[]): DigestAssignment[] {
  const keyed = assignments.map((assignment) => ({
    assignment,
    due: parseDueDate(assignment.dueAt),
  }));

  keyed.sort((a, b) => {
    if (a.due && b.due) return a.due.getTime() - b.due.getTime();
    if (a.due) return -1;
    if (b.due) return 1;
    return 0;
  });

  return keyed.map(({ assignment }) => assignment);
}

/**
 * Resolve a window bound such as "today", "next friday" or "2025-05-01".
 * Bounds are whole days: `from` snaps to the start of its day, `until` to the end.
 */
export function parseWindowBound(text: string, edge: 'from' | 'until', referenceDate?: Date): Date {
  const parsed = chrono.parseDate(text, referenceDate ?? new Date());
  if (!parsed) {
    throw new Error(`Could not understand date "${text}"`);
  }
  const day = dayjs(parsed);
  return (edge === 'from' ? day.startOf('day') : day.endOf('day')).toDate();
}

export function filterByWindow(assignments: DigestAssignment[], window: DueWindow): DigestAssignment[] {
  const { from, until } = window;
  if (!from && !until) return assignments;

  return assignments.filter((assignment) => {
    const due = parseDueDate(assignment.dueAt);
    // Undated assignments always pass
    if (!due) return true;
    if (from && due < from) return false;
    if (until && due > until) return false;
    return true;
  });
}
