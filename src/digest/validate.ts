import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc.js';
import { DigestDocument, DigestIssue } from './document.js';
import { NO_DUE_DATE } from './normalize.js';

dayjs.extend(utc);

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

/**
 * True for a real calendar date in YYYY-MM-DD form. dayjs rolls 2025-02-30
 * over to March, so a round trip through format() catches impossible days.
 */
export function isCalendarDate(value: string): boolean {
  if (!ISO_DATE.test(value)) return false;
  const parsed = dayjs.utc(value);
  return parsed.isValid() && parsed.format('YYYY-MM-DD') === value;
}

export function validateDigest(document: DigestDocument): DigestIssue[] {
  const issues: DigestIssue[] = [...document.issues];

  for (const course of document.courses) {
    const seenTitles = new Set<string>();
    let lastDate: string | null = null;
    let undatedSeen = false;

    for (const row of course.rows) {
      const issue = (kind: DigestIssue['kind'], message: string) =>
        issues.push({ kind, line: row.line, courseId: course.id, message });

      if (!row.title) {
        issue('empty-title', 'Assignment title is empty');
      } else if (seenTitles.has(row.title)) {
        issue('duplicate-title', `Duplicate assignment "${row.title}"`);
      } else {
        seenTitles.add(row.title);
      }

      if (row.due === NO_DUE_DATE) {
        undatedSeen = true;
        continue;
      }

      if (!isCalendarDate(row.due)) {
        issue('invalid-due-date', `"${row.due}" is neither a YYYY-MM-DD date nor "${NO_DUE_DATE}"`);
        continue;
      }

      if (undatedSeen) {
        issue('out-of-order', `"${row.title}" (${row.due}) is listed after an assignment with no due date`);
      } else if (lastDate !== null && row.due < lastDate) {
        issue('out-of-order', `"${row.title}" (${row.due}) is listed after ${lastDate}`);
      }
      if (lastDate === null || row.due > lastDate) lastDate = row.due;
    }
  }

  return issues.sort((a, b) => a.line - b.line);
}
