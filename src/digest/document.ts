/**
 * Reader for the markdown digest layout written by `renderMarkdown`:
 *
 *   # <title>
 *   ## Course: <name> (ID: <id>)
 *   | Assignment | Due |
 *   |---|---|
 *   | <title> | <YYYY-MM-DD or "No due date"> |
 */

export type IssueKind =
  | 'malformed-heading'
  | 'malformed-row'
  | 'orphan-row'
  | 'empty-title'
  | 'duplicate-title'
  | 'invalid-due-date'
  | 'out-of-order';

export interface DigestIssue {
  kind: IssueKind;
  line: number;
  courseId: number | null;
  message: string;
}

export interface DigestRow {
  title: string;
  due: string;
  line: number;
}

export interface DigestCourse {
  name: string;
  id: number;
  line: number;
  rows: DigestRow[];
}

export interface DigestDocument {
  title: string | null;
  courses: DigestCourse[];
  issues: DigestIssue[];
}

const TITLE_PATTERN = /^#\s+(.+)$/;
const COURSE_PATTERN = /^##\s+(?:Course:\s*)?(.+?)\s*\(ID:\s*(\d+)\)$/;
const DIVIDER_CELL = /^:?-{3,}:?$/;

function splitCells(line: string): string[] {
  const cells = line.split(/(?<!\\)\|/);
  if (cells[0].trim() === '') cells.shift();
  if (cells.length > 0 && cells[cells.length - 1].trim() === '') cells.pop();
  return cells.map((cell) => cell.trim().replace(/\\\|/g, '|'));
}

function isHeaderRow(cells: string[]): boolean {
  return cells.length === 2 && cells[0].toLowerCase() === 'assignment' && cells[1].toLowerCase() === 'due';
}

export function parseDigestMarkdown(text: string): DigestDocument {
  const document: DigestDocument = { title: null, courses: [], issues: [] };
  let current: DigestCourse | null = null;

  text.split(/\r?\n/).forEach((raw, index) => {
    const line = raw.trim();
    const lineNumber = index + 1;
    if (!line) return;

    if (line.startsWith('## ')) {
      const match = line.match(COURSE_PATTERN);
      if (!match) {
        document.issues.push({
          kind: 'malformed-heading',
          line: lineNumber,
          courseId: null,
          message: `Course heading without "(ID: <number>)": ${line}`,
        });
        current = null;
        return;
      }
      current = { name: match[1], id: Number(match[2]), line: lineNumber, rows: [] };
      document.courses.push(current);
      return;
    }

    const titleMatch = line.match(TITLE_PATTERN);
    if (titleMatch) {
      if (document.title === null) document.title = titleMatch[1].trim();
      return;
    }

    if (!line.startsWith('|')) return;

    const cells = splitCells(line);
    if (cells.length > 0 && cells.every((cell) => DIVIDER_CELL.test(cell))) return;
    if (isHeaderRow(cells)) return;

    if (!current) {
      document.issues.push({
        kind: 'orphan-row',
        line: lineNumber,
        courseId: null,
        message: 'Table row appears before any course heading',
      });
      return;
    }
    if (cells.length !== 2) {
      document.issues.push({
        kind: 'malformed-row',
        line: lineNumber,
        courseId: current.id,
        message: `Expected 2 cells, found ${cells.length}`,
      });
      return;
    }

    current.rows.push({ title: cells[0], due: cells[1], line: lineNumber });
  });

  return document;
}
