import { AssignmentsByCourse, CanvasCourse, OutputFormat } from '../types/index.js';
import { cleanCourseName, formatDueDate, parseDueDate, UNTITLED } from './normalize.js';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['text', 'md', 'html', 'csv'];

type Renderer = (title: string, courses: CanvasCourse[], assignmentsByCourse: AssignmentsByCourse) => string;

interface Row {
  name: string;
  due: string;
}

function rowsFor(course: CanvasCourse, assignmentsByCourse: AssignmentsByCourse): Row[] {
  return (assignmentsByCourse.get(course.id) ?? []).map((assignment) => ({
    name: assignment.name.trim() || UNTITLED,
    due: formatDueDate(parseDueDate(assignment.dueAt)),
  }));
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#x27;');
}

export const renderText: Renderer = (title, courses, assignmentsByCourse) => {
  const lines = [title, ''];
  for (const course of courses) {
    lines.push(`Course: ${cleanCourseName(course.name)} (ID: ${course.id})`);
    for (const row of rowsFor(course, assignmentsByCourse)) {
      lines.push(`- "${row.name}" | Due: ${row.due}`);
    }
    lines.push('');
  }
  return lines.join('\n');
};

export const renderMarkdown: Renderer = (title, courses, assignmentsByCourse) => {
  const lines = [`# ${title}`, ''];
  for (const course of courses) {
    lines.push(`## Course: ${cleanCourseName(course.name)} (ID: ${course.id})`);
    lines.push('| Assignment | Due |');
    lines.push('|---|---|');
    for (const row of rowsFor(course, assignmentsByCourse)) {
      lines.push(`| ${row.name.replace(/\|/g, '\\|')} | ${row.due} |`);
    }
    lines.push('');
  }
  return lines.join('\n');
};

// No quoting: commas inside values are replaced with spaces instead
export const renderCsv: Renderer = (_title, courses, assignmentsByCourse) => {
  const rows = ['course_id,course_name,assignment,due_date'];
  for (const course of courses) {
    const courseName = cleanCourseName(course.name).replace(/,/g, ' ');
    for (const row of rowsFor(course, assignmentsByCourse)) {
      rows.push(`${course.id},${courseName},${row.name.replace(/,/g, ' ')},${row.due}`);
    }
  }
  return rows.join('\n');
};

const HTML_STYLE = [
  'body{font-family:system-ui,-apple-system,Segoe UI,Roboto,Helvetica,Arial,sans-serif; margin:24px; color:#111}',
  'h1{font-size:24px; margin:0 0 16px}',
  'h2{font-size:18px; margin:24px 0 8px}',
  'table{border-collapse:collapse; width:100%; margin-bottom:12px}',
  'th,td{border:1px solid #ddd; padding:8px; vertical-align:top}',
  'th{background:#f7f7f7; text-align:left}',
  '.muted{color:#666; font-style:italic}',
  '.container{max-width:960px; margin:0 auto}',
].join('\n');

export const renderHtml: Renderer = (title, courses, assignmentsByCourse) => {
  const parts = [
    '<!doctype html>\n' +
      '<html><head><meta charset="utf-8">\n' +
      `<title>${escapeHtml(title)}</title>\n` +
      `<style>\n${HTML_STYLE}\n</style></head><body><div class="container">\n` +
      `<h1>${escapeHtml(title)}</h1>\n`,
  ];

  for (const course of courses) {
    parts.push(`<h2>Course: ${escapeHtml(cleanCourseName(course.name))} (ID: ${course.id})</h2>`);
    parts.push('<table><thead><tr><th>Assignment</th><th>Due</th></tr></thead><tbody>');
    for (const row of rowsFor(course, assignmentsByCourse)) {
      parts.push(`<tr><td>${escapeHtml(row.name)}</td><td>${escapeHtml(row.due)}</td></tr>`);
    }
    parts.push('</tbody></table>');
  }

  parts.push('</div></body></html>');
  return parts.join('');
};

const RENDERERS: Record<OutputFormat, Renderer> = {
  text: renderText,
  md: renderMarkdown,
  html: renderHtml,
  csv: renderCsv,
};

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

export function buildOutput(
  format: string,
  title: string,
  courses: CanvasCourse[],
  assignmentsByCourse: AssignmentsByCourse
): string {
  const render = isOutputFormat(format) ? RENDERERS[format] : renderText;
  return render(title, courses, assignmentsByCourse);
}
