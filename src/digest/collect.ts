import { CanvasReader } from '../canvas/client.js';
import { config } from '../utils/config.js';
import { logger } from '../utils/logger.js';
import { CanvasApiError, NoCoursesError } from '../utils/errors.js';
import {
  AssignmentsByCourse,
  CanvasCourse,
  CanvasAssignment,
  CourseSource,
  DueWindow,
  OutputFormat,
} from '../types/index.js';
import { filterByWindow, sortAssignments, toDigestAssignment } from './normalize.js';
import { buildOutput } from './render.js';

export interface DigestRequest {
  courseIds?: number[];
  term?: string;
  max: number;
  source: CourseSource;
  title?: string;
  format: OutputFormat;
  window?: DueWindow;
}

export interface Digest {
  title: string;
  courses: CanvasCourse[];
  assignmentsByCourse: AssignmentsByCourse;
  output: string;
}

/** Receives the per-course failures that are reported and then skipped. */
export type ProblemReporter = (message: string) => void;

export async function collectCourses(
  client: CanvasReader,
  request: DigestRequest,
  report: ProblemReporter
): Promise<CanvasCourse[]> {
  if (request.courseIds && request.courseIds.length > 0) {
    const courses: CanvasCourse[] = [];
    for (const courseId of request.courseIds.slice(0, request.max)) {
      try {
        courses.push(await client.getCourse(courseId));
      } catch (error) {
        if (!(error instanceof CanvasApiError)) throw error;
        logger.debug(`Course ${courseId}: ${error.body}`);
        report(`Failed to fetch course ${courseId}: ${error.status}`);
      }
    }
    if (courses.length === 0) {
      throw new NoCoursesError('No courses fetched. Check IDs or permissions.');
    }
    return courses;
  }

  if (request.term === undefined) {
    throw new Error('Either course IDs or a term is required');
  }

  const courses = await client.listCoursesForTerm(request.term, request.max, request.source);
  if (courses.length === 0) {
    throw new NoCoursesError(`No courses found for term containing: '${request.term}'.`);
  }
  return courses;
}

export async function collectAssignments(
  client: CanvasReader,
  courses: CanvasCourse[],
  report: ProblemReporter,
  window: DueWindow = {}
): Promise<AssignmentsByCourse> {
  const assignmentsByCourse: AssignmentsByCourse = new Map();

  for (const course of courses) {
    let raw: CanvasAssignment[];
    try {
      raw = await client.listAssignments(course.id);
    } catch (error) {
      if (!(error instanceof CanvasApiError)) throw error;
      report(`Failed to fetch assignments for ${course.id}: ${error.message}`);
      raw = [];
    }

    const assignments = filterByWindow(raw.map(toDigestAssignment), window);
    assignmentsByCourse.set(course.id, sortAssignments(assignments));
  }

  return assignmentsByCourse;
}

export function digestTitle(request: Pick<DigestRequest, 'term' | 'title'>): string {
  if (request.term) {
    return `${request.term} Courses & Assignments (sorted by due date)`;
  }
  return request.title ?? config.digest.title;
}

export async function generateDigest(
  client: CanvasReader,
  request: DigestRequest,
  report: ProblemReporter
): Promise<Digest> {
  const courses = await collectCourses(client, request, report);
  logger.info(`Collecting assignments for ${courses.length} course(s)`);

  const assignmentsByCourse = await collectAssignments(client, courses, report, request.window);
  const title = digestTitle(request);

  return {
    title,
    courses,
    assignmentsByCourse,
    output: buildOutput(request.format, title, courses, assignmentsByCourse),
  };
}
