import axios, { AxiosAdapter, AxiosInstance, AxiosResponse } from 'axios';
import { setTimeout as delay } from 'timers/promises';
import { config } from '../utils/config.js';
import { logger } from '../utils/logger.js';
import { CanvasApiError } from '../utils/errors.js';
import { CanvasAssignment, CanvasCourse, CourseSource } from '../types/index.js';

export type QueryParams = Array<[string, string]>;

export interface CanvasClientOptions {
  maxRetries?: number;
  timeout?: number;
  sleep?: (ms: number) => Promise<void>;
  adapter?: AxiosAdapter;
}

/**
 * The read operations the digest needs. Commands depend on this rather than on
 * CanvasClient so a stand-in can be passed in.
 */
export interface CanvasReader {
  getCourse(courseId: number): Promise<CanvasCourse>;
  listCoursesForTerm(term: string, max: number, source: CourseSource): Promise<CanvasCourse[]>;
  listAssignments(courseId: number): Promise<CanvasAssignment[]>;
}

const COURSES_ENDPOINT = '/api/v1/courses';
const SELF_COURSES_ENDPOINT = '/api/v1/users/self/courses';
const RETRYABLE_STATUSES = new Set([500, 502, 503, 504]);
const DEFAULT_RETRY_AFTER_SECONDS = 3;

function isOk(status: number): boolean {
  return status >= 200 && status < 300;
}

function headerValue(response: AxiosResponse, name: string): string | undefined {
  const value: unknown = response.headers[name.toLowerCase()] ?? response.headers[name];
  return typeof value === 'string' ? value : undefined;
}

function toItems<T>(data: T | T[]): T[] {
  return Array.isArray(data) ? data : [data];
}

/**
 * Pull the rel="next" URL out of an RFC 8288 Link header, as Canvas sends for
 * paginated collections.
 */
export function nextLinkFromHeader(linkHeader: string | undefined): string | null {
  if (!linkHeader) return null;

  for (const part of linkHeader.split(',')) {
    if (part.includes('rel="next"')) {
      const match = part.match(/<([^>]+)>/);
      if (match) return match[1];
    }
  }
  return null;
}

export class CanvasClient implements CanvasReader {
  private readonly http: AxiosInstance;
  private readonly maxRetries: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(baseUrl: string, token: string, options: CanvasClientOptions = {}) {
    this.maxRetries = options.maxRetries ?? config.canvas.maxRetries;
    this.sleep = options.sleep ?? ((ms) => delay(ms));
    this.http = axios.create({
      baseURL: baseUrl.replace(/\/+$/, ''),
      timeout: options.timeout ?? config.canvas.timeout,
      headers: {
        Authorization: `Bearer ${token}`,
        Accept: 'application/json',
        'User-Agent': config.canvas.userAgent,
      },
      // Statuses are inspected here rather than thrown by axios
      validateStatus: () => true,
      adapter: options.adapter,
    });
  }

  async getWithRetries<T>(url: string, params?: QueryParams): Promise<AxiosResponse<T>> {
    let attempt = 0;

    for (;;) {
      const response = await this.http.get<T>(url, {
        params: params ? new URLSearchParams(params) : undefined,
      });

      if (response.status === 429) {
        if (attempt >= this.maxRetries) return response;
        const retryAfter = Number.parseInt(headerValue(response, 'Retry-After') ?? '', 10);
        const seconds = Number.isNaN(retryAfter) ? DEFAULT_RETRY_AFTER_SECONDS : retryAfter;
        logger.warn(`Rate limited on ${url}, retrying in ${seconds}s`);
        await this.sleep(seconds * 1000);
        attempt++;
        continue;
      }

      if (RETRYABLE_STATUSES.has(response.status)) {
        if (attempt >= this.maxRetries) return response;
        const seconds = 2 ** attempt;
        logger.warn(`Canvas returned ${response.status} for ${url}, retrying in ${seconds}s`);
        await this.sleep(seconds * 1000);
        attempt++;
        continue;
      }

      return response;
    }
  }

  async *paginate<T>(url: string, params?: QueryParams): AsyncGenerator<T> {
    let next: string | null = url;
    // The next link already carries the query string
    let query = params;

    while (next) {
      const response: AxiosResponse<T | T[]> = await this.getWithRetries<T | T[]>(next, query);
      if (!isOk(response.status)) {
        throw CanvasApiError.fromResponse(next, response);
      }

      for (const item of toItems(response.data)) {
        yield item;
      }

      next = nextLinkFromHeader(headerValue(response, 'Link'));
      query = undefined;
    }
  }

  async listCoursesFrom(endpoint: string, termSubstring: string, max: number): Promise<CanvasCourse[]> {
    const params: QueryParams = [
      ['enrollment_type[]', 'student'],
      ['enrollment_state[]', 'active'],
      ['enrollment_state[]', 'completed'],
      ['include[]', 'term'],
      ['per_page', String(config.canvas.perPage)],
    ];
    const needle = termSubstring.toLowerCase();
    const matches: CanvasCourse[] = [];

    for await (const course of this.paginate<CanvasCourse>(endpoint, params)) {
      const termName = course.term?.name ?? '';
      if (termName.toLowerCase().includes(needle)) {
        matches.push(course);
      }
      if (matches.length >= max) break;
    }

    logger.debug(`${endpoint}: ${matches.length} courses matching "${termSubstring}"`);
    return matches;
  }

  async listCoursesForTerm(term: string, max: number, source: CourseSource = 'courses'): Promise<CanvasCourse[]> {
    const endpoints =
      source === 'courses'
        ? [COURSES_ENDPOINT, SELF_COURSES_ENDPOINT]
        : [SELF_COURSES_ENDPOINT, COURSES_ENDPOINT];

    for (const endpoint of endpoints) {
      try {
        const courses = await this.listCoursesFrom(endpoint, term, max);
        if (courses.length > 0) return courses;
      } catch (error) {
        if (!(error instanceof CanvasApiError && error.status >= 500)) throw error;
        logger.warn(`Listing courses from ${endpoint} failed with ${error.status}, trying the next endpoint`);
      }
    }

    return [];
  }

  async getCourse(courseId: number): Promise<CanvasCourse> {
    const url = `${COURSES_ENDPOINT}/${courseId}`;
    const response = await this.getWithRetries<CanvasCourse>(url, [['include[]', 'term']]);
    if (!isOk(response.status)) {
      throw CanvasApiError.fromResponse(url, response);
    }
    return response.data;
  }

  async listAssignments(courseId: number): Promise<CanvasAssignment[]> {
    const url = `${COURSES_ENDPOINT}/${courseId}/assignments`;
    const items: CanvasAssignment[] = [];

    for await (const assignment of this.paginate<CanvasAssignment>(url, [['per_page', String(config.canvas.perPage)]])) {
      // Only an explicit, falsy published flag hides an assignment
      if ('published' in assignment && !assignment.published) continue;
      items.push(assignment);
    }

    logger.info(`Found ${items.length} published assignments in course ${courseId}`);
    return items;
  }
}
