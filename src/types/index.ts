// Core data types used throughout the application

// Subset of the Canvas REST objects we read. Canvas sends many more fields.
export interface CanvasTerm {
  id?: number;
  name?: string | null;
}

export interface CanvasCourse {
  id: number;
  name?: string | null;
  course_code?: string | null;
  term?: CanvasTerm | null;
}

export interface CanvasAssignment {
  id?: number;
  name?: string | null;
  due_at?: string | null;
  published?: boolean | null;
}

export interface DigestAssignment {
  name: string;
  dueAt: string | null;
  published: boolean;
}

export type AssignmentsByCourse = Map<number, DigestAssignment[]>;

export type OutputFormat = 'text' | 'md' | 'html' | 'csv';

export type CourseSource = 'courses' | 'self';

export interface DueWindow {
  from?: Date;
  until?: Date;
}

export interface CanvasCredentials {
  baseUrl: string;
  token: string;
}

export interface Config {
  canvas: {
    userAgent: string;
    timeout: number;
    maxRetries: number;
    perPage: number;
  };
  digest: {
    maxCourses: number;
    title: string;
  };
  logging: {
    level: string;
  };
  paths: {
    dataDir: string;
    logFile: string;
  };
}
