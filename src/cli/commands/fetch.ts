import { Command, InvalidArgumentError, Option } from 'commander';
import fs from 'fs';
import { CanvasClient, CanvasReader } from '../../canvas/client.js';
import { generateDigest } from '../../digest/collect.js';
import { parseWindowBound } from '../../digest/normalize.js';
import { OUTPUT_FORMATS } from '../../digest/render.js';
import { config, loadCredentials } from '../../utils/config.js';
import { ConfigError, NoCoursesError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { CanvasCredentials, CourseSource, OutputFormat } from '../../types/index.js';

export interface FetchCommandOptions {
  courses?: number[];
  term?: string;
  max: number;
  source: CourseSource;
  title: string;
  format: OutputFormat;
  out?: string;
  from?: Date;
  until?: Date;
}

export interface FetchDependencies {
  env?: NodeJS.ProcessEnv;
  createReader?: (credentials: CanvasCredentials) => CanvasReader;
}

function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 1 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

function collectCourseId(value: string, previous: number[] = []): number[] {
  return [...previous, parsePositiveInt(value)];
}

function windowBoundParser(edge: 'from' | 'until'): (value: string) => Date {
  return (value) => {
    try {
      return parseWindowBound(value, edge);
    } catch (error) {
      throw new InvalidArgumentError(error instanceof Error ? error.message : String(error));
    }
  };
}

export const parseFromOption = windowBoundParser('from');
export const parseUntilOption = windowBoundParser('until');

/**
 * Runs one fetch and returns the process exit code.
 */
export async function runFetch(options: FetchCommandOptions, deps: FetchDependencies = {}): Promise<number> {
  const createReader = deps.createReader ?? (({ baseUrl, token }) => new CanvasClient(baseUrl, token));

  try {
    const client = createReader(loadCredentials(deps.env ?? process.env));

    const digest = await generateDigest(
      client,
      {
        courseIds: options.courses,
        term: options.term,
        max: options.max,
        source: options.source,
        title: options.title,
        format: options.format,
        window: { from: options.from, until: options.until },
      },
      (message) => console.error(message)
    );

    if (options.out) {
      fs.writeFileSync(options.out, digest.output, 'utf8');
      console.log(`Wrote ${options.out}`);
    } else {
      console.log(digest.output);
    }
    return 0;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);

    if (error instanceof ConfigError) {
      console.error(message);
      return 2;
    }
    if (error instanceof NoCoursesError) {
      console.error(message);
      return 1;
    }

    logger.error(`Fetch failed: ${error instanceof Error ? error.stack ?? message : message}`);
    console.error(`\nFetch failed: ${message}`);
    return 1;
  }
}

export const fetchCommand = new Command('fetch')
  .description('Show assignments for Canvas courses grouped by course, sorted by due date')
  .addOption(
    new Option('--courses <ids...>', 'course IDs, e.g. --courses 12345 67890')
      .argParser(collectCourseId)
      .conflicts('term')
  )
  .addOption(new Option('--term <name>', 'term name substring, e.g. "Spring 2025"').conflicts('courses'))
  .option('--max <n>', 'maximum number of courses', parsePositiveInt, config.digest.maxCourses)
  .addOption(
    new Option('--source <endpoint>', 'endpoint used to list courses')
      .choices(['courses', 'self'])
      .default('courses')
  )
  .option('--title <title>', 'digest title', config.digest.title)
  .addOption(new Option('--format <format>', 'output format').choices(OUTPUT_FORMATS).default('text'))
  .option('--out <file>', 'write output to a file')
  .option('--from <when>', 'skip assignments due before this day, e.g. "today"', parseFromOption)
  .option('--until <when>', 'skip assignments due after this day, e.g. "next friday"', parseUntilOption)
  .action(async (options: FetchCommandOptions, command: Command) => {
    if (!options.courses && !options.term) {
      command.error('error: one of the options --courses or --term is required', { exitCode: 2 });
    }
    process.exitCode = await runFetch(options);
  });
