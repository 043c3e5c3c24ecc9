import { Command } from 'commander';
import fs from 'fs';
import { parseDigestMarkdown } from '../../digest/document.js';
import { validateDigest } from '../../digest/validate.js';
import { logger } from '../../utils/logger.js';

/**
 * Checks one markdown digest and returns the process exit code.
 */
export async function runCheck(file: string): Promise<number> {
  let text: string;
  try {
    text = await fs.promises.readFile(file, 'utf8');
  } catch (error) {
    logger.error(`Could not read ${file}: ${error}`);
    console.error(`Could not read ${file}`);
    return 1;
  }

  const document = parseDigestMarkdown(text);
  const issues = validateDigest(document);
  const rows = document.courses.reduce((sum, course) => sum + course.rows.length, 0);

  if (issues.length === 0) {
    console.log(`${file}: ${document.courses.length} courses, ${rows} assignments, no problems found`);
    return 0;
  }

  for (const issue of issues) {
    const where = issue.courseId === null ? 'document' : String(issue.courseId);
    console.log(`${where}: line ${issue.line}: ${issue.message}`);
  }
  console.log(`\n${issues.length} problem(s) in ${file}`);
  return 1;
}

export const checkCommand = new Command('check')
  .description('Check a markdown digest for bad dates, duplicate titles and ordering')
  .argument('<file>', 'markdown digest to check')
  .action(async (file: string) => {
    process.exitCode = await runCheck(file);
  });
