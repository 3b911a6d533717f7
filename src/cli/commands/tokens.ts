import { readFileSync } from 'node:fs';
import { tokensReport } from '../format.js';
import { success } from '../utils/logger.js';

/**
 * `pascals tokens <file>`: print the token listing and any lexical errors.
 *
 * @returns the process exit code
 */
export function tokensCommand(file: string): number {
  const source = readFileSync(file, 'utf8');
  const report = tokensReport(source);
  for (const line of report.output) console.log(line);
  for (const line of report.diagnostics) console.error(line);
  if (!report.failed) success(`${file}: no lexical errors`);
  return report.failed ? 1 : 0;
}
