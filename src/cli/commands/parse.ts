import { readFileSync } from 'node:fs';
import { parseReport } from '../format.js';
import { error, success } from '../utils/logger.js';

export interface ParseOptions {
  json?: boolean;
}

/**
 * `pascals parse <file> [--json]`: print the syntax tree outline (or JSON)
 * followed by lexical and syntax diagnostics.
 *
 * @returns the process exit code
 */
export function parseCommand(file: string, options: ParseOptions): number {
  const source = readFileSync(file, 'utf8');
  const report = parseReport(source, { json: options.json ?? false });
  for (const line of report.output) console.log(line);
  for (const line of report.diagnostics) console.error(line);
  if (report.failed) {
    error(`${file}: ${report.diagnostics.length} diagnostic(s)`);
    return 1;
  }
  success(`${file}: parsed without errors`);
  return 0;
}
