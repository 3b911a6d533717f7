import { DfaRuleError } from '../../frontend/dfa/rules.js';
import { error as logError, warn as logWarn } from './logger.js';

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

function handleNodeError(error: NodeJS.ErrnoException): void {
  const code = error.code ?? 'UNKNOWN';
  switch (code) {
    case 'EACCES':
    case 'EPERM':
      logError(`Permission denied: ${error.message}`);
      break;
    case 'ENOENT':
      logError(`File not found: ${error.message}`);
      break;
    case 'EISDIR':
      logError(`Expected a file but found a directory: ${error.message}`);
      break;
    default:
      logError(`File system error (${code}): ${error.message}`);
      break;
  }
}

/**
 * Print an error that escaped a command and exit with status 1.
 */
export function handleError(error: unknown): never {
  if (error instanceof DfaRuleError) {
    logError(`[${error.code}] Invalid lexer rules in ${error.source}`);
    for (const problem of error.problems) {
      logError(`  ${problem}`);
    }
    logWarn('Check PASCALS_DFA_RULES or restore the bundled dfa-rules.json');
  } else if (isNodeError(error)) {
    handleNodeError(error);
  } else if (error instanceof Error) {
    logError(error.message);
  } else {
    logError(`Unexpected error: ${String(error)}`);
  }
  process.exit(1);
}
