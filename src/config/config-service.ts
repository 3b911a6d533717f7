/**
 * @module config-service
 *
 * Central access to environment configuration. Nothing else in the project
 * reads `process.env`.
 *
 * ```typescript
 * import { ConfigService } from './config/config-service.js';
 *
 * if (ConfigService.getInstance().debugParser) {
 *   // trace resynchronisation
 * }
 * ```
 */

import { LogLevel } from '../utils/logger.js';

export const DEFAULT_MAX_ERRORS = 100;

export class ConfigService {
  private static instance: ConfigService | null = null;

  /** Minimum log level (LOG_LEVEL, default INFO) */
  readonly logLevel: LogLevel;

  /** Alternate DFA rule file (PASCALS_DFA_RULES); null means the bundled dfa-rules.json */
  readonly dfaRulesPath: string | null;

  /** Parser trace logging (PASCALS_DEBUG_PARSER=1); written at DEBUG level */
  readonly debugParser: boolean;

  /** Diagnostics after which the parser gives up (PASCALS_MAX_ERRORS, default 100) */
  readonly maxErrors: number;

  /** Problems found while reading the environment; the values above fall back to defaults */
  readonly warnings: readonly string[];

  private constructor(env: NodeJS.ProcessEnv) {
    const warnings: string[] = [];
    this.logLevel = this.parseLogLevel(env.LOG_LEVEL, warnings);
    this.dfaRulesPath = env.PASCALS_DFA_RULES || null;
    this.debugParser = env.PASCALS_DEBUG_PARSER === '1';
    this.maxErrors = this.parseMaxErrors(env.PASCALS_MAX_ERRORS, warnings);
    this.warnings = warnings;
  }

  private parseLogLevel(raw: string | undefined, warnings: string[]): LogLevel {
    if (!raw) return LogLevel.INFO;
    switch (raw.toUpperCase()) {
      case 'DEBUG':
        return LogLevel.DEBUG;
      case 'INFO':
        return LogLevel.INFO;
      case 'WARN':
        return LogLevel.WARN;
      case 'ERROR':
        return LogLevel.ERROR;
      default:
        warnings.push(`Unknown LOG_LEVEL '${raw}', using INFO`);
        return LogLevel.INFO;
    }
  }

  private parseMaxErrors(raw: string | undefined, warnings: string[]): number {
    if (!raw) return DEFAULT_MAX_ERRORS;
    const value = Number(raw);
    if (!Number.isInteger(value) || value < 1) {
      warnings.push(`PASCALS_MAX_ERRORS must be a positive integer, got '${raw}'`);
      return DEFAULT_MAX_ERRORS;
    }
    return value;
  }

  static getInstance(): ConfigService {
    if (ConfigService.instance === null) {
      ConfigService.instance = new ConfigService(process.env);
    }
    return ConfigService.instance;
  }

  /**
   * Drop the cached instance so the next getInstance() re-reads the environment.
   * Tests only.
   */
  static resetForTesting(): void {
    ConfigService.instance = null;
  }
}
