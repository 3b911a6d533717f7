/**
 * @module frontend/dfa/rules
 *
 * Loads the lexer automaton from `dfa-rules.json`, validates it against
 * `dfa-rules.schema.json` and compiles it into a frozen {@link DfaTable}.
 *
 * The rule files sit at the package root and are not copied into dist, so
 * both the source tree and the compiled tree look two or three levels up.
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import AjvModule from 'ajv';
import type { ErrorObject, Schema, ValidateFunction } from 'ajv';
import { ConfigService } from '../../config/config-service.js';
import { DiagnosticCode } from '../../diagnostics/diagnostics.js';
import { createLogger } from '../../utils/logger.js';
import { isCharClass, isWildcard } from './char-class.js';
import type { CharClass } from './char-class.js';

const Ajv = AjvModule.default;

export const ACCEPT_KINDS = [
  'Identifier',
  'IntegerLiteral',
  'RealLiteral',
  'StringLiteral',
  'Operator',
  'Delimiter',
  'Comment',
  'Whitespace',
] as const;

export type AcceptKind = (typeof ACCEPT_KINDS)[number];

export type CommitError = 'UnterminatedString' | 'UnterminatedComment';

/** Shape of one state in the rule file */
export interface RawDfaState {
  description?: string;
  accept?: AcceptKind;
  commit?: CommitError;
  transitions?: Record<string, string>;
}

/** Shape of the rule file after schema validation */
export interface RawDfaRules {
  $schema?: string;
  version: number;
  start: string;
  states: Record<string, RawDfaState>;
}

export interface DfaState {
  readonly id: number;
  readonly name: string;
  readonly accept: AcceptKind | null;
  /** Falling off the automaton while committed here is this error, not a backtrack */
  readonly commit: CommitError | null;
  readonly edges: ReadonlyMap<CharClass, number>;
  /** Fallback for any character without a class edge */
  readonly any: number | null;
  /** Fallback for any character except CR and LF */
  readonly anyExceptNewline: number | null;
}

export interface DfaTable {
  readonly start: number;
  readonly states: readonly DfaState[];
}

export class DfaRuleError extends Error {
  readonly code = DiagnosticCode.C001_InvalidDfaRules;

  constructor(
    readonly source: string,
    readonly problems: readonly string[]
  ) {
    super(`Invalid DFA rules in ${source}:\n  - ${problems.join('\n  - ')}`);
    this.name = 'DfaRuleError';
  }
}

const RULES_FILE = 'dfa-rules.json';
const SCHEMA_FILE = 'dfa-rules.schema.json';

const logger = createLogger('dfa-rules');
const moduleDir = dirname(fileURLToPath(import.meta.url));

function packageFile(name: string): string {
  const candidates = [join(moduleDir, '..', '..', '..', name), join(moduleDir, '..', '..', '..', '..', name)];
  return candidates.find(path => existsSync(path)) ?? candidates[0];
}

let validator: ValidateFunction<RawDfaRules> | null = null;

function schemaValidator(): ValidateFunction<RawDfaRules> {
  if (validator === null) {
    const schema: Schema = JSON.parse(readFileSync(packageFile(SCHEMA_FILE), 'utf-8'));
    const ajv = new Ajv({ strict: true, allErrors: true });
    validator = ajv.compile<RawDfaRules>(schema);
  }
  return validator;
}

function formatAjvError(error: ErrorObject): string {
  const where = error.instancePath === '' ? '(root)' : error.instancePath;
  return `${where} ${error.message ?? 'is invalid'}`;
}

/**
 * Validate rule data (already parsed from JSON) and compile it.
 *
 * @throws DfaRuleError listing every schema and consistency problem found
 */
export function compileDfaRules(data: unknown, source = '<inline>'): DfaTable {
  const validate = schemaValidator();
  if (!validate(data)) {
    throw new DfaRuleError(source, (validate.errors ?? []).map(formatAjvError));
  }
  const rules: RawDfaRules = data;

  const problems: string[] = [];
  const names = Object.keys(rules.states);
  const ids = new Map(names.map((name, id) => [name, id]));

  const start = ids.get(rules.start);
  if (start === undefined) {
    problems.push(`start state '${rules.start}' is not defined`);
  }

  const states = names.map((name, id): DfaState => {
    const raw = rules.states[name];
    if (raw.accept !== undefined && raw.commit !== undefined) {
      problems.push(`state '${name}' cannot both accept and commit`);
    }

    const edges = new Map<CharClass, number>();
    let any: number | null = null;
    let anyExceptNewline: number | null = null;

    for (const [key, targetName] of Object.entries(raw.transitions ?? {})) {
      const target = ids.get(targetName);
      if (target === undefined) {
        problems.push(`state '${name}' has a transition to unknown state '${targetName}'`);
        continue;
      }
      for (const label of key.split('|')) {
        if (isWildcard(label)) {
          if ((label === 'any' ? any : anyExceptNewline) !== null) {
            problems.push(`state '${name}' lists '${label}' twice`);
          }
          if (label === 'any') any = target;
          else anyExceptNewline = target;
        } else if (isCharClass(label)) {
          if (edges.has(label)) {
            problems.push(`state '${name}' lists class '${label}' twice`);
          }
          edges.set(label, target);
        } else {
          problems.push(`state '${name}' uses unknown character class '${label}'`);
        }
      }
    }

    return Object.freeze({
      id,
      name,
      accept: raw.accept ?? null,
      commit: raw.commit ?? null,
      edges,
      any,
      anyExceptNewline,
    });
  });

  if (problems.length > 0 || start === undefined) {
    throw new DfaRuleError(source, problems);
  }

  logger.debug('Compiled DFA rules', { source, states: states.length });
  return Object.freeze({ start, states: Object.freeze(states) });
}

/**
 * Read and compile a rule file.
 *
 * @throws DfaRuleError when the file is missing, is not JSON or is invalid
 */
export function loadDfaTable(path: string = packageFile(RULES_FILE)): DfaTable {
  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (error) {
    throw new DfaRuleError(path, [`cannot read file: ${error instanceof Error ? error.message : String(error)}`]);
  }

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw new DfaRuleError(path, [`not valid JSON: ${error instanceof Error ? error.message : String(error)}`]);
  }

  return compileDfaRules(data, path);
}

let defaultTable: DfaTable | null = null;

/**
 * The process-wide table, from PASCALS_DFA_RULES or the bundled rule file.
 * Built on first use and shared read-only afterwards.
 */
export function defaultDfaTable(): DfaTable {
  if (defaultTable === null) {
    const configured = ConfigService.getInstance().dfaRulesPath;
    defaultTable = configured === null ? loadDfaTable() : loadDfaTable(configured);
  }
  return defaultTable;
}
