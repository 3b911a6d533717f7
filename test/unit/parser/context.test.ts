import { describe, it, afterEach, mock } from 'node:test';
import assert from 'node:assert/strict';
import { createParserContext } from '../../../src/parser/context.js';
import { parse } from '../../../src/parser.js';
import { lex } from '../../../src/frontend/lexer.js';
import { ConfigService } from '../../../src/config/config-service.js';

function configure(env: Record<string, string>): void {
  Object.assign(process.env, env);
  ConfigService.resetForTesting();
}

/** Parser trace lines written to stderr while `run` executes */
function traceLines(run: () => void): string[] {
  const lines: string[] = [];
  mock.method(console, 'error', (line: string) => {
    lines.push(line);
  });
  run();
  mock.restoreAll();
  return lines.filter(line => line.includes('"component":"parser"'));
}

describe('parser tracing', () => {
  afterEach(() => {
    mock.restoreAll();
    delete process.env.PASCALS_DEBUG_PARSER;
    delete process.env.LOG_LEVEL;
    ConfigService.resetForTesting();
  });

  it('is off without PASCALS_DEBUG_PARSER', () => {
    configure({ LOG_LEVEL: 'DEBUG' });
    assert.equal(createParserContext(lex('x')).debug.enabled, false);
  });

  it('stays off when the log level hides debug output', () => {
    configure({ PASCALS_DEBUG_PARSER: '1', LOG_LEVEL: 'INFO' });
    assert.equal(createParserContext(lex('x')).debug.enabled, false);
    assert.deepEqual(
      traceLines(() => parse(lex('program p; begin x := ; end.'))),
      []
    );
  });

  it('writes JSON lines when both are set', () => {
    configure({ PASCALS_DEBUG_PARSER: '1', LOG_LEVEL: 'DEBUG' });
    assert.equal(createParserContext(lex('x')).debug.enabled, true);

    const lines = traceLines(() => parse(lex('program p; begin end.')));
    const last: unknown = JSON.parse(lines[lines.length - 1]);
    assert.ok(typeof last === 'object' && last !== null && 'message' in last && 'level' in last);
    assert.equal(last.message, '[parse] parse finished');
    assert.equal(last.level, 'DEBUG');
  });
});
