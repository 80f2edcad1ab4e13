/**
 * CLI Argument Parsing Tests
 */

import { describe, it, expect } from 'vitest';
import { COMMANDS, VERSION, dryRunReply, helpText, parseArgs } from '../src/cli.js';
import { DEFAULT_PLANNER_PROMPT, DEFAULT_REFLECTION_PROMPTS } from '../src/agents/prompts.js';
import { parsePlan } from '../src/agents/plan-solve-agent.js';
import { isNoImprovementNeeded } from '../src/agents/reflection-agent.js';
import { ValidationError } from '../src/errors/index.js';

describe('parseArgs', () => {
  it('should default every flag to off', () => {
    expect(parseArgs([])).toEqual({ help: false, version: false, debug: false, dryRun: false });
  });

  it('should join positional arguments after the command into the input', () => {
    expect(parseArgs(['plan', 'How', 'many', 'days?'])).toMatchObject({ command: 'plan', input: 'How many days?' });
  });

  it('should parse flags anywhere on the line', () => {
    const args = parseArgs(['reflect', '-i', '2', 'Write a haiku', '--debug', '--dry-run']);

    expect(args).toEqual({
      command: 'reflect',
      input: 'Write a haiku',
      maxIterations: 2,
      help: false,
      version: false,
      debug: true,
      dryRun: true,
    });
  });

  it('should read search and file options', () => {
    expect(parseArgs(['search', '-b', 'tavily', '--mode', 'json', '--base-dir', '/srv', 'node'])).toMatchObject({
      command: 'search',
      backend: 'tavily',
      mode: 'json',
      baseDir: '/srv',
      input: 'node',
    });
  });

  it('should accept zero iterations', () => {
    expect(parseArgs(['reflect', '--max-iterations', '0', 'x']).maxIterations).toBe(0);
  });

  it.each([
    [['reflect', '-i', 'many']],
    [['reflect', '-i', '-1']],
    [['reflect', '-i', '1.5']],
  ])('should reject a bad iteration count in %j', (args) => {
    expect(() => parseArgs(args)).toThrow(ValidationError);
  });

  it('should reject an option missing its value', () => {
    expect(() => parseArgs(['search', '--backend'])).toThrow('--backend requires a value');
    expect(() => parseArgs(['search', '--mode', '--debug'])).toThrow('--mode requires a value');
  });

  it('should reject unknown options and commands', () => {
    expect(() => parseArgs(['--verbose'])).toThrow('Unknown option: --verbose');
    expect(() => parseArgs(['solve', 'x'])).toThrow('Unknown command: solve');
  });

  it('should recognize help and version', () => {
    expect(parseArgs(['-h']).help).toBe(true);
    expect(parseArgs(['--version']).version).toBe(true);
  });
});

describe('dryRunReply', () => {
  it('should answer the planner with a parseable plan', () => {
    const reply = dryRunReply([{ role: 'system', content: DEFAULT_PLANNER_PROMPT.replace('{question}', 'Q') }]);
    expect(parsePlan(reply)).toEqual({ ok: true, plan: ['Restate the question', 'Answer the question'] });
  });

  it('should answer the reviewer with a converging critique', () => {
    const reply = dryRunReply([{ role: 'user', content: DEFAULT_REFLECTION_PROMPTS.reflect }]);
    expect(isNoImprovementNeeded(reply)).toBe(true);
  });

  it('should answer anything else with a placeholder', () => {
    expect(dryRunReply([{ role: 'user', content: 'hello' }])).toBe('(dry run) no model was called.');
    expect(dryRunReply([])).toBe('(dry run) no model was called.');
  });
});

describe('helpText', () => {
  it('should mention the version and every command', () => {
    const text = helpText();

    expect(text).toContain(`v${VERSION}`);
    for (const command of COMMANDS) {
      expect(text).toContain(`  ${command}`);
    }
  });
});
