import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { EvaluationError } from '../errors.js';
import { createSampleCases, loadCasesFromFile, parseCases } from './cases.js';

describe('parseCases', () => {
  it('maps snake_case entries and defaults the task type', () => {
    const result = parseCases([
      { user_input: 'What is 15 * 23?', expected_output: '345', expected_tools: ['calculate'] },
      { user_input: 'Hello', task_type: 'contains', expected_output: null },
    ]);

    expect(result).toEqual({
      ok: true,
      value: [
        { userInput: 'What is 15 * 23?', expectedOutput: '345', expectedTools: ['calculate'], taskType: 'exact_match' },
        { userInput: 'Hello', expectedOutput: undefined, expectedTools: undefined, taskType: 'contains' },
      ],
    });
  });

  it('names the offending entry', () => {
    const result = parseCases([{ user_input: 'ok' }, { expected_output: 'missing input' }]);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toMatch(/^1\.user_input: /);
    }
  });

  it('rejects unknown task types', () => {
    expect(parseCases([{ user_input: 'x', task_type: 'fuzzy' }]).ok).toBe(false);
  });

  it('rejects a non-list document', () => {
    expect(parseCases({ user_input: 'x' }).ok).toBe(false);
  });
});

describe('loadCasesFromFile', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(path.join(tmpdir(), 'cases-'));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('reads and validates a case file', async () => {
    const filePath = path.join(directory, 'cases.json');
    await writeFile(filePath, JSON.stringify([{ user_input: 'Hi', expected_tools: [] }]), 'utf8');

    expect(await loadCasesFromFile(filePath)).toEqual([
      { userInput: 'Hi', expectedOutput: undefined, expectedTools: [], taskType: 'exact_match' },
    ]);
  });

  it('throws EvaluationError for unreadable or invalid files', async () => {
    const invalidPath = path.join(directory, 'invalid.json');
    await writeFile(invalidPath, '{ not json', 'utf8');

    await expect(loadCasesFromFile(path.join(directory, 'missing.json'))).rejects.toBeInstanceOf(EvaluationError);
    await expect(loadCasesFromFile(invalidPath)).rejects.toBeInstanceOf(EvaluationError);
  });
});

describe('createSampleCases', () => {
  it('covers arithmetic, weather and greeting cases', () => {
    const cases = createSampleCases();
    expect(cases.map((testCase) => testCase.expectedTools)).toEqual([
      ['calculate'],
      ['calculate'],
      ['get_weather'],
      [],
    ]);
  });
});
