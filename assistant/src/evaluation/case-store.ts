import { TestCaseNotFoundError } from '../errors.js';
import { generateId } from '../helpers.js';
import type { EvaluationCase } from './cases.js';

export type NewTestCase = EvaluationCase & {
  name?: string;
};

export type StoredTestCase = NewTestCase & {
  id: string;
  isActive: boolean;
  createdAt: string;
};

/**
 * Persistence seam for labeled cases. Removal is soft: a deactivated case is
 * hidden from active listings but still resolves by id.
 */
export interface TestCaseStore {
  create(testCase: NewTestCase): Promise<StoredTestCase>;
  /**
   * @throws TestCaseNotFoundError
   */
  get(testCaseId: string): Promise<StoredTestCase>;
  list(options?: { activeOnly?: boolean }): Promise<StoredTestCase[]>;
  deactivate(testCaseId: string): Promise<void>;
}

const copyCase = (testCase: StoredTestCase): StoredTestCase => ({
  ...testCase,
  expectedTools: testCase.expectedTools ? [...testCase.expectedTools] : undefined,
});

export class InMemoryTestCaseStore implements TestCaseStore {
  private readonly cases = new Map<string, StoredTestCase>();

  public async create(testCase: NewTestCase): Promise<StoredTestCase> {
    const stored = copyCase({
      ...testCase,
      id: generateId(),
      isActive: true,
      createdAt: new Date().toISOString(),
    });
    this.cases.set(stored.id, stored);
    return copyCase(stored);
  }

  public async get(testCaseId: string): Promise<StoredTestCase> {
    return copyCase(this.requireCase(testCaseId));
  }

  /**
   * Cases in creation order; active ones only unless told otherwise.
   */
  public async list(options: { activeOnly?: boolean } = {}): Promise<StoredTestCase[]> {
    const activeOnly = options.activeOnly ?? true;
    return Array.from(this.cases.values())
      .filter((testCase) => !activeOnly || testCase.isActive)
      .map(copyCase);
  }

  public async deactivate(testCaseId: string): Promise<void> {
    this.requireCase(testCaseId).isActive = false;
  }

  private requireCase(testCaseId: string): StoredTestCase {
    const testCase = this.cases.get(testCaseId);
    if (!testCase) {
      throw new TestCaseNotFoundError(testCaseId);
    }
    return testCase;
  }
}

/**
 * Resolves ids to cases in the given order. An unknown id throws TestCaseNotFoundError.
 */
export async function resolveTestCases(
  store: TestCaseStore,
  testCaseIds: readonly string[],
): Promise<EvaluationCase[]> {
  const cases: EvaluationCase[] = [];
  for (const testCaseId of testCaseIds) {
    const { userInput, expectedOutput, expectedTools, taskType } = await store.get(testCaseId);
    cases.push({ userInput, expectedOutput, expectedTools, taskType });
  }
  return cases;
}
