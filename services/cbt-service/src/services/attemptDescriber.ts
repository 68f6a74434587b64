import { Attempt } from '../models/attempt.model';
import { SubjectStore } from '../models/subject.model';
import { TestStore } from '../models/test.model';
import { describeTest, describeWithoutTest, TestDescriptor } from '../utils/attemptResult';

export interface DescribedAttempt<A extends Attempt = Attempt> {
  attempt: A;
  test: TestDescriptor;
}

/**
 * Batch-loads the tests and subjects behind a list of attempts so that every
 * attempt, practice or not, can be rendered the same way.
 */
export class AttemptDescriber {
  constructor(
    private tests: TestStore,
    private subjects: SubjectStore
  ) {}

  async describe<A extends Attempt>(attempts: readonly A[]): Promise<DescribedAttempt<A>[]> {
    const testIds = unique(attempts.map((a) => a.testId));
    const subjectIds = unique(attempts.map((a) => a.subjectId));

    const [tests, subjects] = await Promise.all([
      this.tests.findByIds(testIds),
      this.subjects.findByIds(subjectIds),
    ]);
    const testsById = new Map(tests.map((test) => [test.id, test]));
    const subjectNames = new Map(subjects.map((subject) => [subject.id, subject.name]));

    return attempts.map((attempt) => {
      const test = attempt.testId !== null ? testsById.get(attempt.testId) : undefined;
      const subjectName = attempt.subjectId !== null ? subjectNames.get(attempt.subjectId) : undefined;
      return {
        attempt,
        test: test ? describeTest(test) : describeWithoutTest(attempt, subjectName),
      };
    });
  }

  async describeOne<A extends Attempt>(attempt: A): Promise<DescribedAttempt<A>> {
    const [described] = await this.describe([attempt]);
    return described;
  }
}

function unique(ids: Array<number | null>): number[] {
  return [...new Set(ids.filter((id): id is number => id !== null))];
}
