/**
 * Test Service - test templates and read-time question sampling
 */

import { NotFoundError } from '@cbt/shared';
import { applyTestPatch, Test, TestPatch, TestStore } from '../models/test.model';
import { ExamTypeStore } from '../models/examType.model';
import { SubjectStore } from '../models/subject.model';
import { Question, QuestionStore } from '../models/question.model';
import { buildTestTitle, deriveTestMarks } from '../utils/grading';
import { RandomSource, sampleWithoutReplacement } from '../utils/sampling';

export interface TestCreateRequest {
  examTypeId: number;
  subjectId: number;
  durationMinutes: number;
  questionCount: number;
}

export interface TestWithQuestions {
  test: Test;
  questions: Question[];
}

export class TestService {
  constructor(
    private tests: TestStore,
    private examTypes: ExamTypeStore,
    private subjects: SubjectStore,
    private questions: QuestionStore,
    private random: RandomSource = Math.random
  ) {}

  async create(request: TestCreateRequest, createdBy: number): Promise<Test> {
    const title = await this.resolveTitle(request.examTypeId, request.subjectId);
    const { totalMarks, passingMarks } = deriveTestMarks(request.questionCount);

    return this.tests.create({
      title,
      examTypeId: request.examTypeId,
      subjectId: request.subjectId,
      durationMinutes: request.durationMinutes,
      questionCount: request.questionCount,
      totalMarks,
      passingMarks,
      createdBy,
    });
  }

  async list(skip: number, limit: number): Promise<Test[]> {
    return this.tests.list(skip, limit);
  }

  async listByExamType(examTypeId: number): Promise<Test[]> {
    return this.tests.listByExamType(examTypeId);
  }

  async listBySubject(subjectId: number): Promise<Test[]> {
    return this.tests.listBySubject(subjectId);
  }

  async get(id: number): Promise<Test> {
    const test = await this.tests.findById(id);
    if (!test) {
      throw new NotFoundError('Test not found');
    }
    return test;
  }

  /**
   * Draws a fresh random subset on every call. When the bank holds fewer
   * matching questions than question_count, all of them are returned.
   */
  async getWithQuestions(id: number): Promise<TestWithQuestions> {
    const test = await this.get(id);
    const bank = await this.questions.findByExamTypeAndSubject(test.examTypeId, test.subjectId);
    return {
      test,
      questions: sampleWithoutReplacement(bank, test.questionCount, this.random),
    };
  }

  /**
   * Title follows the exam type/subject and marks follow question_count.
   */
  async update(id: number, patch: TestPatch): Promise<Test> {
    const test = await this.get(id);
    const derived: TestPatch = { ...patch };

    if (patch.examTypeId !== undefined || patch.subjectId !== undefined) {
      derived.title = await this.resolveTitle(patch.examTypeId ?? test.examTypeId, patch.subjectId ?? test.subjectId);
    }
    if (patch.questionCount !== undefined) {
      Object.assign(derived, deriveTestMarks(patch.questionCount));
    }

    return this.tests.save(applyTestPatch(test, derived));
  }

  async delete(id: number): Promise<void> {
    if (!(await this.tests.delete(id))) {
      throw new NotFoundError('Test not found');
    }
  }

  private async resolveTitle(examTypeId: number, subjectId: number): Promise<string> {
    const examType = await this.examTypes.findById(examTypeId);
    if (!examType) {
      throw new NotFoundError('Exam type not found');
    }
    const subject = await this.subjects.findById(subjectId);
    if (!subject) {
      throw new NotFoundError('Subject not found');
    }
    return buildTestTitle(examType.name, subject.name);
  }
}
