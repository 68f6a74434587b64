/**
 * Question Service - question bank CRUD and question/explanation images
 */

import { NotFoundError, TransactionRunner } from '@cbt/shared';
import {
  applyQuestionPatch,
  Question,
  QuestionCreateInput,
  QuestionFilter,
  QuestionPatch,
  QuestionStore,
} from '../models/question.model';
import { ExamTypeStore } from '../models/examType.model';
import { SubjectStore } from '../models/subject.model';
import { UploadedFile, UploadService } from './upload.service';

export type QuestionImageSlot = 'question' | 'explanation';

export class QuestionService {
  constructor(
    private questions: QuestionStore,
    private examTypes: ExamTypeStore,
    private subjects: SubjectStore,
    private uploads: UploadService,
    private runInTransaction: TransactionRunner
  ) {}

  async create(input: QuestionCreateInput): Promise<Question> {
    await this.assertCatalogExists([input]);
    return this.questions.create(input);
  }

  /**
   * All-or-nothing: one bad reference or insert failure rolls back the batch.
   */
  async bulkCreate(inputs: QuestionCreateInput[]): Promise<Question[]> {
    await this.assertCatalogExists(inputs);
    return this.runInTransaction(async (db) => {
      const created: Question[] = [];
      for (const input of inputs) {
        created.push(await this.questions.create(input, db));
      }
      return created;
    });
  }

  async list(filter: QuestionFilter): Promise<Question[]> {
    return this.questions.list(filter);
  }

  async get(id: number): Promise<Question> {
    const question = await this.questions.findById(id);
    if (!question) {
      throw new NotFoundError('Question not found');
    }
    return question;
  }

  async update(id: number, patch: QuestionPatch): Promise<Question> {
    const question = await this.get(id);
    return this.questions.save(applyQuestionPatch(question, patch));
  }

  async delete(id: number): Promise<void> {
    const question = await this.get(id);
    if (!(await this.questions.delete(id))) {
      throw new NotFoundError('Question not found');
    }
    for (const stored of [question.questionImage, question.explanationImage]) {
      if (stored) {
        await this.uploads.removeImage(stored);
      }
    }
  }

  async attachImage(id: number, slot: QuestionImageSlot, file: UploadedFile): Promise<Question> {
    const question = await this.get(id);
    const storedPath = await this.uploads.saveImage(slot, file);
    const previous = slot === 'question' ? question.questionImage : question.explanationImage;

    const patch: QuestionPatch = slot === 'question' ? { questionImage: storedPath } : { explanationImage: storedPath };
    const updated = await this.questions.save(applyQuestionPatch(question, patch));

    if (previous) {
      await this.uploads.removeImage(previous);
    }
    return updated;
  }

  async detachImage(id: number, slot: QuestionImageSlot): Promise<Question> {
    const question = await this.get(id);
    const current = slot === 'question' ? question.questionImage : question.explanationImage;
    if (!current) {
      throw new NotFoundError(slot === 'question' ? 'Question has no image' : 'Question has no explanation image');
    }

    const patch: QuestionPatch = slot === 'question' ? { questionImage: null } : { explanationImage: null };
    const updated = await this.questions.save(applyQuestionPatch(question, patch));
    await this.uploads.removeImage(current);
    return updated;
  }

  private async assertCatalogExists(inputs: QuestionCreateInput[]): Promise<void> {
    const examTypeIds = new Set(inputs.map((input) => input.examTypeId));
    const subjectIds = new Set(inputs.map((input) => input.subjectId));

    for (const examTypeId of examTypeIds) {
      if (!(await this.examTypes.findById(examTypeId))) {
        throw new NotFoundError(`Exam type ${examTypeId} not found`);
      }
    }
    for (const subjectId of subjectIds) {
      if (!(await this.subjects.findById(subjectId))) {
        throw new NotFoundError(`Subject ${subjectId} not found`);
      }
    }
  }
}
