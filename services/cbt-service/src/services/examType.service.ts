import { ConflictError, NotFoundError } from '@cbt/shared';
import { applyExamTypePatch, ExamType, ExamTypePatch, ExamTypeStore } from '../models/examType.model';
import { isUniqueViolation } from '../utils/dbErrors';

const DUPLICATE_MESSAGE = 'Exam type with this name already exists';

export class ExamTypeService {
  constructor(private examTypes: ExamTypeStore) {}

  async create(name: string, description: string | null): Promise<ExamType> {
    if (await this.examTypes.findByName(name)) {
      throw new ConflictError(DUPLICATE_MESSAGE);
    }
    try {
      return await this.examTypes.create({ name, description });
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError(DUPLICATE_MESSAGE);
      }
      throw error;
    }
  }

  async list(): Promise<ExamType[]> {
    return this.examTypes.list();
  }

  async get(id: number): Promise<ExamType> {
    const examType = await this.examTypes.findById(id);
    if (!examType) {
      throw new NotFoundError('Exam type not found');
    }
    return examType;
  }

  async update(id: number, patch: ExamTypePatch): Promise<ExamType> {
    const examType = await this.get(id);
    if (patch.name !== undefined && patch.name !== examType.name) {
      const clash = await this.examTypes.findByName(patch.name);
      if (clash) {
        throw new ConflictError(DUPLICATE_MESSAGE);
      }
    }
    return this.examTypes.save(applyExamTypePatch(examType, patch));
  }

  /**
   * Cascades to the exam type's questions and tests.
   */
  async delete(id: number): Promise<void> {
    if (!(await this.examTypes.delete(id))) {
      throw new NotFoundError('Exam type not found');
    }
  }
}
