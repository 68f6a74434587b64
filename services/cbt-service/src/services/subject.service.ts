import { ConflictError, NotFoundError } from '@cbt/shared';
import { applySubjectPatch, Subject, SubjectPatch, SubjectStore } from '../models/subject.model';
import { isUniqueViolation } from '../utils/dbErrors';

const DUPLICATE_MESSAGE = 'Subject with this name already exists';

export class SubjectService {
  constructor(private subjects: SubjectStore) {}

  async create(name: string, description: string | null): Promise<Subject> {
    if (await this.subjects.findByName(name)) {
      throw new ConflictError(DUPLICATE_MESSAGE);
    }
    try {
      return await this.subjects.create({ name, description });
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError(DUPLICATE_MESSAGE);
      }
      throw error;
    }
  }

  async list(): Promise<Subject[]> {
    return this.subjects.list();
  }

  async get(id: number): Promise<Subject> {
    const subject = await this.subjects.findById(id);
    if (!subject) {
      throw new NotFoundError('Subject not found');
    }
    return subject;
  }

  async update(id: number, patch: SubjectPatch): Promise<Subject> {
    const subject = await this.get(id);
    if (patch.name !== undefined && patch.name !== subject.name) {
      const clash = await this.subjects.findByName(patch.name);
      if (clash) {
        throw new ConflictError(DUPLICATE_MESSAGE);
      }
    }
    return this.subjects.save(applySubjectPatch(subject, patch));
  }

  async delete(id: number): Promise<void> {
    if (!(await this.subjects.delete(id))) {
      throw new NotFoundError('Subject not found');
    }
  }
}
