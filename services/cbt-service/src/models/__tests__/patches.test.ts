import { applyExamTypePatch } from '../examType.model';
import { applyQuestionPatch, Question } from '../question.model';
import { applyTestPatch, Test } from '../test.model';
import { applyUserPatch } from '../user.model';
import { buildUser, FIXED_DATE } from '../../__tests__/support/inMemoryStores';

describe('patch merges', () => {
  it('keeps fields the patch leaves undefined', () => {
    const user = buildUser();

    expect(applyUserPatch(user, { email: 'new@example.com' })).toEqual({ ...user, email: 'new@example.com' });
  });

  it('distinguishes clearing a nullable field from leaving it alone', () => {
    const user = buildUser({ fullName: 'Student One' });

    expect(applyUserPatch(user, { fullName: null }).fullName).toBeNull();
    expect(applyUserPatch(user, {}).fullName).toBe('Student One');

    const examType = { id: 1, name: 'WAEC', description: 'West African exam', createdAt: FIXED_DATE };
    expect(applyExamTypePatch(examType, { description: null })).toEqual({ ...examType, description: null });
  });

  it('replaces question images independently', () => {
    const question: Question = {
      id: 3,
      examTypeId: 1,
      subjectId: 1,
      questionText: 'Name the gas',
      questionImage: 'uploads/question_images/a.png',
      questionType: 'essay',
      options: null,
      correctAnswer: 'Oxygen',
      explanation: null,
      explanationImage: 'uploads/explanation_images/b.png',
      createdAt: FIXED_DATE,
    };

    const updated = applyQuestionPatch(question, { questionImage: null });

    expect(updated.questionImage).toBeNull();
    expect(updated.explanationImage).toBe('uploads/explanation_images/b.png');
  });

  it('can deactivate a test without touching its marks', () => {
    const test: Test = {
      id: 1,
      title: 'WAEC Physics Test',
      examTypeId: 1,
      subjectId: 2,
      durationMinutes: 45,
      questionCount: 20,
      totalMarks: 20,
      passingMarks: 10,
      isActive: true,
      createdBy: 1,
      createdAt: FIXED_DATE,
    };

    expect(applyTestPatch(test, { isActive: false })).toEqual({ ...test, isActive: false });
  });
});
