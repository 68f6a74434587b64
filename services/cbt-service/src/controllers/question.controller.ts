import { Request, Response } from 'express';
import { z } from 'zod';
import { asyncHandler, successResponse } from '@cbt/shared';
import type { QuestionCreateInput, QuestionPatch } from '../models/question.model';
import { QuestionImageSlot, QuestionService } from '../services/question.service';
import { requireUploadedFile } from '../middlewares/upload';
import { IdParamsSchema, idParam, PaginationQuerySchema } from '../schemas/common.schema';
import {
  ExamTypeSubjectParamsSchema,
  QuestionBulkSchema,
  QuestionCreateBody,
  QuestionCreateSchema,
  QuestionListQuerySchema,
  QuestionUpdateSchema,
} from '../schemas/question.schema';
import { toQuestionResponse } from '../utils/serializers';

const ExamTypeParamsSchema = z.object({ examTypeId: idParam });
const SubjectParamsSchema = z.object({ subjectId: idParam });

function toCreateInput(body: QuestionCreateBody): QuestionCreateInput {
  return {
    examTypeId: body.exam_type_id,
    subjectId: body.subject_id,
    questionText: body.question_text,
    questionType: body.question_type,
    options: body.options ?? null,
    correctAnswer: body.correct_answer,
    explanation: body.explanation ?? null,
  };
}

export class QuestionController {
  constructor(private readonly questionService: QuestionService) {}

  createQuestion = asyncHandler(async (req: Request, res: Response) => {
    const body = QuestionCreateSchema.parse(req.body);
    const question = await this.questionService.create(toCreateInput(body));
    return successResponse(res, { message: 'Question created successfully', data: toQuestionResponse(question) });
  });

  /**
   * POST /questions/bulk
   * JSON array of questions, stored all-or-nothing.
   */
  createBulk = asyncHandler(async (req: Request, res: Response) => {
    const body = QuestionBulkSchema.parse(req.body);
    const questions = await this.questionService.bulkCreate(body.map(toCreateInput));
    return successResponse(res, {
      message: `${questions.length} questions created successfully`,
      data: questions.map(toQuestionResponse),
    });
  });

  listQuestions = asyncHandler(async (req: Request, res: Response) => {
    const query = QuestionListQuerySchema.parse(req.query);
    const questions = await this.questionService.list({
      examTypeId: query.exam_type_id,
      subjectId: query.subject_id,
      skip: query.skip,
      limit: query.limit,
    });
    return successResponse(res, { message: 'Questions fetched successfully', data: questions.map(toQuestionResponse) });
  });

  listByExamType = asyncHandler(async (req: Request, res: Response) => {
    const { examTypeId } = ExamTypeParamsSchema.parse(req.params);
    const { skip, limit } = PaginationQuerySchema.parse(req.query);
    const questions = await this.questionService.list({ examTypeId, skip, limit });
    return successResponse(res, { message: 'Questions fetched successfully', data: questions.map(toQuestionResponse) });
  });

  listBySubject = asyncHandler(async (req: Request, res: Response) => {
    const { subjectId } = SubjectParamsSchema.parse(req.params);
    const { skip, limit } = PaginationQuerySchema.parse(req.query);
    const questions = await this.questionService.list({ subjectId, skip, limit });
    return successResponse(res, { message: 'Questions fetched successfully', data: questions.map(toQuestionResponse) });
  });

  listByExamTypeAndSubject = asyncHandler(async (req: Request, res: Response) => {
    const { examTypeId, subjectId } = ExamTypeSubjectParamsSchema.parse(req.params);
    const { skip, limit } = PaginationQuerySchema.parse(req.query);
    const questions = await this.questionService.list({ examTypeId, subjectId, skip, limit });
    return successResponse(res, { message: 'Questions fetched successfully', data: questions.map(toQuestionResponse) });
  });

  getQuestion = asyncHandler(async (req: Request, res: Response) => {
    const { id } = IdParamsSchema.parse(req.params);
    const question = await this.questionService.get(id);
    return successResponse(res, { message: 'Question fetched successfully', data: toQuestionResponse(question) });
  });

  updateQuestion = asyncHandler(async (req: Request, res: Response) => {
    const { id } = IdParamsSchema.parse(req.params);
    const body = QuestionUpdateSchema.parse(req.body);
    const patch: QuestionPatch = {
      questionText: body.question_text,
      questionType: body.question_type,
      options: body.options,
      correctAnswer: body.correct_answer,
      explanation: body.explanation,
    };
    const question = await this.questionService.update(id, patch);
    return successResponse(res, { message: 'Question updated successfully', data: toQuestionResponse(question) });
  });

  deleteQuestion = asyncHandler(async (req: Request, res: Response) => {
    const { id } = IdParamsSchema.parse(req.params);
    await this.questionService.delete(id);
    return successResponse(res, { message: 'Question deleted successfully' });
  });

  uploadQuestionImage = this.uploadImage('question');
  deleteQuestionImage = this.deleteImage('question');
  uploadExplanationImage = this.uploadImage('explanation');
  deleteExplanationImage = this.deleteImage('explanation');

  private uploadImage(slot: QuestionImageSlot) {
    return asyncHandler(async (req: Request, res: Response) => {
      const { id } = IdParamsSchema.parse(req.params);
      const question = await this.questionService.attachImage(id, slot, requireUploadedFile(req));
      return successResponse(res, { message: 'Image uploaded successfully', data: toQuestionResponse(question) });
    });
  }

  private deleteImage(slot: QuestionImageSlot) {
    return asyncHandler(async (req: Request, res: Response) => {
      const { id } = IdParamsSchema.parse(req.params);
      const question = await this.questionService.detachImage(id, slot);
      return successResponse(res, { message: 'Image deleted successfully', data: toQuestionResponse(question) });
    });
  }
}
