import { Request, Response } from 'express';
import { asyncHandler, successResponse } from '@cbt/shared';
import { TestService } from '../services/test.service';
import { requireUser } from '../middlewares/authMiddleware';
import { IdParamsSchema, PaginationQuerySchema } from '../schemas/common.schema';
import { TestCreateSchema, TestUpdateSchema } from '../schemas/test.schema';
import { toTestResponse, toTestWithQuestionsResponse } from '../utils/serializers';

export class TestController {
  constructor(private readonly testService: TestService) {}

  createTest = asyncHandler(async (req: Request, res: Response) => {
    const body = TestCreateSchema.parse(req.body);
    const test = await this.testService.create(
      {
        examTypeId: body.exam_type_id,
        subjectId: body.subject_id,
        durationMinutes: body.duration_minutes,
        questionCount: body.question_count,
      },
      requireUser(req).id
    );
    return successResponse(res, { message: 'Test created successfully', data: toTestResponse(test) });
  });

  listTests = asyncHandler(async (req: Request, res: Response) => {
    const { skip, limit } = PaginationQuerySchema.parse(req.query);
    const tests = await this.testService.list(skip, limit);
    return successResponse(res, { message: 'Tests fetched successfully', data: tests.map(toTestResponse) });
  });

  listByExamType = asyncHandler(async (req: Request, res: Response) => {
    const { id } = IdParamsSchema.parse(req.params);
    const tests = await this.testService.listByExamType(id);
    return successResponse(res, { message: 'Tests fetched successfully', data: tests.map(toTestResponse) });
  });

  listBySubject = asyncHandler(async (req: Request, res: Response) => {
    const { id } = IdParamsSchema.parse(req.params);
    const tests = await this.testService.listBySubject(id);
    return successResponse(res, { message: 'Tests fetched successfully', data: tests.map(toTestResponse) });
  });

  getTest = asyncHandler(async (req: Request, res: Response) => {
    const { id } = IdParamsSchema.parse(req.params);
    const test = await this.testService.get(id);
    return successResponse(res, { message: 'Test fetched successfully', data: toTestResponse(test) });
  });

  /**
   * GET /tests/:id/with-questions
   * A new random question set on every call.
   */
  getWithQuestions = asyncHandler(async (req: Request, res: Response) => {
    const { id } = IdParamsSchema.parse(req.params);
    const result = await this.testService.getWithQuestions(id);
    return successResponse(res, { message: 'Test fetched successfully', data: toTestWithQuestionsResponse(result) });
  });

  updateTest = asyncHandler(async (req: Request, res: Response) => {
    const { id } = IdParamsSchema.parse(req.params);
    const body = TestUpdateSchema.parse(req.body);
    const test = await this.testService.update(id, {
      examTypeId: body.exam_type_id,
      subjectId: body.subject_id,
      durationMinutes: body.duration_minutes,
      questionCount: body.question_count,
      isActive: body.is_active,
    });
    return successResponse(res, { message: 'Test updated successfully', data: toTestResponse(test) });
  });

  deleteTest = asyncHandler(async (req: Request, res: Response) => {
    const { id } = IdParamsSchema.parse(req.params);
    await this.testService.delete(id);
    return successResponse(res, { message: 'Test deleted successfully' });
  });
}
