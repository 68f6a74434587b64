import { Request, Response } from 'express';
import { asyncHandler, successResponse } from '@cbt/shared';
import { AttemptService } from '../services/attempt.service';
import { requireUser } from '../middlewares/authMiddleware';
import { IdParamsSchema } from '../schemas/common.schema';
import {
  AttemptStartQuerySchema,
  AttemptStartSchema,
  AttemptSubmitSchema,
  PracticeAttemptSchema,
} from '../schemas/attempt.schema';
import { toAttemptResponse, toAttemptResultResponse, toLeaderboardResponse } from '../utils/serializers';

export class AttemptController {
  constructor(private readonly attemptService: AttemptService) {}

  /**
   * POST /attempts/start
   */
  startAttempt = asyncHandler(async (req: Request, res: Response) => {
    const { test_id } = AttemptStartSchema.parse(req.body);
    const { user_id } = AttemptStartQuerySchema.parse(req.query);
    const actor = requireUser(req);
    const started = await this.attemptService.start(actor, test_id, user_id ?? actor.id);
    return successResponse(res, { message: 'Attempt started successfully', data: toAttemptResponse(started) });
  });

  /**
   * POST /attempts/submit
   * Grades and completes the attempt; a second submit is rejected.
   */
  submitAttempt = asyncHandler(async (req: Request, res: Response) => {
    const body = AttemptSubmitSchema.parse(req.body);
    const result = await this.attemptService.submit(
      requireUser(req),
      body.attempt_id,
      body.answers.map((answer) => ({
        questionId: answer.question_id,
        answerText: answer.answer_text,
        timeSpent: answer.time_spent ?? null,
      }))
    );
    return successResponse(res, { message: 'Attempt submitted successfully', data: toAttemptResultResponse(result) });
  });

  /**
   * POST /attempts/practice
   */
  savePractice = asyncHandler(async (req: Request, res: Response) => {
    const body = PracticeAttemptSchema.parse(req.body);
    const saved = await this.attemptService.savePractice(requireUser(req), {
      examTypeId: body.exam_type_id,
      subjectId: body.subject_id,
      score: body.score,
      totalQuestions: body.total_questions,
      timeSpent: body.time_spent,
      answers: body.answers.map((answer) => ({
        questionId: answer.question_id,
        answerText: answer.answer_text,
        isCorrect: answer.is_correct,
        timeSpent: answer.time_spent ?? null,
      })),
    });
    return successResponse(res, { message: 'Practice attempt saved successfully', data: toAttemptResponse(saved) });
  });

  getLeaderboard = asyncHandler(async (_req: Request, res: Response) => {
    const entries = await this.attemptService.getLeaderboard();
    return successResponse(res, { message: 'Leaderboard fetched successfully', data: entries.map(toLeaderboardResponse) });
  });

  getUserAttempts = asyncHandler(async (req: Request, res: Response) => {
    const { id } = IdParamsSchema.parse(req.params);
    const attempts = await this.attemptService.getUserAttempts(requireUser(req), id);
    return successResponse(res, { message: 'Attempts fetched successfully', data: attempts.map(toAttemptResponse) });
  });

  getStudentAttempts = asyncHandler(async (req: Request, res: Response) => {
    const { id } = IdParamsSchema.parse(req.params);
    const attempts = await this.attemptService.getStudentAttempts(id);
    return successResponse(res, { message: 'Attempts fetched successfully', data: attempts.map(toAttemptResponse) });
  });

  getAttempt = asyncHandler(async (req: Request, res: Response) => {
    const { id } = IdParamsSchema.parse(req.params);
    const attempt = await this.attemptService.getAttempt(requireUser(req), id);
    return successResponse(res, { message: 'Attempt fetched successfully', data: toAttemptResponse(attempt) });
  });
}
