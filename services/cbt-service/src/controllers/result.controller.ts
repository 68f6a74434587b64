import { Request, Response } from 'express';
import { asyncHandler, successResponse } from '@cbt/shared';
import { ResultService } from '../services/result.service';
import { requireUser } from '../middlewares/authMiddleware';
import { IdParamsSchema } from '../schemas/common.schema';
import { toAnalyticsResponse, toAttemptResultResponse, toResultSummaryResponse } from '../utils/serializers';

export class ResultController {
  constructor(private readonly resultService: ResultService) {}

  getAttemptResult = asyncHandler(async (req: Request, res: Response) => {
    const { id } = IdParamsSchema.parse(req.params);
    const result = await this.resultService.getAttemptResult(requireUser(req), id);
    return successResponse(res, { message: 'Result fetched successfully', data: toAttemptResultResponse(result) });
  });

  getUserResults = asyncHandler(async (req: Request, res: Response) => {
    const { id } = IdParamsSchema.parse(req.params);
    const results = await this.resultService.getUserResults(requireUser(req), id);
    return successResponse(res, { message: 'Results fetched successfully', data: results.map(toResultSummaryResponse) });
  });

  getTestAnalytics = asyncHandler(async (req: Request, res: Response) => {
    const { id } = IdParamsSchema.parse(req.params);
    const analytics = await this.resultService.getTestAnalytics(id);
    return successResponse(res, { message: 'Analytics fetched successfully', data: toAnalyticsResponse(analytics) });
  });
}
