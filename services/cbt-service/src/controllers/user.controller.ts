import { Request, Response } from 'express';
import { asyncHandler, successResponse, UnauthorizedError } from '@cbt/shared';
import { UserService } from '../services/user.service';
import { extractBearerToken, requireUser } from '../middlewares/authMiddleware';
import { requireUploadedFile } from '../middlewares/upload';
import { IdParamsSchema, PaginationQuerySchema } from '../schemas/common.schema';
import { LoginSchema, RefreshTokenSchema, RegisterSchema, UserUpdateSchema } from '../schemas/user.schema';
import { readSpreadsheetRows } from '../utils/spreadsheet';
import { toBulkUploadResponse, toLoginResponse, toUserResponse } from '../utils/serializers';

export class UserController {
  constructor(private readonly userService: UserService) {}

  /**
   * POST /users/register
   */
  register = asyncHandler(async (req: Request, res: Response) => {
    const body = RegisterSchema.parse(req.body);
    const user = await this.userService.register(body);
    return successResponse(res, { message: 'User registered successfully', data: toUserResponse(user) });
  });

  /**
   * POST /users/login
   */
  login = asyncHandler(async (req: Request, res: Response) => {
    const { username, password } = LoginSchema.parse(req.body);
    const session = await this.userService.login(username, password);
    return successResponse(res, { message: 'Login successful', data: toLoginResponse(session) });
  });

  /**
   * POST /users/refresh-token
   * Token from the body, or the Authorization header when absent.
   */
  refreshToken = asyncHandler(async (req: Request, res: Response) => {
    const { token } = RefreshTokenSchema.parse(req.body ?? {});
    const presented = token ?? extractBearerToken(req);
    if (!presented) {
      throw new UnauthorizedError('Refresh token is required');
    }
    const session = await this.userService.refresh(presented);
    return successResponse(res, { message: 'Token refreshed successfully', data: toLoginResponse(session) });
  });

  listUsers = asyncHandler(async (req: Request, res: Response) => {
    const { skip, limit } = PaginationQuerySchema.parse(req.query);
    const users = await this.userService.listUsers(skip, limit);
    return successResponse(res, { message: 'Users fetched successfully', data: users.map(toUserResponse) });
  });

  getUser = asyncHandler(async (req: Request, res: Response) => {
    const { id } = IdParamsSchema.parse(req.params);
    const user = await this.userService.getUser(id);
    return successResponse(res, { message: 'User fetched successfully', data: toUserResponse(user) });
  });

  updateUser = asyncHandler(async (req: Request, res: Response) => {
    const { id } = IdParamsSchema.parse(req.params);
    const body = UserUpdateSchema.parse(req.body);
    const user = await this.userService.updateUser(id, body, requireUser(req));
    return successResponse(res, { message: 'User updated successfully', data: toUserResponse(user) });
  });

  deleteUser = asyncHandler(async (req: Request, res: Response) => {
    const { id } = IdParamsSchema.parse(req.params);
    await this.userService.deleteUser(id, requireUser(req));
    return successResponse(res, { message: 'User deleted successfully' });
  });

  /**
   * POST /users/bulk-upload
   * CSV or Excel sheet with username, email, password, full_name columns.
   */
  bulkUpload = asyncHandler(async (req: Request, res: Response) => {
    const file = requireUploadedFile(req);
    const rows = readSpreadsheetRows(file.originalname, file.buffer);
    const report = await this.userService.bulkRegister(rows);
    return successResponse(res, {
      message: `Processed ${report.totalProcessed} users: ${report.successful} created, ${report.failed} failed`,
      data: toBulkUploadResponse(report),
    });
  });
}
