import { Request, Response } from 'express';
import { asyncHandler, successResponse } from '@cbt/shared';
import { IdParamsSchema } from '../schemas/common.schema';
import { CatalogCreateSchema, CatalogUpdateSchema } from '../schemas/catalog.schema';
import { toCatalogResponse } from '../utils/serializers';

export interface CatalogEntry {
  id: number;
  name: string;
  description: string | null;
  createdAt: Date;
}

/**
 * What ExamTypeService and SubjectService have in common.
 */
export interface CatalogService<T extends CatalogEntry> {
  create(name: string, description: string | null): Promise<T>;
  list(): Promise<T[]>;
  get(id: number): Promise<T>;
  update(id: number, patch: { name?: string; description?: string | null }): Promise<T>;
  delete(id: number): Promise<void>;
}

/**
 * Exam types and subjects share one shape and one set of handlers; `label`
 * only changes the response messages.
 */
export class CatalogController<T extends CatalogEntry> {
  constructor(
    private readonly service: CatalogService<T>,
    private readonly label: string
  ) {}

  create = asyncHandler(async (req: Request, res: Response) => {
    const { name, description } = CatalogCreateSchema.parse(req.body);
    const entry = await this.service.create(name, description ?? null);
    return successResponse(res, { message: `${this.label} created successfully`, data: toCatalogResponse(entry) });
  });

  list = asyncHandler(async (_req: Request, res: Response) => {
    const entries = await this.service.list();
    return successResponse(res, { message: `${this.label}s fetched successfully`, data: entries.map(toCatalogResponse) });
  });

  get = asyncHandler(async (req: Request, res: Response) => {
    const { id } = IdParamsSchema.parse(req.params);
    const entry = await this.service.get(id);
    return successResponse(res, { message: `${this.label} fetched successfully`, data: toCatalogResponse(entry) });
  });

  update = asyncHandler(async (req: Request, res: Response) => {
    const { id } = IdParamsSchema.parse(req.params);
    const body = CatalogUpdateSchema.parse(req.body);
    const entry = await this.service.update(id, body);
    return successResponse(res, { message: `${this.label} updated successfully`, data: toCatalogResponse(entry) });
  });

  delete = asyncHandler(async (req: Request, res: Response) => {
    const { id } = IdParamsSchema.parse(req.params);
    await this.service.delete(id);
    return successResponse(res, { message: `${this.label} deleted successfully` });
  });
}
