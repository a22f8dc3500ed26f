/**
 * =============================================================================
 * ADMIN MODULE - CONTROLLER
 * =============================================================================
 */

import { Request, Response } from 'express';
import { adminService } from './admin.service';
import { loginSchema, countryCodeParamsSchema } from './admin.schema';
import { validateSchema, paginationSchema, idParamSchema } from '../../shared/utils/validation.utils';
import { successResponse } from '../../shared/types/api.types';
import { asyncHandler } from '../../shared/middleware/error.middleware';
import { AuthenticationError } from '../../shared/types/error.types';

function currentAdmin(req: Request): string {
  if (!req.admin) {
    throw new AuthenticationError();
  }
  return req.admin.username;
}

class AdminController {
  /**
   * Exchange username + password for an access token
   */
  login = asyncHandler(async (req: Request, res: Response) => {
    const { username, password } = validateSchema(loginSchema, req.body);

    const result = await adminService.login(username, password);

    res.status(200).json(successResponse(result));
  });

  /**
   * Row counts and provider counters
   */
  getStats = asyncHandler(async (_req: Request, res: Response) => {
    const stats = await adminService.getStats();

    res.status(200).json(successResponse(stats));
  });

  listCountries = asyncHandler(async (req: Request, res: Response) => {
    const { page, limit } = validateSchema(paginationSchema, req.query);

    const result = await adminService.listCountries(page, limit);

    res.status(200).json(successResponse(result.data, {
      page: result.pagination.page,
      limit: result.pagination.pageSize,
      total: result.pagination.total,
      hasMore: result.pagination.hasMore
    }));
  });

  deleteCountry = asyncHandler(async (req: Request, res: Response) => {
    const { alpha2code } = validateSchema(countryCodeParamsSchema, req.params);

    await adminService.deleteCountry(alpha2code, currentAdmin(req));

    res.status(200).json(successResponse({ deleted: alpha2code }));
  });

  deleteCity = asyncHandler(async (req: Request, res: Response) => {
    const { id } = validateSchema(idParamSchema, req.params);

    await adminService.deleteCity(id, currentAdmin(req));

    res.status(200).json(successResponse({ deleted: id }));
  });
}

export const adminController = new AdminController();
