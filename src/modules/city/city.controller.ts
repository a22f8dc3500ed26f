/**
 * =============================================================================
 * CITY MODULE - CONTROLLER
 * =============================================================================
 */

import { Request, Response } from 'express';
import { cityService } from './city.service';
import { citySearchQuerySchema } from './city.schema';
import { validateSchema } from '../../shared/utils/validation.utils';
import { successResponse } from '../../shared/types/api.types';
import { asyncHandler } from '../../shared/middleware/error.middleware';

class CityController {
  /**
   * Search cities by name, optionally within one country
   */
  searchCities = asyncHandler(async (req: Request, res: Response) => {
    const { search, alpha2code } = validateSchema(citySearchQuerySchema, req.query);

    const cities = await cityService.searchCities(search, alpha2code);

    res.status(200).json(successResponse(cities, { total: cities.length }));
  });
}

export const cityController = new CityController();
