import { Request, Response } from 'express';
import { locationService } from './location.service';
import { locationQuerySchema } from './location.schema';
import { validateSchema } from '../../shared/utils/validation.utils';
import { successResponse } from '../../shared/types/api.types';
import { asyncHandler } from '../../shared/middleware/error.middleware';

class LocationController {
  /**
   * Country, current weather and currency rates for a city
   */
  getLocationInfo = asyncHandler(async (req: Request, res: Response) => {
    const { city, alpha2code } = validateSchema(locationQuerySchema, req.query);

    const info = await locationService.getLocationInfo(city, alpha2code);

    res.status(200).json(successResponse(info));
  });
}

export const locationController = new LocationController();
