/**
 * =============================================================================
 * WEATHER MODULE - CONTROLLER
 * =============================================================================
 */

import { Request, Response } from 'express';
import { weatherService } from './weather.service';
import { currentWeatherQuerySchema, weatherHistoryQuerySchema } from './weather.schema';
import { validateSchema } from '../../shared/utils/validation.utils';
import { successResponse } from '../../shared/types/api.types';
import { asyncHandler } from '../../shared/middleware/error.middleware';

class WeatherController {
  /**
   * Current weather for a city (stores a snapshot)
   */
  getCurrentWeather = asyncHandler(async (req: Request, res: Response) => {
    const { city, alpha2code } = validateSchema(currentWeatherQuerySchema, req.query);

    const result = await weatherService.getCurrentWeather(city, alpha2code);

    res.status(200).json(successResponse(result));
  });

  /**
   * Stored snapshots for a city, newest first
   */
  getHistory = asyncHandler(async (req: Request, res: Response) => {
    const { city, alpha2code, limit } = validateSchema(weatherHistoryQuerySchema, req.query);

    const history = await weatherService.getHistory(city, alpha2code, limit);

    res.status(200).json(successResponse(history, {
      limit,
      total: history.snapshots.length
    }));
  });
}

export const weatherController = new WeatherController();
