/**
 * =============================================================================
 * COUNTRY MODULE - CONTROLLER
 * =============================================================================
 *
 * Handles HTTP requests for countries.
 * Controller only handles request/response - lookup logic is in the service.
 * =============================================================================
 */

import { Request, Response } from 'express';
import { countryService } from './country.service';
import { countrySearchQuerySchema, countryCodeParamsSchema } from './country.schema';
import { validateSchema } from '../../shared/utils/validation.utils';
import { successResponse } from '../../shared/types/api.types';
import { asyncHandler } from '../../shared/middleware/error.middleware';

class CountryController {
  /**
   * Search countries by name
   */
  searchCountries = asyncHandler(async (req: Request, res: Response) => {
    const { search } = validateSchema(countrySearchQuerySchema, req.query);

    const countries = await countryService.searchCountries(search);

    res.status(200).json(successResponse(countries, { total: countries.length }));
  });

  /**
   * Get one country by ISO alpha-2 code
   */
  getCountry = asyncHandler(async (req: Request, res: Response) => {
    const { alpha2code } = validateSchema(countryCodeParamsSchema, req.params);

    const country = await countryService.getCountryByCode(alpha2code);

    res.status(200).json(successResponse(country));
  });
}

export const countryController = new CountryController();
