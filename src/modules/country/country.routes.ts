/**
 * =============================================================================
 * COUNTRY MODULE - ROUTES
 * =============================================================================
 *
 * GET /api/v1/countries?search=<name>   Countries matching a name
 * GET /api/v1/countries/:alpha2code     One country by ISO alpha-2 code
 * =============================================================================
 */

import { Router } from 'express';
import { countryController } from './country.controller';

const router = Router();

router.get('/', countryController.searchCountries);
router.get('/:alpha2code', countryController.getCountry);

export { router as countryRouter };
