/**
 * =============================================================================
 * CITY MODULE - ROUTES
 * =============================================================================
 *
 * GET /api/v1/cities?search=<name>&alpha2code=<XX>
 * =============================================================================
 */

import { Router } from 'express';
import { cityController } from './city.controller';

const router = Router();

router.get('/', cityController.searchCities);

export { router as cityRouter };
