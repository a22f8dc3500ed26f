/**
 * =============================================================================
 * WEATHER MODULE - ROUTES
 * =============================================================================
 *
 * GET /api/v1/weather?city=<name>&alpha2code=<XX>
 * GET /api/v1/weather/history?city=<name>&alpha2code=<XX>&limit=<1-100>
 * =============================================================================
 */

import { Router } from 'express';
import { weatherController } from './weather.controller';

const router = Router();

router.get('/', weatherController.getCurrentWeather);
router.get('/history', weatherController.getHistory);

export { router as weatherRouter };
