/**
 * GET /api/v1/location?city=<name>&alpha2code=<XX>
 */

import { Router } from 'express';
import { locationController } from './location.controller';

const router = Router();

router.get('/', locationController.getLocationInfo);

export { router as locationRouter };
