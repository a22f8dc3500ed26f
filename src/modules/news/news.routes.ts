/**
 * =============================================================================
 * NEWS MODULE - ROUTES
 * =============================================================================
 *
 * GET /api/v1/news?alpha2code=<XX>&limit=<1-100>
 * =============================================================================
 */

import { Router } from 'express';
import { newsController } from './news.controller';

const router = Router();

router.get('/', newsController.getNews);

export { router as newsRouter };
