/**
 * =============================================================================
 * ADMIN MODULE - ROUTES
 * =============================================================================
 *
 * POST   /api/v1/admin/login                 Public
 * GET    /api/v1/admin/stats                 Admin token
 * GET    /api/v1/admin/countries             Admin token
 * DELETE /api/v1/admin/countries/:alpha2code Admin token
 * DELETE /api/v1/admin/cities/:id            Admin token
 * =============================================================================
 */

import { Router } from 'express';
import { adminController } from './admin.controller';
import { authMiddleware, roleGuard } from '../../shared/middleware/auth.middleware';

const router = Router();

router.post('/login', adminController.login);

router.use(authMiddleware, roleGuard(['admin']));

router.get('/stats', adminController.getStats);
router.get('/countries', adminController.listCountries);
router.delete('/countries/:alpha2code', adminController.deleteCountry);
router.delete('/cities/:id', adminController.deleteCity);

export { router as adminRouter };
