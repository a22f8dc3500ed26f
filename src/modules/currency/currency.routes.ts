/**
 * GET /api/v1/currency?base=<XXX>   Latest exchange rates
 */

import { Router } from 'express';
import { currencyController } from './currency.controller';

const router = Router();

router.get('/', currencyController.getRates);

export { router as currencyRouter };
