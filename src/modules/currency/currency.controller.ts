import { Request, Response } from 'express';
import { currencyService } from './currency.service';
import { currencyRatesQuerySchema } from './currency.schema';
import { validateSchema } from '../../shared/utils/validation.utils';
import { successResponse } from '../../shared/types/api.types';
import { asyncHandler } from '../../shared/middleware/error.middleware';

class CurrencyController {
  getRates = asyncHandler(async (req: Request, res: Response) => {
    const { base } = validateSchema(currencyRatesQuerySchema, req.query);

    const rates = await currencyService.getRates(base);

    res.status(200).json(successResponse(rates));
  });
}

export const currencyController = new CurrencyController();
