/**
 * =============================================================================
 * NEWS MODULE - CONTROLLER
 * =============================================================================
 */

import { Request, Response } from 'express';
import { newsService } from './news.service';
import { newsQuerySchema } from './news.schema';
import { validateSchema } from '../../shared/utils/validation.utils';
import { successResponse } from '../../shared/types/api.types';
import { asyncHandler } from '../../shared/middleware/error.middleware';

class NewsController {
  /**
   * Headlines for a country, newest first
   */
  getNews = asyncHandler(async (req: Request, res: Response) => {
    const { alpha2code, limit } = validateSchema(newsQuerySchema, req.query);

    const news = await newsService.getNews(alpha2code, limit);

    res.status(200).json(successResponse(news, {
      limit,
      total: news.articles.length
    }));
  });
}

export const newsController = new NewsController();
