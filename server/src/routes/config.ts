import { Router, Request, Response, NextFunction } from 'express';
import { getArtStyles, getStoryOptions } from '../config/storyOptions.js';

export function createConfigRouter(): Router {
  const router = Router();

  router.get('/story-options', (req: Request, res: Response, next: NextFunction) => {
    try {
      const options = getStoryOptions();
      res.json({ success: true, ...options, artStyleDetails: getArtStyles().styles });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
