import { Router, Request, Response, NextFunction } from 'express';
import { ValidationError } from '../errors/index.js';
import type { ProjectOrchestrator } from '../services/project/projectOrchestrator.js';
import { ImageRequestSchema, PageImageRequestSchema, parseBody } from '../validation/schemas.js';

function parsePageNumber(value: string): number {
  const pageNumber = Number(value);
  if (!Number.isInteger(pageNumber) || pageNumber < 1) {
    throw new ValidationError(`Invalid page number: ${value}`);
  }
  return pageNumber;
}

export function createImagesRouter(orchestrator: ProjectOrchestrator): Router {
  const router = Router();

  // Illustrate every page of a story
  router.post('/stories/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const options = parseBody(ImageRequestSchema, req.body);
      const project = await orchestrator.generateImages(req.params.id, options);
      res.json({ success: true, project });
    } catch (error) {
      next(error);
    }
  });

  // Illustrate (or redo) a single page, optionally with an edited prompt
  router.post('/stories/:id/pages/:pageNumber', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const pageNumber = parsePageNumber(req.params.pageNumber);
      const request = parseBody(PageImageRequestSchema, req.body);
      const page = await orchestrator.generatePageImage(req.params.id, pageNumber, request);
      res.json({ success: true, page });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
