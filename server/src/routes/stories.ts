import { Router, Request, Response, NextFunction } from 'express';
import type { ProjectOrchestrator } from '../services/project/projectOrchestrator.js';
import { GenerateStoryRequestSchema, parseBody } from '../validation/schemas.js';

export function createStoriesRouter(orchestrator: ProjectOrchestrator): Router {
  const router = Router();

  // Generate story text and pages (no images yet)
  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const request = parseBody(GenerateStoryRequestSchema, req.body);
      const project = await orchestrator.createStoryProject(request);
      res.status(201).json({ success: true, project });
    } catch (error) {
      next(error);
    }
  });

  // Extract character profiles on demand
  router.post('/:id/characters', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const characters = await orchestrator.extractCharacters(req.params.id);
      res.json({ success: true, characters });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
