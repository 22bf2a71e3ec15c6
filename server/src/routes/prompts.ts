import { Router, Request, Response, NextFunction } from 'express';
import type { ProjectOrchestrator } from '../services/project/projectOrchestrator.js';
import { ImagePromptRequestSchema, parseBody } from '../validation/schemas.js';

export function createPromptsRouter(orchestrator: ProjectOrchestrator): Router {
  const router = Router();

  // Preview the full prompt for a scene; nothing is drawn or saved
  router.post('/image', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const request = parseBody(ImagePromptRequestSchema, req.body);
      const { prompt, sceneSummary } = await orchestrator.composeImagePrompt(request);
      res.json({ success: true, prompt, sceneSummary });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
