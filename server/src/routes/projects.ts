import { Router, Request, Response, NextFunction } from 'express';
import type { GenerationProgress } from '../../../shared/types/index.js';
import type { ProjectOrchestrator } from '../services/project/projectOrchestrator.js';
import { GenerateStoryRequestSchema, ImageRequestSchema, parseBody } from '../validation/schemas.js';

export function createProjectsRouter(orchestrator: ProjectOrchestrator): Router {
  const router = Router();

  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const projects = await orchestrator.listProjects();
      res.json({ success: true, projects });
    } catch (error) {
      next(error);
    }
  });

  // SSE stream of generation progress, optionally for one project (?projectId=)
  router.get('/progress', (req: Request, res: Response) => {
    const projectId = typeof req.query.projectId === 'string' ? req.query.projectId : undefined;

    res.setHeader('Content-Type', 'text/event-stream');
    res.setHeader('Cache-Control', 'no-cache');
    res.setHeader('Connection', 'keep-alive');
    res.setHeader('X-Accel-Buffering', 'no'); // For nginx

    res.write(`data: ${JSON.stringify({ connected: true })}\n\n`);

    const listener = (progress: GenerationProgress) => {
      if (projectId && progress.projectId !== projectId) return;
      res.write(`data: ${JSON.stringify(progress)}\n\n`);
    };
    orchestrator.on('progress', listener);

    res.on('close', () => {
      orchestrator.off('progress', listener);
    });
  });

  router.post('/abort', (req: Request, res: Response) => {
    orchestrator.abort();
    res.json({ success: true });
  });

  router.get('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const project = await orchestrator.getProject(req.params.id);
      res.json({ success: true, project });
    } catch (error) {
      next(error);
    }
  });

  router.delete('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      await orchestrator.deleteProject(req.params.id);
      res.status(204).end();
    } catch (error) {
      next(error);
    }
  });

  // Full pipeline: text, pages and illustrations
  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const request = parseBody(GenerateStoryRequestSchema, req.body);
      const project = await orchestrator.createProject(request);
      res.status(201).json({ success: true, project });
    } catch (error) {
      next(error);
    }
  });

  router.post('/:id/regenerate-story', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const request = parseBody(GenerateStoryRequestSchema, req.body);
      const project = await orchestrator.regenerateStory(req.params.id, request);
      res.json({ success: true, project });
    } catch (error) {
      next(error);
    }
  });

  router.post('/:id/regenerate-images', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const options = parseBody(ImageRequestSchema, req.body);
      const project = await orchestrator.regenerateImages(req.params.id, options);
      res.json({ success: true, project });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
