import { Router, Request, Response, NextFunction } from 'express';
import type { ProjectOrchestrator } from '../services/project/projectOrchestrator.js';
import {
  ArtBibleRequestSchema,
  CharacterReferencesRequestSchema,
  SessionRequestSchema,
  parseBody,
} from '../validation/schemas.js';

export function createVisualRouter(orchestrator: ProjectOrchestrator): Router {
  const router = Router();

  router.post('/art-bible', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { projectId, ...request } = parseBody(ArtBibleRequestSchema, req.body);
      const artBible = await orchestrator.generateArtBible(projectId, request);
      res.json({ success: true, artBible });
    } catch (error) {
      next(error);
    }
  });

  router.post('/character-references', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { projectId, ...request } = parseBody(CharacterReferencesRequestSchema, req.body);
      const characterReferences = await orchestrator.generateCharacterReferences(projectId, request);
      res.json({ success: true, characterReferences });
    } catch (error) {
      next(error);
    }
  });

  router.post('/session/rebuild', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { projectId } = parseBody(SessionRequestSchema, req.body);
      const sessionId = await orchestrator.rebuildSession(projectId);
      res.json({ success: true, sessionId });
    } catch (error) {
      next(error);
    }
  });

  router.post('/session/clear', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { projectId } = parseBody(SessionRequestSchema, req.body);
      await orchestrator.clearSession(projectId);
      res.json({ success: true });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
