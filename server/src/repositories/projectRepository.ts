import { randomUUID } from 'crypto';
import { promises as fs } from 'fs';
import path from 'path';
import type { Project, ProjectSummary } from '../../../shared/types/index.js';
import { NotFoundError, ValidationError } from '../errors/index.js';
import logger from '../utils/logger.js';
import { ProjectSchema } from '../validation/schemas.js';

export interface ProjectRepository {
  save(project: Project): Promise<void>;
  get(projectId: string): Promise<Project>;
  list(): Promise<ProjectSummary[]>;
  delete(projectId: string): Promise<void>;
}

const PROJECT_ID = /^[A-Za-z0-9_-]+$/;

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export function summarize(project: Project): ProjectSummary {
  return {
    id: project.id,
    name: project.name,
    status: project.status,
    pageCount: project.story.pages.length,
    updatedAt: project.updatedAt,
  };
}

/**
 * One JSON document per project under `<dataDir>/projects`.
 */
export class FileProjectRepository implements ProjectRepository {
  private projectsDir: string;

  constructor(dataDir: string) {
    this.projectsDir = path.join(dataDir, 'projects');
  }

  async save(project: Project): Promise<void> {
    const file = this.fileFor(project.id);
    await fs.mkdir(this.projectsDir, { recursive: true });

    // Atomic replace; the temp name is unique so overlapping saves never share it
    const temp = `${file}.${randomUUID()}.tmp`;
    await fs.writeFile(temp, JSON.stringify(project, null, 2), 'utf8');
    await fs.rename(temp, file);
    logger.debug('REPOSITORY', `Saved project ${project.id} (${project.status})`);
  }

  async get(projectId: string): Promise<Project> {
    const file = this.fileFor(projectId);

    let raw: string;
    try {
      raw = await fs.readFile(file, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        throw new NotFoundError(`Project ${projectId} not found`);
      }
      throw error;
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch {
      throw new ValidationError(`Project ${projectId} is not valid JSON`);
    }

    const parsed = ProjectSchema.safeParse(data);
    if (!parsed.success) {
      throw new ValidationError(`Project ${projectId} is malformed`, parsed.error.issues);
    }
    return parsed.data;
  }

  async list(): Promise<ProjectSummary[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.projectsDir);
    } catch (error) {
      if (isMissingFile(error)) return [];
      throw error;
    }

    const summaries: ProjectSummary[] = [];
    for (const entry of entries.filter(name => name.endsWith('.json'))) {
      const id = entry.slice(0, -'.json'.length);
      try {
        summaries.push(summarize(await this.get(id)));
      } catch (error) {
        logger.warn('REPOSITORY', `Skipping unreadable project file ${entry}`, error);
      }
    }
    return summaries.sort((a, b) => b.updatedAt.localeCompare(a.updatedAt));
  }

  async delete(projectId: string): Promise<void> {
    try {
      await fs.unlink(this.fileFor(projectId));
    } catch (error) {
      if (isMissingFile(error)) {
        throw new NotFoundError(`Project ${projectId} not found`);
      }
      throw error;
    }
    logger.info('REPOSITORY', `Deleted project ${projectId}`);
  }

  private fileFor(projectId: string): string {
    if (!PROJECT_ID.test(projectId)) {
      throw new NotFoundError(`Project ${projectId} not found`);
    }
    return path.join(this.projectsDir, `${projectId}.json`);
  }
}
