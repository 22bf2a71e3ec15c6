import type { Project, ProjectSummary, Story, StoryMetadata } from '../../../../shared/types/index.js';
import { NotFoundError, SessionInvalidError } from '../../errors/index.js';
import type { ProjectRepository } from '../../repositories/projectRepository.js';
import { summarize } from '../../repositories/projectRepository.js';
import type {
  CallOptions,
  ImageConversationClient,
  ImageTurnRequest,
  ImageTurnResult,
  StartSessionRequest,
  TextGenerationOptions,
  TextGenerator,
} from '../../services/ai/types.js';

export const NO_RETRY = { maxAttempts: 1, baseDelayMs: 0 };

export function makeMetadata(overrides: Partial<StoryMetadata> = {}): StoryMetadata {
  return {
    title: 'The Brave Fox',
    language: 'English',
    complexity: 'simple',
    vocabularyDiversity: 'simple',
    ageGroup: '4-8',
    numPages: 3,
    wordsPerPage: 5,
    artStyle: 'cartoon',
    ...overrides,
  };
}

export function makeStory(overrides: Partial<Story> = {}): Story {
  return {
    id: 'story-1',
    metadata: makeMetadata(),
    pages: [
      { pageNumber: 1, text: 'Finn the fox woke up early.' },
      { pageNumber: 2, text: 'He ran across the meadow.' },
      { pageNumber: 3, text: 'He found his friend the owl.' },
    ],
    createdAt: '2024-01-01T00:00:00.000Z',
    updatedAt: '2024-01-01T00:00:00.000Z',
    ...overrides,
  };
}

export function makeProject(overrides: Partial<Project> = {}): Project {
  const story = makeStory();
  return {
    id: 'project-1',
    name: 'The Brave Fox',
    story,
    status: 'story_generated',
    characterProfiles: [],
    createdAt: story.createdAt,
    updatedAt: story.updatedAt,
    ...overrides,
  };
}

type TextResponder = (prompt: string, options: TextGenerationOptions) => string | Promise<string>;

export class FakeTextGenerator implements TextGenerator {
  readonly provider = 'stub' as const;
  readonly calls: Array<{ prompt: string; options: TextGenerationOptions }> = [];

  constructor(private respond: TextResponder) {}

  async generateText(prompt: string, options: TextGenerationOptions = {}): Promise<string> {
    this.calls.push({ prompt, options });
    return this.respond(prompt, options);
  }
}

/**
 * In-process image conversation. Tokens are "tok-N"; a token is valid once
 * issued unless revoked. Turns on a revoked token raise SessionInvalidError.
 */
export class FakeImageClient implements ImageConversationClient {
  readonly provider = 'stub' as const;
  readonly sessionsStarted: StartSessionRequest[] = [];
  readonly turns: ImageTurnRequest[] = [];
  readonly validations: string[] = [];

  // Throw from generateImage when this returns an error for the prompt
  failWhen?: (request: ImageTurnRequest) => Error | undefined;
  validateError?: Error;
  startError?: Error;

  private counter = 0;
  private valid = new Set<string>();

  async startSession(request: StartSessionRequest, _options?: CallOptions): Promise<string> {
    this.sessionsStarted.push(request);
    if (this.startError) throw this.startError;
    return this.issue();
  }

  async generateImage(request: ImageTurnRequest, _options?: CallOptions): Promise<ImageTurnResult> {
    this.turns.push(request);
    if (!this.valid.has(request.sessionToken)) {
      throw new SessionInvalidError(`Unknown session ${request.sessionToken}`, 'stub', 404);
    }
    const failure = this.failWhen?.(request);
    if (failure) throw failure;
    return { imageUrl: `https://images.test/${this.turns.length}.png`, sessionToken: this.issue() };
  }

  async validateSession(_storyId: string, sessionToken: string, _options?: CallOptions): Promise<boolean> {
    this.validations.push(sessionToken);
    if (this.validateError) throw this.validateError;
    return this.valid.has(sessionToken);
  }

  revoke(token: string): void {
    this.valid.delete(token);
  }

  accept(token: string): void {
    this.valid.add(token);
  }

  private issue(): string {
    this.counter += 1;
    const token = `tok-${this.counter}`;
    this.valid.add(token);
    return token;
  }
}

export class InMemoryProjectRepository implements ProjectRepository {
  readonly projects = new Map<string, Project>();
  saves = 0;

  async save(project: Project): Promise<void> {
    this.saves += 1;
    this.projects.set(project.id, structuredClone(project));
  }

  async get(projectId: string): Promise<Project> {
    const project = this.projects.get(projectId);
    if (!project) throw new NotFoundError(`Project ${projectId} not found`);
    return structuredClone(project);
  }

  async list(): Promise<ProjectSummary[]> {
    return [...this.projects.values()].map(summarize);
  }

  async delete(projectId: string): Promise<void> {
    if (!this.projects.delete(projectId)) throw new NotFoundError(`Project ${projectId} not found`);
  }
}
