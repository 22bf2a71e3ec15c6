import { EventEmitter } from 'events';
import { randomUUID } from 'crypto';
import type {
  ArtBible,
  CharacterProfile,
  CharacterReference,
  GenerationProgress,
  GenerationStage,
  ImageQuality,
  ImageSize,
  Page,
  Project,
  ProjectStatus,
  ProjectSummary,
  Story,
  StoryMetadata,
} from '../../../../shared/types/index.js';
import { config } from '../../config/index.js';
import { getStoryOptions } from '../../config/storyOptions.js';
import { ConfigurationError, NotFoundError, ValidationError, describeError, isAbortError } from '../../errors/index.js';
import type { ProjectRepository } from '../../repositories/projectRepository.js';
import logger from '../../utils/logger.js';
import { createArtBible, createCharacterReference } from '../story/promptComposer.js';
import type { StoryGenerator } from '../story/storyGenerator.js';
import { DEFAULT_ART_STYLE, type StandalonePrompt, type VisualContextService } from '../visual/visualContext.js';

// Helper to format duration
function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  return `${(ms / 1000).toFixed(1)}s`;
}

function carryArtBible(artBible: ArtBible | undefined, metadata: StoryMetadata): ArtBible | undefined {
  const artStyle = metadata.artStyle ?? DEFAULT_ART_STYLE;
  if (!artBible || artBible.artStyle === artStyle) return artBible;

  logger.info('PROJECT', `Art style changed from ${artBible.artStyle} to ${artStyle}, rebuilding the art bible`);
  return createArtBible({
    artStyle,
    genre: metadata.genre,
    storyTitle: metadata.title,
    additionalNotes: artBible.styleNotes,
  });
}

export interface StoryRequest {
  metadata: StoryMetadata;
  theme?: string;
  customPrompt?: string;
  projectName?: string;
}

export interface ImageOptions {
  size?: ImageSize;
  quality?: ImageQuality;
}

export interface PageImageRequest extends ImageOptions {
  customPrompt?: string;
}

export interface ArtBibleRequest {
  artStyle?: string;
  additionalNotes?: string;
  generateImage?: boolean;
}

export interface CharacterReferencesRequest {
  includeTurnaround?: boolean;
  generateImages?: boolean;
}

export interface ImagePromptRequest {
  sceneDescription: string;
  projectId?: string;
  characterProfiles?: CharacterProfile[];
  artStyle?: string;
}

export interface ProjectOrchestratorDeps {
  storyGenerator: StoryGenerator;
  visual: VisualContextService;
  repository: ProjectRepository;
}

/**
 * Orchestrator for story projects: text, pagination, images and persistence.
 * Emits 'progress' events (GenerationProgress) while long operations run.
 */
export class ProjectOrchestrator extends EventEmitter {
  private storyGenerator: StoryGenerator;
  private visual: VisualContextService;
  private repository: ProjectRepository;
  private controller = new AbortController();

  constructor(deps: ProjectOrchestratorDeps) {
    super();
    this.storyGenerator = deps.storyGenerator;
    this.visual = deps.visual;
    this.repository = deps.repository;
  }

  /**
   * Cancel every pipeline that is currently running. Page loops stop before
   * the next page; later calls start with a fresh signal.
   */
  abort(): void {
    logger.info('PROJECT', 'Abort requested');
    this.controller.abort();
    this.controller = new AbortController();
  }

  /**
   * Generate text and pagination only; the project is saved as
   * story_generated.
   */
  async createStoryProject(request: StoryRequest): Promise<Project> {
    const signal = this.controller.signal;
    const projectId = randomUUID();
    const story = await this.writeStory(projectId, request, signal);
    const project = this.newProject(projectId, request, story, 'story_generated');

    this.emitProgress(projectId, 'saving', 'Saving project');
    await this.repository.save(project);
    this.emitProgress(projectId, 'complete', `Story ready with ${story.pages.length} pages`, { isComplete: true });
    return project;
  }

  /**
   * Full pipeline: text, pagination and one illustration per page. Character
   * extraction is left to extractCharacters().
   */
  async createProject(request: StoryRequest): Promise<Project> {
    const startTime = Date.now();
    const signal = this.controller.signal;
    const projectId = randomUUID();

    const story = await this.writeStory(projectId, request, signal);
    const project = this.newProject(projectId, request, story, 'story_generated');
    await this.repository.save(project);

    await this.illustrate(project, {}, signal);
    project.status = 'completed';
    await this.persist(project);

    logger.info('PROJECT', `Project ${projectId} completed in ${formatDuration(Date.now() - startTime)}`);
    this.emitProgress(projectId, 'complete', 'Story and illustrations ready', { isComplete: true });
    return project;
  }

  /**
   * Replace the text and images of a project. Ids and the creation time are
   * kept. The art bible is kept when the art style is unchanged and rebuilt
   * in the new style otherwise; the image session, characters and character
   * references start over.
   */
  async regenerateStory(projectId: string, request: StoryRequest): Promise<Project> {
    const signal = this.controller.signal;
    const project = await this.repository.get(projectId);
    const previous = project.story;

    await this.visual.clearSession(previous.id);

    const story = await this.writeStory(projectId, request, signal, previous.id);
    story.createdAt = previous.createdAt;
    story.artBible = carryArtBible(previous.artBible, story.metadata);

    project.story = story;
    project.characterProfiles = [];
    if (request.projectName) project.name = request.projectName;
    project.status = 'story_generated';
    await this.persist(project);

    await this.illustrate(project, {}, signal);
    project.status = 'completed';
    await this.persist(project);

    this.emitProgress(projectId, 'complete', 'Story regenerated', { isComplete: true });
    return project;
  }

  async regenerateImages(projectId: string, options: ImageOptions = {}): Promise<Project> {
    const project = await this.repository.get(projectId);
    for (const page of project.story.pages) {
      page.imageUrl = undefined;
      page.imagePrompt = undefined;
    }
    return this.generateImagesFor(project, options);
  }

  async generateImages(projectId: string, options: ImageOptions = {}): Promise<Project> {
    return this.generateImagesFor(await this.repository.get(projectId), options);
  }

  async generatePageImage(projectId: string, pageNumber: number, request: PageImageRequest = {}): Promise<Page> {
    const project = await this.repository.get(projectId);
    const story = project.story;
    const page = story.pages.find(candidate => candidate.pageNumber === pageNumber);
    if (!page) {
      throw new NotFoundError(`Page ${pageNumber} not found in project ${projectId}`);
    }

    const result = await this.visual.generateImageForPage(
      story,
      page.text,
      story.characters ?? [],
      story.metadata.artStyle ?? DEFAULT_ART_STYLE,
      request.size ?? config.images.pageSize,
      request.quality ?? config.images.pageQuality,
      { customPrompt: request.customPrompt, signal: this.controller.signal }
    );
    page.imageUrl = result.imageUrl;
    page.imagePrompt = result.prompt;

    await this.persist(project);
    return page;
  }

  async extractCharacters(projectId: string): Promise<CharacterProfile[]> {
    const project = await this.repository.get(projectId);
    const profiles = await this.storyGenerator.extractCharacters(project.story.pages, this.controller.signal);

    project.story.characters = profiles;
    project.characterProfiles = profiles;
    await this.persist(project);

    logger.info('PROJECT', `Extracted ${profiles.length} character profiles for project ${projectId}`);
    return profiles;
  }

  /**
   * Create (or replace) the story's art bible and, unless disabled, draw it in
   * the story's image session. A new art style invalidates the session.
   */
  async generateArtBible(projectId: string, request: ArtBibleRequest = {}): Promise<ArtBible> {
    const project = await this.repository.get(projectId);
    const story = project.story;
    const currentStyle = story.metadata.artStyle ?? DEFAULT_ART_STYLE;
    const artStyle = request.artStyle?.trim() || currentStyle;

    if (artStyle !== currentStyle) {
      story.metadata.artStyle = artStyle;
      await this.visual.clearSession(story.id);
      story.imageSessionId = undefined;
    }

    story.artBible = createArtBible({
      artStyle,
      genre: story.metadata.genre,
      storyTitle: story.metadata.title,
      additionalNotes: request.additionalNotes,
    });

    let artBible = story.artBible;
    if (request.generateImage ?? true) {
      artBible = await this.visual.generateArtBibleImage(story, { signal: this.controller.signal });
    }

    await this.persist(project);
    return artBible;
  }

  /**
   * One reference sheet per extracted character. A failed image leaves that
   * reference without an image and moves on to the next one.
   */
  async generateCharacterReferences(
    projectId: string,
    request: CharacterReferencesRequest = {}
  ): Promise<CharacterReference[]> {
    const project = await this.repository.get(projectId);
    const story = project.story;
    const profiles = story.characters?.length ? story.characters : project.characterProfiles;
    if (profiles.length === 0) {
      throw new ValidationError('No character profiles yet; extract characters first');
    }

    const artStyle = story.metadata.artStyle ?? DEFAULT_ART_STYLE;
    story.characterReferences = profiles.map(profile =>
      createCharacterReference(profile, artStyle, request.includeTurnaround ?? true)
    );

    if (request.generateImages ?? true) {
      for (const reference of story.characterReferences) {
        try {
          await this.visual.generateCharacterReferenceImage(story, reference.characterName, {
            signal: this.controller.signal,
          });
        } catch (error) {
          if (error instanceof ConfigurationError || isAbortError(error)) throw error;
          logger.error('PROJECT', `Reference image for ${reference.characterName} failed`, describeError(error));
        }
      }
    }

    await this.persist(project);
    return story.characterReferences;
  }

  /**
   * Build a full image prompt for a scene without drawing it. With a project,
   * its characters, art style, art bible and references fill in whatever the
   * request leaves out.
   */
  async composeImagePrompt(request: ImagePromptRequest): Promise<StandalonePrompt> {
    const signal = this.controller.signal;
    if (!request.projectId) {
      const artStyle = request.artStyle?.trim() || getStoryOptions().defaults.artStyle || DEFAULT_ART_STYLE;
      return this.visual.composeStandalonePrompt(
        request.sceneDescription,
        request.characterProfiles ?? [],
        artStyle,
        undefined,
        [],
        { signal }
      );
    }

    const project = await this.repository.get(request.projectId);
    const story = project.story;
    const profiles = request.characterProfiles ?? (story.characters?.length ? story.characters : project.characterProfiles);
    return this.visual.composeStandalonePrompt(
      request.sceneDescription,
      profiles,
      request.artStyle?.trim() || story.metadata.artStyle || DEFAULT_ART_STYLE,
      story.artBible,
      story.characterReferences ?? [],
      { signal }
    );
  }

  async rebuildSession(projectId: string): Promise<string> {
    const project = await this.repository.get(projectId);
    this.emitProgress(projectId, 'visual_context', 'Rebuilding visual context');
    const token = await this.visual.rebuildVisualContext(project.story, { signal: this.controller.signal });
    await this.persist(project);
    return token;
  }

  async clearSession(projectId: string): Promise<void> {
    const project = await this.repository.get(projectId);
    await this.visual.clearSession(project.story.id);
    project.story.imageSessionId = undefined;
    await this.persist(project);
  }

  getProject(projectId: string): Promise<Project> {
    return this.repository.get(projectId);
  }

  listProjects(): Promise<ProjectSummary[]> {
    return this.repository.list();
  }

  async deleteProject(projectId: string): Promise<void> {
    const project = await this.repository.get(projectId);
    await this.visual.clearSession(project.story.id);
    await this.repository.delete(projectId);
  }

  private async writeStory(
    projectId: string,
    request: StoryRequest,
    signal: AbortSignal,
    storyId?: string
  ): Promise<Story> {
    const defaults = getStoryOptions().defaults;
    const metadata: StoryMetadata = {
      ...request.metadata,
      artStyle: request.metadata.artStyle || defaults.artStyle || DEFAULT_ART_STYLE,
    };

    this.emitProgress(projectId, 'story_text', `Writing "${metadata.title}"`);
    const story = await this.storyGenerator.generateStory(metadata, {
      theme: request.theme,
      customPrompt: request.customPrompt,
      storyId,
      signal,
    });
    this.emitProgress(projectId, 'pagination', `Story split into ${story.pages.length} pages`, {
      totalPages: story.pages.length,
    });
    return story;
  }

  private newProject(projectId: string, request: StoryRequest, story: Story, status: ProjectStatus): Project {
    return {
      id: projectId,
      name: request.projectName || story.metadata.title,
      story,
      status,
      characterProfiles: [],
      createdAt: story.createdAt,
      updatedAt: story.updatedAt,
    };
  }

  private async generateImagesFor(project: Project, options: ImageOptions): Promise<Project> {
    await this.illustrate(project, options, this.controller.signal);
    if (project.status !== 'completed') project.status = 'images_generated';
    await this.persist(project);
    this.emitProgress(project.id, 'complete', 'Illustrations ready', { isComplete: true });
    return project;
  }

  // Pages finished before a failure or abort are saved either way
  private async illustrate(project: Project, options: ImageOptions, signal: AbortSignal): Promise<void> {
    const story = project.story;
    this.emitProgress(project.id, 'visual_context', 'Preparing visual context');
    try {
      await this.visual.generateImagesForStory(story, {
        ...options,
        signal,
        onPage: (pageNumber, totalPages) =>
          this.emitProgress(project.id, 'page_image', `Illustrating page ${pageNumber} of ${totalPages}`, {
            pageNumber,
            totalPages,
          }),
      });
    } finally {
      await this.persist(project);
    }
  }

  private async persist(project: Project): Promise<void> {
    const now = new Date().toISOString();
    project.updatedAt = now;
    project.story.updatedAt = now;
    await this.repository.save(project);
  }

  private emitProgress(
    projectId: string,
    stage: GenerationStage,
    message: string,
    extra: Partial<Pick<GenerationProgress, 'pageNumber' | 'totalPages' | 'isComplete'>> = {}
  ): void {
    const progress: GenerationProgress = {
      projectId,
      stage,
      message,
      pageNumber: extra.pageNumber,
      totalPages: extra.totalPages,
      isComplete: extra.isComplete ?? false,
    };
    logger.debug('PROJECT', `[${stage}] ${message}`);
    this.emit('progress', progress);
  }
}
