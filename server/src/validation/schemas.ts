import { z } from 'zod';
import {
  IMAGE_QUALITIES,
  IMAGE_SIZES,
  type ArtBible,
  type CharacterProfile,
  type CharacterReference,
  type ImageQuality,
  type ImageSize,
  type Page,
  type Project,
  type Story,
  type StoryMetadata,
} from '../../../shared/types/index.js';
import { ValidationError } from '../errors/index.js';

const text = z.string().trim().min(1);

export const ImageSizeSchema = z.custom<ImageSize>(
  value => IMAGE_SIZES.some(size => size === value),
  { message: `size must be one of ${IMAGE_SIZES.join(', ')}` }
);

export const ImageQualitySchema = z.custom<ImageQuality>(
  value => IMAGE_QUALITIES.some(quality => quality === value),
  { message: `quality must be one of ${IMAGE_QUALITIES.join(', ')}` }
);

export const StoryMetadataSchema: z.ZodType<StoryMetadata, z.ZodTypeDef, unknown> = z.object({
  title: text.max(200),
  language: text,
  complexity: text,
  vocabularyDiversity: text,
  ageGroup: text,
  numPages: z.number().int().min(1).max(50),
  wordsPerPage: z.number().int().min(5).max(500),
  genre: z.string().optional(),
  artStyle: z.string().optional(),
  userPrompt: z.string().max(2000).optional(),
});

export const CharacterProfileSchema: z.ZodType<CharacterProfile, z.ZodTypeDef, unknown> = z.object({
  name: text,
  species: text,
  physicalDescription: text,
  clothing: z.string().optional(),
  distinctiveFeatures: z.string().optional(),
  personalityTraits: z.string().optional(),
});

export const ArtBibleSchema: z.ZodType<ArtBible, z.ZodTypeDef, unknown> = z.object({
  prompt: z.string(),
  imageUrl: z.string().optional(),
  artStyle: z.string(),
  styleNotes: z.string().optional(),
  colorPalette: z.string().optional(),
  lightingStyle: z.string().optional(),
  brushTechnique: z.string().optional(),
});

export const CharacterReferenceSchema: z.ZodType<CharacterReference, z.ZodTypeDef, unknown> = z.object({
  characterName: z.string(),
  prompt: z.string(),
  imageUrl: z.string().optional(),
  species: z.string().optional(),
  physicalDescription: z.string().optional(),
  clothing: z.string().optional(),
  distinctiveFeatures: z.string().optional(),
});

const PageSchema: z.ZodType<Page, z.ZodTypeDef, unknown> = z.object({
  pageNumber: z.number().int().positive(),
  text: z.string(),
  imageUrl: z.string().optional(),
  imagePrompt: z.string().optional(),
});

const StorySchema: z.ZodType<Story, z.ZodTypeDef, unknown> = z.object({
  id: z.string(),
  metadata: StoryMetadataSchema,
  pages: z.array(PageSchema),
  artBible: ArtBibleSchema.optional(),
  characterReferences: z.array(CharacterReferenceSchema).optional(),
  imageSessionId: z.string().optional(),
  characters: z.array(CharacterProfileSchema).optional(),
  createdAt: z.string(),
  updatedAt: z.string(),
});

export const ProjectSchema: z.ZodType<Project, z.ZodTypeDef, unknown> = z.object({
  id: z.string(),
  name: z.string(),
  story: StorySchema,
  status: z.enum(['draft', 'story_generated', 'images_generated', 'completed']),
  characterProfiles: z.array(CharacterProfileSchema).default([]),
  createdAt: z.string(),
  updatedAt: z.string(),
});

// Request bodies

export const GenerateStoryRequestSchema = z.object({
  metadata: StoryMetadataSchema,
  theme: z.string().max(500).optional(),
  customPrompt: z.string().max(2000).optional(),
  projectName: z.string().trim().min(1).max(200).optional(),
});

export type GenerateStoryRequest = z.infer<typeof GenerateStoryRequestSchema>;

export const ImageRequestSchema = z.object({
  size: ImageSizeSchema.optional(),
  quality: ImageQualitySchema.optional(),
});

export const PageImageRequestSchema = ImageRequestSchema.extend({
  customPrompt: z.string().max(4000).optional(),
});

export const ArtBibleRequestSchema = z.object({
  projectId: text,
  artStyle: z.string().optional(),
  additionalNotes: z.string().max(1000).optional(),
  generateImage: z.boolean().default(true),
});

export const CharacterReferencesRequestSchema = z.object({
  projectId: text,
  includeTurnaround: z.boolean().default(true),
  generateImages: z.boolean().default(true),
});

export const ImagePromptRequestSchema = z.object({
  sceneDescription: text.max(4000),
  projectId: text.optional(),
  characterProfiles: z.array(CharacterProfileSchema).optional(),
  artStyle: z.string().optional(),
});

export const SessionRequestSchema = z.object({
  projectId: text,
});

/**
 * Validate an incoming request body. Failures become a ValidationError that
 * carries the zod issues, which the error handler returns as a 400.
 */
export function parseBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown): T {
  const result = schema.safeParse(body ?? {});
  if (!result.success) {
    const summary = result.error.issues.map(issue => `${issue.path.join('.') || 'body'}: ${issue.message}`).join('; ');
    throw new ValidationError(`Invalid request: ${summary}`, result.error.issues);
  }
  return result.data;
}
