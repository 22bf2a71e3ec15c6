// Story Types
export interface StoryMetadata {
  title: string;
  language: string;
  complexity: string;
  vocabularyDiversity: string;
  ageGroup: string;
  numPages: number;
  wordsPerPage: number;
  genre?: string;
  artStyle?: string;
  userPrompt?: string;
}

export interface Page {
  pageNumber: number; // 1-based, dense
  text: string;
  imageUrl?: string;
  imagePrompt?: string;
}

export interface Story {
  id: string;
  metadata: StoryMetadata;
  pages: Page[];
  artBible?: ArtBible;
  characterReferences?: CharacterReference[];
  imageSessionId?: string;
  characters?: CharacterProfile[];
  createdAt: string;
  updatedAt: string;
}

// Character Types
export interface Character {
  name: string;
  description: string;
}

export interface CharacterProfile {
  name: string;
  species: string;
  physicalDescription: string;
  clothing?: string;
  distinctiveFeatures?: string;
  personalityTraits?: string;
}

// Visual Consistency Types
export interface ArtBible {
  prompt: string;
  imageUrl?: string;
  artStyle: string;
  styleNotes?: string;
  colorPalette?: string;
  lightingStyle?: string;
  brushTechnique?: string;
}

export interface CharacterReference {
  characterName: string;
  prompt: string;
  imageUrl?: string;
  species?: string;
  physicalDescription?: string;
  clothing?: string;
  distinctiveFeatures?: string;
}

export type ImageSize = '1024x1024' | '1024x1536' | '1536x1024' | 'auto';
export type ImageQuality = 'low' | 'medium' | 'high' | 'auto';

export const IMAGE_SIZES: readonly ImageSize[] = ['1024x1024', '1024x1536', '1536x1024', 'auto'];
export const IMAGE_QUALITIES: readonly ImageQuality[] = ['low', 'medium', 'high', 'auto'];

// Project Types
export type ProjectStatus = 'draft' | 'story_generated' | 'images_generated' | 'completed';

export interface Project {
  id: string;
  name: string;
  story: Story;
  status: ProjectStatus;
  characterProfiles: CharacterProfile[];
  createdAt: string;
  updatedAt: string;
}

export interface ProjectSummary {
  id: string;
  name: string;
  status: ProjectStatus;
  pageCount: number;
  updatedAt: string;
}

// Progress events for long-running generation
export type GenerationStage =
  | 'story_text'
  | 'pagination'
  | 'visual_context'
  | 'page_image'
  | 'saving'
  | 'complete';

export interface GenerationProgress {
  projectId: string;
  stage: GenerationStage;
  message: string;
  pageNumber?: number;
  totalPages?: number;
  isComplete: boolean;
}
