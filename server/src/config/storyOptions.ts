import fs from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';

// Data files sit beside this module; `npm run build` copies them into dist.
function readJson<T>(fileName: string, schema: z.ZodType<T>): T {
  const filePath = fileURLToPath(new URL(`./${fileName}`, import.meta.url));
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw new ConfigurationError(`Unable to read ${fileName}: ${error instanceof Error ? error.message : String(error)}`);
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid ${fileName}: ${parsed.error.message}`);
  }
  return parsed.data;
}

const StoryOptionsSchema = z.object({
  parameters: z.object({
    languages: z.array(z.string()),
    complexities: z.array(z.string()),
    vocabularyLevels: z.array(z.string()),
    ageGroups: z.array(z.string()),
    pageCounts: z.array(z.number().int().positive()),
    genres: z.array(z.string()),
    artStyles: z.array(z.string()),
  }),
  defaults: z.object({
    language: z.string(),
    complexity: z.string(),
    vocabularyDiversity: z.string(),
    ageGroup: z.string(),
    numPages: z.number().int().positive(),
    wordsPerPage: z.number().int().positive(),
    genre: z.string().optional(),
    artStyle: z.string().optional(),
  }),
});

const StyleDescriptorSchema = z.object({
  colorPalette: z.string(),
  lightingStyle: z.string(),
  brushTechnique: z.string(),
});

const ArtStylesSchema = z.object({
  fallback: StyleDescriptorSchema,
  styles: z.record(StyleDescriptorSchema),
});

const SpeciesSchema = z.object({
  generic: z.array(z.string()),
  keywords: z.array(z.string()),
});

export type StoryOptions = z.infer<typeof StoryOptionsSchema>;
export type StyleDescriptor = z.infer<typeof StyleDescriptorSchema>;
export type ArtStyleTable = z.infer<typeof ArtStylesSchema>;
export type SpeciesTable = z.infer<typeof SpeciesSchema>;

let storyOptions: StoryOptions | null = null;
let artStyles: ArtStyleTable | null = null;
let species: SpeciesTable | null = null;

export function getStoryOptions(): StoryOptions {
  if (!storyOptions) storyOptions = readJson('story-options.json', StoryOptionsSchema);
  return storyOptions;
}

export function getArtStyles(): ArtStyleTable {
  if (!artStyles) artStyles = readJson('art-styles.json', ArtStylesSchema);
  return artStyles;
}

export function getSpeciesTable(): SpeciesTable {
  if (!species) species = readJson('species.json', SpeciesSchema);
  return species;
}
