/**
 * Character extraction: finds the cast of a story and expands each character
 * into a visual profile for illustration.
 */

import { z } from 'zod';
import type { Character, CharacterProfile, Page } from '../../../../shared/types/index.js';
import { getSpeciesTable } from '../../config/storyOptions.js';
import { ValidationError } from '../../errors/index.js';
import { parseJsonResponse } from '../../utils/json.js';
import logger from '../../utils/logger.js';
import type { TextGenerator } from '../ai/types.js';

// Models drift from the requested field names; accept the common variants
const ExtractedCharacterSchema = z
  .object({
    name: z.string().optional(),
    character_name: z.string().optional(),
    character: z.string().optional(),
    description: z.string().optional(),
    physical_description: z.string().optional(),
    brief_description: z.string().optional(),
  })
  .transform(raw => ({
    name: (raw.name || raw.character_name || raw.character || '').trim(),
    description: (raw.description || raw.physical_description || raw.brief_description || '').trim(),
  }));

const CharacterListSchema = z.object({
  characters: z.array(ExtractedCharacterSchema),
});

const nullableText = z
  .string()
  .nullish()
  .transform(value => (value && value.trim() ? value.trim() : undefined));

const ProfileSchema = z.object({
  species: nullableText,
  physical_description: nullableText,
  clothing: nullableText,
  distinctive_features: nullableText,
  personality_traits: nullableText,
});

const EXTRACTION_SYSTEM = `You are a character extraction specialist for children's stories.
Identify every character in the story and give a brief visual description of each.

Return valid JSON in this EXACT format:
{
  "characters": [
    { "name": "Character Name", "description": "Brief physical description" }
  ]
}

- Use the exact names from the story, in the order the characters appear
- Focus descriptions on appearance: species, color, size, distinctive features`;

const PROFILE_SYSTEM = `You are a character profile specialist for children's book illustrations.
Create a detailed visual description so the character can be drawn consistently on every page.

Return valid JSON in this exact format:
{
  "species": "The exact species or type",
  "physical_description": "Colors, sizes and proportions",
  "clothing": "What the character wears",
  "distinctive_features": "Unique visual features that make the character recognizable",
  "personality_traits": "Key personality traits that show in their appearance"
}

The species must be specific ("human", "girl", "fox", "dragon"), never a generic word like "character" or "creature".
Always describe clothing (for animals, accessories or "no clothing, natural fur") and at least one distinctive feature.`;

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

/**
 * Find the species keyword that appears earliest in the text, matching whole
 * words only. Returns undefined when no keyword occurs.
 */
export function findSpeciesKeyword(text: string): string | undefined {
  const lower = text.toLowerCase();
  let best: { keyword: string; index: number } | undefined;

  for (const keyword of getSpeciesTable().keywords) {
    const match = new RegExp(`(?<!\\p{L})${keyword}(?!\\p{L})`, 'u').exec(lower);
    if (match && (!best || match.index < best.index)) {
      best = { keyword, index: match.index };
    }
  }
  return best?.keyword;
}

/**
 * Resolve a usable species: the model's answer unless it is missing or
 * generic, then a keyword from the description, then from the name, then
 * "Human".
 */
export function resolveSpecies(species: string | undefined, character: Character): string {
  const generic = new Set(getSpeciesTable().generic);
  const candidate = species?.trim().toLowerCase();
  if (candidate && !generic.has(candidate)) {
    return capitalize(candidate);
  }

  const inferred = findSpeciesKeyword(character.description) ?? findSpeciesKeyword(character.name);
  if (inferred) {
    logger.info('CHARACTERS', `Species for ${character.name} inferred as "${inferred}"`);
    return capitalize(inferred);
  }

  logger.info('CHARACTERS', `Could not determine species for ${character.name}, defaulting to Human`);
  return 'Human';
}

export class CharacterExtractor {
  constructor(private textGenerator: TextGenerator) {}

  async extractCharacters(pages: Page[], signal?: AbortSignal): Promise<Character[]> {
    if (pages.length === 0) {
      throw new ValidationError('Cannot extract characters from an empty story');
    }

    const fullStory = pages.map(page => `Page ${page.pageNumber}: ${page.text}`).join('\n\n');
    const response = await this.textGenerator.generateText(
      `Extract all characters from this story:\n\n${fullStory}\n\nReturn ONLY the JSON object, no other text.`,
      { systemMessage: EXTRACTION_SYSTEM, temperature: 0.3, maxTokens: 2000, signal }
    );

    const parsed = parseJsonResponse(response, CharacterListSchema, 'character extraction');

    // Drop nameless entries and repeated names (case-insensitive)
    const seen = new Set<string>();
    const characters: Character[] = [];
    for (const entry of parsed.characters) {
      const key = entry.name.toLowerCase();
      if (!entry.name || seen.has(key)) continue;
      seen.add(key);
      characters.push({ name: entry.name, description: entry.description || 'No description provided' });
    }

    logger.info('CHARACTERS', `Extracted ${characters.length} characters`, characters.map(c => c.name));
    return characters;
  }

  async createProfile(character: Character, storyContext?: string, signal?: AbortSignal): Promise<CharacterProfile> {
    let prompt = `Create a detailed character profile for illustration:\n\nCharacter Name: ${character.name}\nBasic Description: ${character.description}\n`;
    if (storyContext) {
      prompt += `\nStory Context: ${storyContext}\n`;
    }
    prompt += '\nReturn ONLY the JSON object, no other text.';

    const response = await this.textGenerator.generateText(prompt, {
      systemMessage: PROFILE_SYSTEM,
      temperature: 0.3,
      maxTokens: 1000,
      signal,
    });
    const data = parseJsonResponse(response, ProfileSchema, `profile for ${character.name}`);

    return {
      name: character.name,
      species: resolveSpecies(data.species, character),
      physicalDescription: data.physical_description ?? character.description,
      clothing: data.clothing,
      distinctiveFeatures: data.distinctive_features,
      personalityTraits: data.personality_traits,
    };
  }
}
