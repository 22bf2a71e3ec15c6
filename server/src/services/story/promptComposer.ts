/**
 * Prompt builders for story text, scene summaries and image turns.
 *
 * Everything here is pure: no network, no clock. Image prompts are assembled
 * from sections and then fitted to a hard character budget.
 */

import type {
  ArtBible,
  CharacterProfile,
  CharacterReference,
  StoryMetadata,
} from '../../../../shared/types/index.js';
import { config } from '../../config/index.js';
import { getArtStyles } from '../../config/storyOptions.js';

// Per-field character budgets inside an image prompt
const FIELD_LIMITS = {
  style: 80,
  physical: 120,
  detail: 60,
  scene: 300,
} as const;

const MAX_PROMPT_CHARACTERS = 2;
const MAX_SUMMARY_CHARACTERS = 3;

const LONG_SUFFIX =
  'Keep the art style, colors and character designs exactly consistent with the art bible and character reference sheets established earlier in this conversation.';
const SHORT_SUFFIX = "Vibrant colors, child-friendly, professional children's book illustration style.";

/**
 * Cut text to at most max characters at the last space before the limit.
 * A single word longer than the limit is cut at the limit.
 */
export function smartTruncate(text: string, max: number): string {
  if (!text || text.length <= max) return text;
  if (max <= 0) return '';

  const truncated = text.slice(0, max);
  const lastSpace = truncated.lastIndexOf(' ');
  return (lastSpace > 0 ? truncated.slice(0, lastSpace) : truncated).trimEnd();
}

/**
 * Build a prompt around a scene and fit it to the budget: shrink the scene by
 * the overflow first, then hard-cut the whole prompt at a word boundary.
 */
function fitToBudget(build: (scene: string) => string, scene: string, maxLength: number): string {
  let prompt = build(scene);
  if (prompt.length <= maxLength) return prompt;

  const overflow = prompt.length - maxLength;
  prompt = build(smartTruncate(scene, Math.max(0, scene.length - overflow)));
  if (prompt.length <= maxLength) return prompt;

  return `${smartTruncate(prompt, Math.max(0, maxLength - 3))}...`;
}

function describeStyle(artStyle: string, artBible?: ArtBible): string {
  const parts = [`A ${artStyle} style children's book illustration.`];
  if (!artBible) return parts.join(' ');

  const fields: Array<[string, string | undefined]> = [
    ['Color palette', artBible.colorPalette],
    ['Lighting', artBible.lightingStyle],
    ['Brush technique', artBible.brushTechnique],
    ['Style notes', artBible.styleNotes],
  ];
  for (const [label, value] of fields) {
    if (value) parts.push(`${label}: ${smartTruncate(value, FIELD_LIMITS.style)}.`);
  }
  return parts.join(' ');
}

function describeCharacter(profile: CharacterProfile, hasReference: boolean): string {
  const details = [
    `a ${profile.species}`,
    smartTruncate(profile.physicalDescription, FIELD_LIMITS.physical),
  ];
  for (const value of [profile.distinctiveFeatures, profile.clothing, profile.personalityTraits]) {
    if (value) details.push(smartTruncate(value, FIELD_LIMITS.detail));
  }

  let block = `${profile.name} (${details.join(', ')})`;
  if (hasReference) {
    block += `, who must look exactly like the ${profile.name} character reference sheet`;
  }
  return block;
}

function describeCharacters(profiles: CharacterProfile[], references: CharacterReference[]): string {
  const referenced = new Set(references.map(reference => reference.characterName.toLowerCase()));
  const blocks = profiles
    .filter(profile => profile.species && profile.physicalDescription)
    .slice(0, MAX_PROMPT_CHARACTERS)
    .map(profile => describeCharacter(profile, referenced.has(profile.name.toLowerCase())));

  return blocks.length > 0 ? `Characters: ${blocks.join(' and ')}.` : '';
}

/**
 * Compose a self-contained page illustration prompt with style, character and
 * scene sections. The result never exceeds maxLength characters.
 */
export function composeImagePrompt(
  sceneSummary: string,
  characterProfiles: CharacterProfile[],
  artStyle: string,
  artBible?: ArtBible,
  characterReferences: CharacterReference[] = [],
  maxLength: number = config.prompts.maxImagePromptLength
): string {
  const style = describeStyle(artStyle, artBible);
  const characters = describeCharacters(characterProfiles, characterReferences);
  const suffix = artBible || characterReferences.length > 0 ? LONG_SUFFIX : SHORT_SUFFIX;

  const build = (scene: string) =>
    [style, characters, scene ? `Scene: ${scene}` : '', suffix].filter(Boolean).join(' ');

  return fitToBudget(build, smartTruncate(sceneSummary.trim(), FIELD_LIMITS.scene), maxLength);
}

/**
 * Compose a page prompt for a turn inside an established image conversation.
 * Style and characters are already in the conversation, so only the scene and
 * the art style are restated.
 */
export function composeConversationPrompt(
  sceneSummary: string,
  artStyle: string,
  maxLength: number = config.prompts.maxImagePromptLength
): string {
  const build = (scene: string) =>
    [
      `Create the next page illustration in the same ${artStyle} style, using the art bible and character designs from earlier in this conversation.`,
      scene ? `Scene: ${scene}` : '',
    ]
      .filter(Boolean)
      .join(' ');

  return fitToBudget(build, smartTruncate(sceneSummary.trim(), FIELD_LIMITS.scene), maxLength);
}

export function buildStoryPrompt(metadata: StoryMetadata, theme?: string, customPrompt?: string): string {
  const totalWords = metadata.numPages * metadata.wordsPerPage;
  const idea = customPrompt || metadata.userPrompt;

  const lines = [
    `Write a ${metadata.complexity} children's story in ${metadata.language} for ages ${metadata.ageGroup}.`,
    `Title: ${metadata.title}.`,
    `The story will be split into ${metadata.numPages} illustrated pages of about ${metadata.wordsPerPage} words each, so write about ${totalWords} words in total.`,
  ];
  if (metadata.genre) lines.push(`Genre: ${metadata.genre}.`);
  if (theme) lines.push(`Theme: ${theme}.`);
  if (idea) lines.push(`Story idea: ${idea}.`);
  lines.push(
    `Use ${metadata.vocabularyDiversity} vocabulary appropriate for the ${metadata.ageGroup} age group.`,
    '',
    'Write the story as continuous prose in short, complete sentences. Do not add page numbers, headings or a title line.',
    'Every scene should be easy to picture, and the story must have a clear beginning, middle and ending.'
  );
  return lines.join('\n');
}

/**
 * First message of an image conversation. It fixes the art style for every
 * later turn in the chain.
 */
export function buildSessionSystemPrompt(artStyle: string, title?: string): string {
  const lines = [
    "You are an expert children's book illustrator creating illustrations for a story.",
    '',
    `Art Style: ${artStyle}`,
  ];
  if (title) lines.push(`Story: ${title}`);
  lines.push(
    '',
    'IMPORTANT GUIDELINES:',
    '- All images must keep the same visual style throughout the story',
    '- Characters must look EXACTLY the same in every illustration',
    '- When I refer to "the art bible" or "the character reference sheets", use them exactly as designed',
    '',
    'I will ask you for an art bible, then character reference sheets, then page illustrations.',
    "Respond briefly to acknowledge you're ready, then wait for my requests."
  );
  return lines.join('\n');
}

export interface ArtBibleInput {
  artStyle: string;
  genre?: string;
  storyTitle?: string;
  additionalNotes?: string;
}

export function createArtBible(input: ArtBibleInput): ArtBible {
  const table = getArtStyles();
  const descriptor = table.styles[input.artStyle.toLowerCase()] ?? table.fallback;

  const subject = [
    `Create an art bible reference sheet for a ${input.genre ? `${input.genre} ` : ''}children's book`,
    input.storyTitle ? ` titled "${input.storyTitle}"` : '',
    ` in ${input.artStyle} style.`,
  ].join('');

  const lines = [
    subject,
    'Show a small sample scene plus swatches that define the look of every illustration.',
    `Color palette: ${descriptor.colorPalette}.`,
    `Lighting: ${descriptor.lightingStyle}.`,
    `Brush technique: ${descriptor.brushTechnique}.`,
  ];
  if (input.additionalNotes) lines.push(`Additional notes: ${input.additionalNotes}.`);

  return {
    prompt: lines.join(' '),
    artStyle: input.artStyle,
    styleNotes: input.additionalNotes,
    colorPalette: descriptor.colorPalette,
    lightingStyle: descriptor.lightingStyle,
    brushTechnique: descriptor.brushTechnique,
  };
}

export function createCharacterReference(
  profile: CharacterProfile,
  artStyle: string,
  includeTurnaround = true
): CharacterReference {
  const lines = includeTurnaround
    ? [
        `Character reference sheet for ${profile.name}, a ${profile.species}, in ${artStyle} style.`,
        'Show front, side and back views side by side on a plain white background.',
      ]
    : [
        `Character portrait of ${profile.name}, a ${profile.species}, in ${artStyle} style.`,
        'Full body, neutral pose, plain white background.',
      ];

  lines.push(`Physical description: ${profile.physicalDescription}.`);
  if (profile.distinctiveFeatures) lines.push(`Distinctive features: ${profile.distinctiveFeatures}.`);
  if (profile.clothing) lines.push(`Clothing: ${profile.clothing}.`);
  lines.push('Keep proportions and colors identical in every view; this design is used for every page.');

  return {
    characterName: profile.name,
    prompt: lines.join(' '),
    species: profile.species,
    physicalDescription: profile.physicalDescription,
    clothing: profile.clothing,
    distinctiveFeatures: profile.distinctiveFeatures,
  };
}

export interface SceneSummaryRequest {
  systemMessage: string;
  prompt: string;
}

const SCENE_SUMMARY_SYSTEM = `You are an expert at analyzing children's story text and identifying the main visual scene to illustrate.
Extract the KEY VISUAL MOMENT of the page: the main action, where the characters are and what they do, the setting and the emotional tone.

Use ONLY the character information provided and refer to characters by their exact names and species.
Do not add details that are not in the story text. Ignore narrative commentary, inner thoughts and abstract ideas that cannot be drawn.

Return ONLY a concise scene description (30-50 words) that an illustrator could draw.`;

export function buildSceneSummaryRequest(sceneText: string, profiles: CharacterProfile[] = []): SceneSummaryRequest {
  const named = profiles.slice(0, MAX_SUMMARY_CHARACTERS).map(profile => `${profile.name} (a ${profile.species})`);
  const context = named.length > 0 ? `\n\nMain characters in this story: ${named.join(', ')}` : '';

  return {
    systemMessage: SCENE_SUMMARY_SYSTEM,
    prompt: `Analyze this children's story page and describe the main scene to illustrate:${context}\n\nStory page text:\n${sceneText}\n\nReturn only the scene description, nothing else.`,
  };
}
