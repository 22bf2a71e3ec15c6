/**
 * Sentence-boundary paginator.
 *
 * Splits continuous narrative into pages without ever breaking a sentence,
 * balancing word counts greedily and re-balancing after every page so that
 * uneven sentence lengths are spread forward instead of piling onto the last
 * page.
 */

import type { Page } from '../../../../shared/types/index.js';
import logger from '../../utils/logger.js';

// Oversized-page valve: close early rather than exceed this multiple of ideal
const SAFETY_VALVE = 1.5;
// Allowed deviation of total words from numPages x wordsPerPage
const WORD_TOLERANCE = 0.5;

const PAGE_MARKER = /^[ \t]*[#*_]*[ \t]*(?:page|p[aá]gina)[ \t]+\d+[ \t]*[:.\-–][ \t]*[*_]*[ \t]*/gim;
const SENTENCE = /[^.!?]*[.!?]+["'”’)\]]*|[^.!?]+$/g;
const WORDLIKE = /[\p{L}\p{N}]/u;

export function countWords(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

/**
 * Remove "Page N:" style markers the generator may emit despite instructions,
 * trim each line and drop runs of blank lines.
 */
export function normalizeStoryText(text: string): string {
  return text
    .replace(PAGE_MARKER, '')
    .split('\n')
    .map(line => line.trim())
    .join('\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

function collapse(parts: string[]): string[] {
  return parts.map(part => part.replace(/\s+/g, ' ').trim()).filter(Boolean);
}

// Matches with no letters or digits ("...", "?!") attach to the next sentence,
// or to the previous one at the end of the text
function joinPunctuationRuns(matches: string[]): string[] {
  const units: string[] = [];
  let pending = '';
  for (const match of matches) {
    if (!WORDLIKE.test(match)) {
      pending += match;
      continue;
    }
    units.push((pending + match).trim());
    pending = '';
  }

  if (pending.trim()) {
    if (units.length > 0) {
      units[units.length - 1] = (units[units.length - 1] + pending).trim();
    } else {
      units.push(pending.trim());
    }
  }
  return units.filter(Boolean);
}

/**
 * Split into sentence-like units. Text with no sentence punctuation falls back
 * to paragraphs, then lines, then the whole text as one unit.
 */
export function splitIntoUnits(text: string): string[] {
  if (!text.trim()) return [];

  if (/[.!?]/.test(text)) {
    const flat = text.replace(/\s+/g, ' ');
    return joinPunctuationRuns(flat.match(SENTENCE) || []);
  }

  const paragraphs = collapse(text.split(/\n\s*\n/));
  if (paragraphs.length > 1) return paragraphs;

  const lines = collapse(text.split('\n'));
  if (lines.length > 1) return lines;

  return collapse([text]);
}

/**
 * Paginate narrative text into at most targetPageCount pages.
 *
 * Returns fewer pages than requested only when there are fewer sentences than
 * pages. Empty input returns no pages.
 */
export function paginate(text: string, targetPageCount: number, targetWordsPerPage: number): Page[] {
  const pageCount = Math.max(1, Math.floor(targetPageCount));
  const units = splitIntoUnits(normalizeStoryText(text));
  if (units.length === 0) return [];

  const unitWords = units.map(countWords);
  const totalWords = unitWords.reduce((sum, words) => sum + words, 0);

  const expected = pageCount * targetWordsPerPage;
  if (targetWordsPerPage > 0 && Math.abs(totalWords - expected) > expected * WORD_TOLERANCE) {
    logger.warn('PAGINATOR', `Story has ${totalWords} words, expected about ${expected} (${pageCount} x ${targetWordsPerPage})`);
  }

  const pages: Page[] = [];
  let current: string[] = [];
  let currentWords = 0;
  let remainingWords = totalWords;
  let ideal = Math.max(1, Math.floor(totalWords / pageCount));

  const closePage = () => {
    pages.push({ pageNumber: pages.length + 1, text: current.join(' ') });
    remainingWords -= currentWords;
    current = [];
    currentWords = 0;
    // Slots left after this page, including the one about to be filled
    const slotsLeft = pageCount - pages.length;
    ideal = Math.max(1, Math.floor(remainingWords / slotsLeft));
  };

  for (let i = 0; i < units.length; i++) {
    const words = unitWords[i];
    const slotsAfterCurrent = pageCount - pages.length - 1;

    if (current.length > 0 && slotsAfterCurrent > 0 && currentWords + words > ideal * SAFETY_VALVE) {
      closePage();
    }

    current.push(units[i]);
    currentWords += words;

    const unitsLeft = units.length - i - 1;
    const slotsLeft = pageCount - pages.length - 1;
    if (slotsLeft > 0 && unitsLeft > 0 && (currentWords >= ideal || unitsLeft <= slotsLeft)) {
      closePage();
    }
  }

  if (current.length > 0) {
    pages.push({ pageNumber: pages.length + 1, text: current.join(' ') });
  }

  logger.debug('PAGINATOR', `Paginated ${units.length} units (${totalWords} words) into ${pages.length}/${pageCount} pages`);
  return pages;
}
