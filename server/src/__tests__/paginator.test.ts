import { describe, it, expect } from 'vitest';
import { countWords, normalizeStoryText, paginate, splitIntoUnits } from '../services/story/paginator.js';

describe('paginate', () => {
  it('splits three short sentences into three one-sentence pages', () => {
    const pages = paginate('Sir Cedric ran. He found a sword. He won the day.', 3, 4);

    expect(pages).toEqual([
      { pageNumber: 1, text: 'Sir Cedric ran.' },
      { pageNumber: 2, text: 'He found a sword.' },
      { pageNumber: 3, text: 'He won the day.' },
    ]);
  });

  it('numbers pages contiguously and keeps every sentence in order', () => {
    const sentences = [
      'Mia found a map in the attic.',
      'It showed an island shaped like a turtle.',
      'She packed a lantern and some bread.',
      'Her brother Leo wanted to come too.',
      'They rowed all morning across the bay.',
      'Gulls followed the little boat.',
      'The island was quiet and green.',
      'Under a palm tree they found a chest.',
      'Inside were old letters from their grandmother.',
      'They read them together on the sand.',
    ];

    const pages = paginate(sentences.join(' '), 4, 15);

    expect(pages.map(page => page.pageNumber)).toEqual([1, 2, 3, 4]);
    expect(pages.map(page => page.text).join(' ')).toBe(sentences.join(' '));
    for (const page of pages) {
      expect(page.text.length).toBeGreaterThan(0);
    }
  });

  it('returns one page per sentence when there are fewer sentences than pages', () => {
    const pages = paginate('One. Two.', 5, 10);

    expect(pages).toEqual([
      { pageNumber: 1, text: 'One.' },
      { pageNumber: 2, text: 'Two.' },
    ]);
  });

  it('closes a page early rather than letting one long sentence overfill it', () => {
    const text = 'Tom ran. Sue hid. The big old dog barked at the moon all night. Then quiet.';

    const pages = paginate(text, 2, 8);

    expect(pages.map(page => page.text)).toEqual([
      'Tom ran. Sue hid.',
      'The big old dog barked at the moon all night. Then quiet.',
    ]);
  });

  it('strips page markers the model added', () => {
    const pages = paginate('Page 1: The cat sat.\n**Page 2:** The dog ran.', 2, 3);

    expect(pages.map(page => page.text)).toEqual(['The cat sat.', 'The dog ran.']);
  });

  it('falls back to paragraphs when the text has no sentence punctuation', () => {
    const pages = paginate('the cat sat\n\nthe dog ran\n\nthe end', 3, 3);

    expect(pages.map(page => page.text)).toEqual(['the cat sat', 'the dog ran', 'the end']);
  });

  it('returns the whole text as a single page when nothing can be split', () => {
    expect(paginate('just some words', 3, 5)).toEqual([{ pageNumber: 1, text: 'just some words' }]);
  });

  it('keeps leading punctuation with the first sentence', () => {
    const pages = paginate('...Once upon a time there was a fox. The end.', 2, 5);

    expect(pages).toEqual([
      { pageNumber: 1, text: '...Once upon a time there was a fox.' },
      { pageNumber: 2, text: 'The end.' },
    ]);
  });

  it('returns a page for text made only of punctuation', () => {
    expect(paginate('?!', 3, 10)).toEqual([{ pageNumber: 1, text: '?!' }]);
  });

  it('returns no pages for empty or whitespace-only text', () => {
    expect(paginate('', 3, 10)).toEqual([]);
    expect(paginate('  \n\n  ', 3, 10)).toEqual([]);
  });
});

describe('splitIntoUnits', () => {
  it('keeps closing quotes with their sentence', () => {
    expect(splitIntoUnits('She said "Hi!" Then left.')).toEqual(['She said "Hi!"', 'Then left.']);
  });

  it('keeps trailing text without terminal punctuation as its own unit', () => {
    expect(splitIntoUnits('The end came. And then')).toEqual(['The end came.', 'And then']);
  });

  it('attaches a trailing run of punctuation to the last sentence', () => {
    expect(splitIntoUnits('The end. !!')).toEqual(['The end. !!']);
  });

  it('falls back to lines when there is a single paragraph', () => {
    expect(splitIntoUnits('first line\nsecond line')).toEqual(['first line', 'second line']);
  });
});

describe('normalizeStoryText', () => {
  it('removes Spanish page markers and trims lines', () => {
    expect(normalizeStoryText('  Página 3: Hola amigo.  \n## Page 4. Adiós.')).toBe('Hola amigo.\nAdiós.');
  });
});

describe('countWords', () => {
  it('counts whitespace-separated words', () => {
    expect(countWords('  one two\nthree  ')).toBe(3);
    expect(countWords('')).toBe(0);
  });
});
