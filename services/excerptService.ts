export const DEFAULT_EXCERPT_LIMIT = 500;

const SINGLE_LINE_WRAP_THRESHOLD = 140;
const WRAP_WIDTH = 120;

const BULLET_GLYPH_REGEX = /[•·‣‧▪●]/g;
const DASH_CLAUSE_REGEX = /\s+-\s+/g;
const SENTENCE_BOUNDARY_REGEX = /(?<=[.!?])\s+/;

const truncateAtWord = (raw: string, limit: number): string => {
  const snippet = raw.slice(0, limit);
  if (raw.length <= limit) return snippet;

  const cut = snippet.lastIndexOf(' ');
  return cut > 0 ? `${snippet.slice(0, cut)}...` : `${snippet}...`;
};

const splitSentences = (line: string): string[] => {
  const parts = line
    .split(SENTENCE_BOUNDARY_REGEX)
    .map(part => part.trim())
    .filter(Boolean);
  return parts.length > 0 ? parts : [line];
};

const hardWrap = (value: string): string[] => {
  const chunks: string[] = [];
  let line = value;

  while (line) {
    if (line.length <= WRAP_WIDTH) {
      chunks.push(line);
      break;
    }
    let cut = line.lastIndexOf(' ', WRAP_WIDTH);
    if (cut <= 0) cut = WRAP_WIDTH;
    chunks.push(line.slice(0, cut).trim());
    line = line.slice(cut).trim();
  }

  return chunks;
};

/**
 * Turns an arbitrary text blob into a short bulleted preview for display.
 * Never used as model input.
 */
export const excerptBullets = (text: string, limit = DEFAULT_EXCERPT_LIMIT): string => {
  const raw = text.trim();
  if (!raw) return '- [empty]';

  const snippet = truncateAtWord(raw, limit)
    .replace(BULLET_GLYPH_REGEX, '\n')
    .replace(DASH_CLAUSE_REGEX, '\n');

  const lines = snippet
    .split(/\r\n|\r|\n/)
    .map(line => line.trim())
    .filter(Boolean);

  let fragments = (lines.length > 0 ? lines : [snippet]).flatMap(splitSentences);

  if (fragments.length === 1 && fragments[0].length > SINGLE_LINE_WRAP_THRESHOLD) {
    fragments = hardWrap(fragments[0]);
  }

  return fragments.map(fragment => `- ${fragment}`).join('\n');
};
