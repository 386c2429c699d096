/**
 * Markdown → speakable plain text. The screen keeps the markdown; this is
 * the rendering handed to the speech providers.
 */

export type SpeechSanitizerOptions = {
  /** Longest output; longer text is cut at the last sentence end that fits. */
  maxChars?: number;
  /** Fenced code blocks longer than this (after whitespace collapse) are replaced by a placeholder. */
  codeBlockThreshold?: number;
};

export const DEFAULT_MAX_SPEECH_CHARS = 4800;
export const DEFAULT_CODE_BLOCK_THRESHOLD = 80;
export const CODE_BLOCK_PLACEHOLDER = '(code block omitted)';
export const BULLET_GLYPH = '•';

const FENCE_RE = /^\s{0,3}(`{3,}|~{3,})/;
const HEADING_RE = /^\s{0,3}#{1,6}(?:\s+(.*?))?\s*$/;
const BULLET_RE = /^\s*[-*+]\s+(.*)$/;
const ORDERED_RE = /^\s*(\d{1,3})[.)]\s+(.*)$/;
const RULE_RE = /^\s{0,3}(?:([-*_])(?:\s*\1){2,}|=+)\s*$/;
const TABLE_DIVIDER_RE = /^\s*\|?\s*:?-{2,}:?\s*(?:\|\s*:?-{2,}:?\s*)*\|?\s*$/;
const TABLE_ROW_RE = /^\s*\|(.*)\|\s*$/;
const BLOCKQUOTE_RE = /^(?:\s{0,3}>\s?)+/;

const SHARP_LANGUAGE_RE = /\b([CF])#/g;
const WORD_UNDERSCORE_RE = /(?<=[\p{L}\p{N}])_+(?=[\p{L}\p{N}])/gu;
const RESIDUAL_MARKUP_RE = /[#*`_~|]+/g;
const PICTOGRAPH_RE = /[\p{Extended_Pictographic}\u{FE0F}\u{200D}]/gu;
const WHITESPACE_RE = /\s+/g;

const ENTITIES: Record<string, string> = {
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&#39;': "'",
  '&apos;': "'",
  '&nbsp;': ' ',
};

const collapse = (text: string): string => text.replace(WHITESPACE_RE, ' ').trim();

const endsSentence = (text: string): boolean => /[.!?:;]$/.test(text);

const asSentence = (text: string): string => (endsSentence(text) ? text : `${text}.`);

const stripInline = (text: string): string =>
  text
    .replace(/\\([\\`*_{}[\]()#+\-.!>~|])/g, '$1')
    .replace(/!\[([^\]]*)\]\([^)]*\)/g, '$1')
    .replace(/\[([^\]]+)\]\([^)]*\)/g, '$1')
    .replace(/\[([^\]]+)\]\[[^\]]*\]/g, '$1')
    .replace(/\[\^?\d+(?:,\s*\d+)*\]/g, '')
    .replace(/<((?:https?|mailto):[^>\s]+)>/g, '$1')
    .replace(/<\/?[A-Za-z][^>]*>/g, ' ')
    .replace(/(`+)([^`]+?)\1/g, '$2')
    .replace(/(\*{1,3})(\S(?:.*?\S)?)\1/g, '$2')
    .replace(/(^|[^\w])(_{1,3})(\S(?:.*?\S)?)\2(?=[^\w]|$)/g, '$1$3')
    .replace(/~~(.+?)~~/g, '$1')
    .replace(/&(?:amp|lt|gt|quot|#39|apos|nbsp);/g, (entity) => ENTITIES[entity] ?? ' ')
    .trim();

const renderCodeBlock = (lines: string[], threshold: number): string | null => {
  const content = collapse(lines.join(' '));

  if (!content) {
    return null;
  }

  return content.length > threshold ? CODE_BLOCK_PLACEHOLDER : content;
};

const renderTableRow = (cells: string): string | null => {
  const text = cells
    .split('|')
    .map((cell) => stripInline(cell))
    .filter(Boolean)
    .join(', ');

  return text ? asSentence(text) : null;
};

/** Converts each markdown line (or fenced block) into a speakable unit. */
const toUnits = (markdown: string, threshold: number): string[] => {
  const units: string[] = [];
  const lines = markdown.replace(/\r\n?/g, '\n').split('\n');

  let fence: string | null = null;
  let codeLines: string[] = [];

  const push = (unit: string | null): void => {
    if (unit) {
      units.push(unit);
    }
  };

  for (const rawLine of lines) {
    if (fence !== null) {
      const closing = rawLine.trim();
      if (closing.startsWith(fence) && closing.replace(/[`~]/g, '') === '') {
        push(renderCodeBlock(codeLines, threshold));
        fence = null;
        codeLines = [];
      } else {
        codeLines.push(rawLine);
      }
      continue;
    }

    const fenceMatch = FENCE_RE.exec(rawLine);
    if (fenceMatch) {
      fence = fenceMatch[1];
      continue;
    }

    const line = rawLine.replace(BLOCKQUOTE_RE, '');

    if (!line.trim() || RULE_RE.test(line) || TABLE_DIVIDER_RE.test(line)) {
      continue;
    }

    const heading = HEADING_RE.exec(line);
    if (heading) {
      const text = stripInline((heading[1] ?? '').replace(/\s+#+$/, ''))
        .replace(PICTOGRAPH_RE, '')
        .replace(/[\s:.]+$/, '')
        .trim();
      push(text ? (/[?!]$/.test(text) ? text : `${text}:`) : null);
      continue;
    }

    const bullet = BULLET_RE.exec(line);
    if (bullet) {
      const text = stripInline(bullet[1]);
      push(text ? `${BULLET_GLYPH} ${asSentence(text)}` : null);
      continue;
    }

    const ordered = ORDERED_RE.exec(line);
    if (ordered) {
      const text = stripInline(ordered[2]);
      push(text ? `${ordered[1]}. ${asSentence(text)}` : null);
      continue;
    }

    const tableRow = TABLE_ROW_RE.exec(line);
    if (tableRow) {
      push(renderTableRow(tableRow[1]));
      continue;
    }

    push(stripInline(line));
  }

  // An unclosed fence runs to the end of the document.
  if (fence !== null) {
    push(renderCodeBlock(codeLines, threshold));
  }

  return units;
};

/**
 * Cuts `text` at the last sentence end (`.`, `!` or `?` followed by whitespace or
 * the end of text) within `maxChars`, else at the last word boundary. No ellipsis.
 */
export const truncateAtSentence = (text: string, maxChars: number): string => {
  if (text.length <= maxChars) {
    return text;
  }

  let cut = -1;

  for (const match of text.matchAll(/[.!?]+(?=\s|$)/g)) {
    const end = (match.index ?? 0) + match[0].length;
    if (end > maxChars) {
      break;
    }
    cut = end;
  }

  if (cut > 0) {
    return text.slice(0, cut).trimEnd();
  }

  const space = text.slice(0, maxChars + 1).lastIndexOf(' ');

  return space > 0 ? text.slice(0, space).trimEnd() : text.slice(0, maxChars);
};

export const normalizeForSpeech = (markdown: string, options: SpeechSanitizerOptions = {}): string => {
  const { maxChars = DEFAULT_MAX_SPEECH_CHARS, codeBlockThreshold = DEFAULT_CODE_BLOCK_THRESHOLD } = options;

  if (!markdown || !markdown.trim()) {
    return '';
  }

  const text = collapse(
    toUnits(markdown, codeBlockThreshold)
      .join(' ')
      .replace(PICTOGRAPH_RE, '')
      .replace(SHARP_LANGUAGE_RE, '$1 sharp')
      .replace(WORD_UNDERSCORE_RE, ' ')
      .replace(RESIDUAL_MARKUP_RE, ''),
  );

  return truncateAtSentence(text, maxChars);
};

/**
 * Last-resort rendering when markdown conversion fails: keeps letters, digits,
 * basic punctuation and single spaces.
 */
export const stripToAlphanumeric = (text: string, maxChars: number = DEFAULT_MAX_SPEECH_CHARS): string =>
  truncateAtSentence(collapse(text.replace(/[^\p{L}\p{N}.,!?\s-]+/gu, ' ')), maxChars);

/** Rough narration length at ~150 spoken words per minute. */
export const estimateSpeechSeconds = (text: string): number => {
  const words = text.split(WHITESPACE_RE).filter(Boolean).length;
  return Math.round((words / 150) * 60 * 10) / 10;
};
