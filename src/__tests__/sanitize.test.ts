import { describe, expect, it } from 'vitest';

import {
  CODE_BLOCK_PLACEHOLDER,
  estimateSpeechSeconds,
  normalizeForSpeech,
  stripToAlphanumeric,
  truncateAtSentence,
} from '../speech/sanitize';

const MARKDOWN_SAMPLES = [
  '# Title\n* item *with* stars\n**unclosed bold\n```\ncode # with hash\n',
  '## 📊 RESUME ANALYSIS REPORT\n\n### Strengths\n- **Python**: 5 years\n- ***Go*** and `Rust`\n\n> quoted *text*\n\n---\n',
  '| Skill | Level |\n|---|---|\n| **SQL** | Expert |\n\n1. First\n2. Second',
  'Text with a stray * asterisk, a # hash and ```inline fences``` here.',
  '```ts\nconst x = 1;\n```\n```\nunclosed',
];

describe('normalizeForSpeech', () => {
  it('turns headings and bullets into spoken units', () => {
    const markdown = '## **Strengths**\n- Strong **Python** background\n- Built `ETL` pipelines.';

    expect(normalizeForSpeech(markdown)).toBe('Strengths: • Strong Python background. • Built ETL pipelines.');
  });

  it.each(MARKDOWN_SAMPLES)('leaves no markdown markers in %j', (markdown) => {
    const spoken = normalizeForSpeech(markdown);

    expect(spoken).not.toMatch(/[#*]/);
    expect(spoken).not.toContain('```');
  });

  it('inlines short code blocks', () => {
    expect(normalizeForSpeech("Here is code:\n```python\nprint('hello')\n```\nEnd.")).toBe(
      "Here is code: print('hello') End.",
    );
  });

  it('replaces long code blocks with a placeholder', () => {
    const markdown = [
      'Example:',
      '```js',
      'const value = computeSomethingVeryLong(alpha, beta, gamma, delta, epsilon, zeta, eta);',
      '```',
      'Done.',
    ].join('\n');

    expect(normalizeForSpeech(markdown)).toBe(`Example: ${CODE_BLOCK_PLACEHOLDER} Done.`);
  });

  it('keeps link text and decodes entities', () => {
    expect(normalizeForSpeech('See [the docs](https://example.com) and <b>bold</b> &amp; more')).toBe(
      'See the docs and bold & more',
    );
  });

  it('reads table rows as comma separated sentences', () => {
    expect(normalizeForSpeech('| Skill | Level |\n|---|---|\n| Go | Expert |')).toBe('Skill, Level. Go, Expert.');
  });

  it('numbers ordered list items', () => {
    expect(normalizeForSpeech('1. First step\n2) Second step!')).toBe('1. First step. 2. Second step!');
  });

  it('drops emoji', () => {
    expect(normalizeForSpeech('## 📊 Report\nGreat job 🎉')).toBe('Report: Great job');
  });

  it('is the identity on plain text and idempotent', () => {
    const plain = 'Plain text without any markup. It has two sentences.';

    expect(normalizeForSpeech(plain)).toBe(plain);
    expect(normalizeForSpeech(normalizeForSpeech(plain))).toBe(plain);
  });

  it('cuts long output at a sentence end', () => {
    expect(normalizeForSpeech('First sentence here. Second sentence is longer.', { maxChars: 25 })).toBe(
      'First sentence here.',
    );
  });

  it('returns an empty string for blank input', () => {
    expect(normalizeForSpeech('  \n\n ')).toBe('');
  });

  it('speaks C# and F# and splits snake_case identifiers', () => {
    expect(normalizeForSpeech('Use snake_case_names and C# or F# daily.')).toBe(
      'Use snake case names and C sharp or F sharp daily.',
    );
  });

  it('does not add a colon after headings that end in a question or exclamation', () => {
    expect(normalizeForSpeech('### Question 1: How would you scale it?\n- Talk about sharding.')).toBe(
      'Question 1: How would you scale it? • Talk about sharding.',
    );
    expect(normalizeForSpeech('## Great work!\nKeep going.')).toBe('Great work! Keep going.');
  });
});

describe('truncateAtSentence', () => {
  it('keeps text that already fits', () => {
    expect(truncateAtSentence('Short.', 10)).toBe('Short.');
  });

  it('cuts at the last sentence end within the limit', () => {
    expect(truncateAtSentence('One two. Three four. Five six.', 20)).toBe('One two. Three four.');
  });

  it('falls back to the last word boundary', () => {
    expect(truncateAtSentence('alpha beta gamma', 12)).toBe('alpha beta');
  });
});

describe('stripToAlphanumeric', () => {
  it('keeps letters, digits and basic punctuation', () => {
    expect(stripToAlphanumeric('**Score:** 85% 🎉')).toBe('Score 85');
  });
});

describe('estimateSpeechSeconds', () => {
  it('assumes 150 words per minute', () => {
    expect(estimateSpeechSeconds(Array.from({ length: 75 }, () => 'word').join(' '))).toBe(30);
  });
});
