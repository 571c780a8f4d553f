import { describe, expect, it } from 'vitest';
import { pageToMarkdown } from '../src/conversion/backends/text-backend.js';
import { headingAnchor, postProcessMarkdown } from '../src/conversion/markdown.js';

describe('postProcessMarkdown', () => {
  it('puts a blank line before headings and a space after the marker', () => {
    expect(postProcessMarkdown('Intro\n#Title\ntext')).toBe('Intro\n\n# Title\ntext\n');
  });

  it('separates tables from surrounding text', () => {
    expect(postProcessMarkdown('Before\n| a | b |\n| - | - |\nAfter')).toBe(
      'Before\n\n| a | b |\n| - | - |\n\nAfter\n'
    );
  });

  it('moves display math onto its own lines and trims inline math', () => {
    expect(postProcessMarkdown('see $ x^2 $ and $$a+b$$ end')).toBe('see $x^2$ and \n$$\na+b\n$$\n end\n');
  });

  it('normalizes line endings and collapses blank runs', () => {
    expect(postProcessMarkdown('one\r\n\r\n\r\n\r\ntwo\r\n')).toBe('one\n\ntwo\n');
  });

  it('prepends a table of contents on request', () => {
    expect(postProcessMarkdown('# Intro\ntext\n## Data Sets', { addToc: true })).toBe(
      '# Contents\n\n- [Intro](#intro)\n  - [Data Sets](#data-sets)\n\n---\n\n# Intro\ntext\n\n## Data Sets\n'
    );
  });

  it('leaves the text alone when every fix is off', () => {
    expect(
      postProcessMarkdown('a\n#b\n| c |', { fixEquations: false, fixTables: false, fixHeadings: false })
    ).toBe('a\n#b\n| c |\n');
  });
});

describe('headingAnchor', () => {
  it('drops punctuation and hyphenates spaces', () => {
    expect(headingAnchor('Results & Discussion')).toBe('results-discussion');
    expect(headingAnchor('2.1 实验设置')).toBe('21-实验设置');
  });
});

describe('pageToMarkdown', () => {
  it('detects numbered and named headings and joins wrapped lines', () => {
    const text = ['1 Introduction', 'Deep learning has', 'changed vision.', '', '2.1 Data sets', 'We use two sets.', 'Abstract'].join(
      '\n'
    );

    expect(pageToMarkdown(text)).toBe(
      [
        '## 1 Introduction',
        'Deep learning has changed vision.',
        '### 2.1 Data sets',
        'We use two sets.',
        '## Abstract'
      ].join('\n\n')
    );
  });

  it('recognizes chapter and roman numeral headings', () => {
    expect(pageToMarkdown('第一章 绪论\nIII. Results\n2.1.3.4 Deep level')).toBe(
      '## 第一章 绪论\n\n## III. Results\n\n#### 2.1.3.4 Deep level'
    );
  });

  it('keeps sentences and years as paragraph text', () => {
    expect(pageToMarkdown('1 This item ends with a period.\n2019年发表的研究')).toBe(
      '1 This item ends with a period. 2019年发表的研究'
    );
  });
});
