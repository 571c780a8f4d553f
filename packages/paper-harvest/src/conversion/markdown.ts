export interface MarkdownPostProcessOptions {
  fixEquations?: boolean;
  fixTables?: boolean;
  fixHeadings?: boolean;
  addToc?: boolean;
  tocTitle?: string;
}

const DISPLAY_MATH = /\$\$\s*([\s\S]+?)\s*\$\$/g;
const INLINE_MATH = /(?<!\$)\$(?!\$)[ \t]*([^$\n]+?)[ \t]*\$(?!\$)/g;
const HEADING = /^(#{1,6})[ \t]*(\S.*)$/;

const isTableRow = (line: string): boolean => line.trimStart().startsWith('|');

const fixEquations = (content: string): string =>
  content
    .replace(DISPLAY_MATH, (_match, body: string) => `\n$$\n${body}\n$$\n`)
    .replace(INLINE_MATH, (_match, body: string) => `$${body}$`);

const padTables = (lines: string[]): string[] => {
  const result: string[] = [];
  for (const line of lines) {
    const previous = result.at(-1);
    if (previous !== undefined && previous.trim().length > 0 && line.trim().length > 0) {
      if (isTableRow(line) !== isTableRow(previous)) {
        result.push('');
      }
    }
    result.push(line);
  }
  return result;
};

const normalizeHeadings = (lines: string[]): string[] => {
  const result: string[] = [];
  for (const line of lines) {
    const match = line.match(HEADING);
    if (!match) {
      result.push(line);
      continue;
    }

    const previous = result.at(-1);
    if (previous !== undefined && previous.trim().length > 0) {
      result.push('');
    }
    result.push(`${match[1] ?? '#'} ${(match[2] ?? '').trim()}`);
  }
  return result;
};

export const headingAnchor = (title: string): string =>
  title
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s-]/gu, '')
    .trim()
    .replace(/\s+/g, '-');

const buildToc = (lines: string[], title: string): string[] => {
  const entries = lines.flatMap((line) => {
    const match = line.match(/^(#{1,6}) (.+)$/);
    if (!match?.[1] || !match[2]) {
      return [];
    }
    const indent = '  '.repeat(match[1].length - 1);
    return [`${indent}- [${match[2]}](#${headingAnchor(match[2])})`];
  });

  return entries.length === 0 ? [] : [`# ${title}`, '', ...entries, '', '---', ''];
};

/**
 * Tidies converter output: display math on its own lines, inline math without inner padding, a blank
 * line around tables and before headings, one space after heading markers, optional table of contents.
 */
export const postProcessMarkdown = (content: string, options: MarkdownPostProcessOptions = {}): string => {
  const {
    fixEquations: equations = true,
    fixTables: tables = true,
    fixHeadings: headings = true,
    addToc = false,
    tocTitle = 'Contents'
  } = options;

  let text = content.replace(/\r\n/g, '\n');
  if (equations) {
    text = fixEquations(text);
  }

  let lines = text.split('\n');
  if (tables) {
    lines = padTables(lines);
  }
  if (headings) {
    lines = normalizeHeadings(lines);
  }
  if (addToc) {
    lines = [...buildToc(lines, tocTitle), ...lines];
  }

  return `${lines
    .join('\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim()}\n`;
};
