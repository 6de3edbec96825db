// Minimal markup helpers. Upstream pages are scraped with regexes rather than
// a DOM.

const ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
};

export function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (entity, code: string) => {
    if (code.startsWith('#x') || code.startsWith('#X')) {
      return String.fromCodePoint(parseInt(code.slice(2), 16));
    }
    if (code.startsWith('#')) {
      return String.fromCodePoint(parseInt(code.slice(1), 10));
    }
    return ENTITIES[code.toLowerCase()] ?? entity;
  });
}

export function stripTags(markup: string): string {
  return decodeEntities(markup.replace(/<[^>]*>/g, ' '))
    .replace(/\s+/g, ' ')
    .trim();
}

/** Value of an attribute inside a single start tag, e.g. `<img src="x">`. */
export function getAttribute(tag: string, name: string): string | null {
  const match = new RegExp(`\\s${name}\\s*=\\s*("([^"]*)"|'([^']*)'|([^\\s>]+))`, 'i').exec(tag);
  if (!match) return null;
  return decodeEntities(match[2] ?? match[3] ?? match[4] ?? '');
}

export interface ElementMatch {
  tagName: string;
  openTag: string;
  inner: string;
  start: number;
  end: number;
}

/**
 * First element carrying `className`, with its inner markup up to the first
 * matching close tag. Same-name nesting inside the element is not supported.
 */
export function findElementByClass(markup: string, className: string): ElementMatch | null {
  const openPattern = /<([a-z][a-z0-9]*)\b[^>]*>/gi;
  let match: RegExpExecArray | null;
  while ((match = openPattern.exec(markup)) !== null) {
    const classes = (getAttribute(match[0], 'class') ?? '').split(/\s+/);
    if (!classes.includes(className)) continue;

    const tagName = match[1].toLowerCase();
    const innerStart = match.index + match[0].length;
    const closeIndex = markup.toLowerCase().indexOf(`</${tagName}>`, innerStart);
    if (closeIndex === -1) return null;

    return {
      tagName,
      openTag: match[0],
      inner: markup.slice(innerStart, closeIndex),
      start: match.index,
      end: closeIndex + tagName.length + 3,
    };
  }
  return null;
}

/** Text of the first `<tag>` element inside `markup`. */
export function firstElementText(markup: string, tagName: string): string | null {
  const match = new RegExp(`<${tagName}\\b[^>]*>([\\s\\S]*?)</${tagName}>`, 'i').exec(markup);
  return match ? stripTags(match[1]) : null;
}
