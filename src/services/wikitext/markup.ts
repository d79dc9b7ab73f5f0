/**
 * Low-level wikitext markup helpers
 *
 * Splitting template parameters, reading tag attributes and reducing
 * markup to plain text.
 *
 * @module services/wikitext/markup
 */

/** A template parameter segment with its offset inside the template body */
export interface ParamSegment {
  text: string;
  offset: number;
}

/**
 * Remove comments and blocks that never carry list data.
 * Newlines inside removed blocks are kept so line numbers stay stable.
 */
export function sanitizeWikitext(text: string): string {
  const keepNewlines = (block: string): string => block.replace(/[^\n]/g, '');
  return text
    .replace(/<!--[\s\S]*?-->/g, keepNewlines)
    .replace(/<nowiki\b[^>]*>[\s\S]*?<\/nowiki>/gi, keepNewlines)
    .replace(/<pre\b[^>]*>[\s\S]*?<\/pre>/gi, keepNewlines)
    .replace(/<nowiki\b[^>]*\/\s*>/gi, '');
}

/**
 * Split a template body on top-level pipes.
 * Pipes nested in {{ }} or [[ ]] do not split.
 */
export function splitTemplateParams(body: string): ParamSegment[] {
  const segments: ParamSegment[] = [];
  let braces = 0;
  let brackets = 0;
  let start = 0;

  for (let i = 0; i < body.length; i++) {
    const pair = body.slice(i, i + 2);
    if (pair === '{{') {
      braces++;
      i++;
    } else if (pair === '}}' && braces > 0) {
      braces--;
      i++;
    } else if (pair === '[[') {
      brackets++;
      i++;
    } else if (pair === ']]' && brackets > 0) {
      brackets--;
      i++;
    } else if (body[i] === '|' && braces === 0 && brackets === 0) {
      segments.push({ text: body.slice(start, i), offset: start });
      start = i + 1;
    }
  }
  segments.push({ text: body.slice(start), offset: start });
  return segments;
}

/**
 * Find the index of the bracket pair closing the one opened at `start`.
 * Returns -1 when the construct is never closed.
 */
export function findClosing(source: string, start: number, open: string, close: string): number {
  let depth = 0;
  let i = start;
  while (i < source.length) {
    if (source.startsWith(open, i)) {
      depth++;
      i += open.length;
    } else if (source.startsWith(close, i)) {
      depth--;
      if (depth === 0) return i;
      i += close.length;
    } else {
      i++;
    }
  }
  return -1;
}

/**
 * Parse tag attributes (name="x", group='y', name=z) into a lowercase-keyed record
 */
export function parseTagAttributes(raw: string): Record<string, string> {
  const attributes: Record<string, string> = {};
  const pattern = /([\w-]+)\s*=\s*(?:"([^"]*)"|'([^']*)'|([^\s"'>/]+))/g;
  let match: RegExpExecArray | null;
  while ((match = pattern.exec(raw)) !== null) {
    const key = match[1].toLowerCase();
    const value = match[2] ?? match[3] ?? match[4] ?? '';
    attributes[key] = value.trim();
  }
  return attributes;
}

const FLAG_TEMPLATE = /\{\{\s*(?:flag|flagu|flagcountry)\s*\|\s*([^|}]+?)\s*(?:\|[^{}]*)?\}\}/gi;
const INNER_TEMPLATE = /\{\{[^{}]*\}\}/g;

/**
 * Reduce a fragment of wikitext to its visible text.
 * Links become their display text, refs and most templates disappear.
 */
export function stripMarkup(raw: string): string {
  let text = raw
    .replace(/<ref\b[^>]*\/>/gi, '')
    .replace(/<ref\b[^>]*>[\s\S]*?<\/ref\s*>/gi, '')
    .replace(FLAG_TEMPLATE, '$1');

  let previous: string;
  do {
    previous = text;
    text = text.replace(INNER_TEMPLATE, '');
  } while (text !== previous);

  return text
    .replace(/\[\[(?:[^|\]]*\|)?([^\]]*)\]\]/g, '$1')
    .replace(/\[(?:https?:)?\/\/[^\s\]]+\s+([^\]]*)\]/g, '$1')
    .replace(/'{2,}/g, '')
    .replace(/<[^>]+>/g, '')
    .trim();
}

/**
 * Strip commas, quotes and whitespace from both ends of a fragment
 */
export function trimListNoise(text: string): string {
  return text.replace(/^[\s,']+|[\s,']+$/g, '');
}
