/**
 * Wikitext Tokenizer
 *
 * Turns raw wikitext into a flat, document-ordered node stream. Parameters of
 * non-citation templates are tokenized recursively and their nodes follow the
 * template node, one `depth` level deeper. Ref contents stay opaque.
 *
 * @module services/wikitext/tokenizer
 */

import {
  findClosing,
  parseTagAttributes,
  sanitizeWikitext,
  splitTemplateParams,
  stripMarkup,
} from './markup.js';

// ═══════════════════════════════════════════════════════════════════════════════
// NODE TYPES
// ═══════════════════════════════════════════════════════════════════════════════

interface NodeBase {
  /** 0-based source line the node starts on */
  line: number;
  /** Template nesting level, 0 for top-level nodes */
  depth: number;
}

export interface HeadingNode extends NodeBase {
  kind: 'heading';
  title: string;
  level: number;
}

export interface ListItemNode extends NodeBase {
  kind: 'list-item';
  marker: '*' | '#';
}

export interface LinkNode extends NodeBase {
  kind: 'link';
  title: string;
  text: string | null;
}

export interface ExternalLinkNode extends NodeBase {
  kind: 'external-link';
  url: string;
  text: string | null;
}

export interface RefNode extends NodeBase {
  kind: 'ref';
  attributes: Record<string, string>;
  /** Raw inner wikitext, null for a self-closing tag */
  content: string | null;
}

export interface TemplateParam {
  name: string;
  value: string;
}

export interface TemplateNode extends NodeBase {
  kind: 'template';
  name: string;
  params: TemplateParam[];
}

export interface TextNode extends NodeBase {
  kind: 'text';
  value: string;
}

export type WikiNode =
  | HeadingNode
  | ListItemNode
  | LinkNode
  | ExternalLinkNode
  | RefNode
  | TemplateNode
  | TextNode;

// ═══════════════════════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════════

const HEADING_LINE = /^(={1,6})\s*(.+?)\s*\1\s*$/;
const DROPPED_NAMESPACES = /^:?\s*(?:file|image|category)\s*:/i;
const CITATION_TEMPLATE = /^(?:cite|citation)/i;
const REF_OPEN = /<ref\b([^>]*?)(\/?)>/iy;
const REF_CLOSE = /<\/ref\s*>/gi;
const EXTERNAL_LINK = /\[((?:https?:)?\/\/[^\s\]]+)(?:[ \t]+([^\]\n]*))?\]/y;
const NAMED_PARAM_KEY = /^[^<>[\]{}=]+$/;

function countNewlines(text: string): number {
  let count = 0;
  for (const ch of text) {
    if (ch === '\n') count++;
  }
  return count;
}

/**
 * True when a template name denotes a citation, whose parameters are not
 * tokenized further
 */
export function isCitationTemplate(name: string): boolean {
  return CITATION_TEMPLATE.test(name.trim());
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOKENIZER
// ═══════════════════════════════════════════════════════════════════════════════

class WikitextTokenizer {
  private pos = 0;
  private line: number;
  private atLineStart: boolean;
  private textBuffer = '';
  private textLine: number;
  private readonly nodes: WikiNode[] = [];

  constructor(
    private readonly source: string,
    startLine: number,
    private readonly depth: number
  ) {
    this.line = startLine;
    this.textLine = startLine;
    // Template parameter values never start a line of their own
    this.atLineStart = depth === 0;
  }

  run(): WikiNode[] {
    while (this.pos < this.source.length) {
      if (this.atLineStart) {
        this.atLineStart = false;
        if (this.readHeading()) continue;
        this.readListMarkers();
        continue;
      }

      const ch = this.source[this.pos];
      if (ch === '\n') {
        this.pushText('\n');
        this.flushText();
        this.pos++;
        this.line++;
        this.atLineStart = true;
        continue;
      }
      if (this.source.startsWith('[[', this.pos) && this.readLink()) continue;
      if (this.source.startsWith('{{', this.pos) && this.readTemplate()) continue;
      if (ch === '<' && this.readRef()) continue;
      if (ch === '[' && this.readExternalLink()) continue;

      this.pushText(ch);
      this.pos++;
    }
    this.flushText();
    return this.nodes;
  }

  private emit(node: WikiNode): void {
    this.flushText();
    this.nodes.push(node);
  }

  private pushText(text: string): void {
    if (this.textBuffer.length === 0) this.textLine = this.line;
    this.textBuffer += text;
  }

  private flushText(): void {
    if (this.textBuffer.length === 0) return;
    this.nodes.push({ kind: 'text', value: this.textBuffer, line: this.textLine, depth: this.depth });
    this.textBuffer = '';
  }

  /** Consume a raw span, keeping the line counter in step */
  private advance(length: number): void {
    this.line += countNewlines(this.source.slice(this.pos, this.pos + length));
    this.pos += length;
  }

  private readHeading(): boolean {
    const newline = this.source.indexOf('\n', this.pos);
    const lineEnd = newline === -1 ? this.source.length : newline;
    const match = HEADING_LINE.exec(this.source.slice(this.pos, lineEnd));
    if (!match) return false;

    this.emit({
      kind: 'heading',
      title: stripMarkup(match[2]),
      level: match[1].length,
      line: this.line,
      depth: this.depth,
    });
    this.pos = lineEnd;
    if (newline !== -1) {
      this.pos++;
      this.line++;
      this.atLineStart = true;
    }
    return true;
  }

  private readListMarkers(): void {
    while (this.pos < this.source.length) {
      const ch = this.source[this.pos];
      if (ch === '*' || ch === '#') {
        this.emit({ kind: 'list-item', marker: ch, line: this.line, depth: this.depth });
      } else if (ch !== ':' && ch !== ';') {
        return;
      }
      this.pos++;
    }
  }

  private readLink(): boolean {
    const end = findClosing(this.source, this.pos, '[[', ']]');
    if (end === -1) return false;

    const inner = this.source.slice(this.pos + 2, end);
    const length = end + 2 - this.pos;

    if (DROPPED_NAMESPACES.test(inner)) {
      this.flushText();
      this.advance(length);
      return true;
    }
    if (inner.includes('\n')) return false;

    const pipe = inner.indexOf('|');
    const title = (pipe === -1 ? inner : inner.slice(0, pipe)).trim();
    const display = pipe === -1 ? '' : inner.slice(pipe + 1).trim();
    if (title.length === 0) return false;

    this.emit({
      kind: 'link',
      title,
      text: display.length > 0 ? display : null,
      line: this.line,
      depth: this.depth,
    });
    this.advance(length);
    return true;
  }

  private readTemplate(): boolean {
    const end = findClosing(this.source, this.pos, '{{', '}}');
    if (end === -1) return false;

    const bodyStart = this.pos + 2;
    const body = this.source.slice(bodyStart, end);
    const segments = splitTemplateParams(body);
    const name = segments[0].text.trim();
    const startLine = this.line;

    const params: TemplateParam[] = [];
    const rawValues: Array<{ value: string; offset: number }> = [];
    let positional = 0;

    for (const segment of segments.slice(1)) {
      const eq = segment.text.indexOf('=');
      const key = eq === -1 ? '' : segment.text.slice(0, eq);
      if (eq !== -1 && NAMED_PARAM_KEY.test(key)) {
        const value = segment.text.slice(eq + 1);
        params.push({ name: key.trim(), value: value.trim() });
        rawValues.push({ value, offset: segment.offset + eq + 1 });
      } else {
        positional++;
        params.push({ name: String(positional), value: segment.text.trim() });
        rawValues.push({ value: segment.text, offset: segment.offset });
      }
    }

    this.emit({ kind: 'template', name, params, line: startLine, depth: this.depth });

    if (!isCitationTemplate(name)) {
      for (const raw of rawValues) {
        const valueLine = startLine + countNewlines(body.slice(0, raw.offset));
        this.nodes.push(...new WikitextTokenizer(raw.value, valueLine, this.depth + 1).run());
      }
    }

    this.advance(end + 2 - this.pos);
    return true;
  }

  private readRef(): boolean {
    REF_OPEN.lastIndex = this.pos;
    const open = REF_OPEN.exec(this.source);
    if (!open) return false;

    const attributes = parseTagAttributes(open[1]);
    const openEnd = this.pos + open[0].length;

    if (open[2] === '/') {
      this.emit({ kind: 'ref', attributes, content: null, line: this.line, depth: this.depth });
      this.advance(open[0].length);
      return true;
    }

    REF_CLOSE.lastIndex = openEnd;
    const close = REF_CLOSE.exec(this.source);
    if (!close) return false;

    this.emit({
      kind: 'ref',
      attributes,
      content: this.source.slice(openEnd, close.index),
      line: this.line,
      depth: this.depth,
    });
    this.advance(close.index + close[0].length - this.pos);
    return true;
  }

  private readExternalLink(): boolean {
    EXTERNAL_LINK.lastIndex = this.pos;
    const match = EXTERNAL_LINK.exec(this.source);
    if (!match) return false;

    const label = match[2]?.trim() ?? '';
    this.emit({
      kind: 'external-link',
      url: match[1],
      text: label.length > 0 ? label : null,
      line: this.line,
      depth: this.depth,
    });
    this.pos += match[0].length;
    return true;
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// PUBLIC API
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Tokenize a page (or fragment) of wikitext into document-ordered nodes
 */
export function tokenizeWikitext(text: string): WikiNode[] {
  return new WikitextTokenizer(sanitizeWikitext(text), 0, 0).run();
}

/**
 * Top-level nodes of a fragment that carry something besides whitespace
 */
export function significantNodes(nodes: WikiNode[]): WikiNode[] {
  return nodes.filter(
    (node) => node.depth === 0 && !(node.kind === 'text' && node.value.trim().length === 0)
  );
}

/**
 * Positional or named template parameter lookup (name compared case-insensitively)
 */
export function getTemplateParam(template: TemplateNode, name: string): string | null {
  const wanted = name.toLowerCase();
  const param = template.params.find((p) => p.name.toLowerCase() === wanted);
  return param === undefined ? null : param.value;
}
