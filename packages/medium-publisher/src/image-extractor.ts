import path from 'path';
import { JSDOM } from 'jsdom';
import { getDefaults, Lexer, Parser, walkTokens, type MarkedOptions } from 'marked';

const MARKED_OPTIONS: MarkedOptions = { ...getDefaults(), gfm: true };

const REMOTE_SOURCE = /^(?:[a-z][a-z\d+.-]*:|\/\/)/i;

// [ref]: dest "title"
const REFERENCE_DEFINITION = /^( {0,3}\[[^\]]+\]:[ \t]*)(<[^>\n]*>|\S+)/gm;
// <img src="dest">
const HTML_IMAGE = /(<img\b[^>]*?\ssrc\s*=\s*)("[^"]*"|'[^']*'|[^\s"'>]+)/gi;
// \( in a destination
const ESCAPED_CHARACTER = /\\([!-/:-@[-`{-~])/g;

function safeDecode(value: string): string {
  try {
    return decodeURI(value);
  } catch {
    return value;
  }
}

/**
 * Render markdown to HTML
 */
export function renderMarkdown(markdown: string): string {
  return Parser.parse(Lexer.lex(markdown, MARKED_OPTIONS), MARKED_OPTIONS);
}

/**
 * Image sources in document order, duplicates included.
 *
 * The markdown is rendered first, so inline `<img>` tags and reference-style
 * images are found too. Sources are percent-decoded to undo the encoding the
 * renderer applies to URLs.
 */
export function extractImages(markdown: string): string[] {
  const dom = new JSDOM(renderMarkdown(markdown));
  const sources: string[] = [];

  for (const image of Array.from(dom.window.document.querySelectorAll('img'))) {
    const src = image.getAttribute('src');
    if (src) sources.push(safeDecode(src));
  }

  dom.window.close();
  return sources;
}

/**
 * Local paths are uploaded, anything with a scheme (`https:`, `data:`) or a
 * protocol-relative URL is left alone
 */
export function isLocalImage(src: string): boolean {
  return !REMOTE_SOURCE.test(src) || /^[a-z]:[\\/]/i.test(src);
}

/**
 * Absolute path of an image, relative to the directory of `markdownPath`.
 * Pass the real path of the post so symlinked posts find their images.
 */
export function resolveImagePath(src: string, markdownPath: string): string {
  return path.resolve(path.dirname(path.resolve(markdownPath)), src);
}

/**
 * Rewrite image destinations found in `mapping` in a single pass.
 *
 * Destinations are located through the markdown lexer, so only real image
 * references change: code spans, code blocks and paths mentioned in prose stay
 * as written, as does a path that is a prefix of another. Line endings are
 * normalised to `\n`.
 */
export function substituteImages(markdown: string, mapping: ReadonlyMap<string, string>): string {
  if (mapping.size === 0) return markdown;

  const lookup = (destination: string): string | undefined =>
    mapping.get(destination) ??
    mapping.get(safeDecode(destination)) ??
    mapping.get(destination.replace(ESCAPED_CHARACTER, '$1'));

  const replaceDestination = (destination: string): string => {
    const bracketed = destination.startsWith('<') && destination.endsWith('>');
    const quote = /^["']/.test(destination) ? destination[0] : '';
    const bare = bracketed || quote ? destination.slice(1, -1) : destination;
    const replacement = lookup(bare);
    if (replacement === undefined) return destination;
    if (bracketed) return `<${replacement}>`;
    return `${quote}${replacement}${quote}`;
  };

  const source = markdown.replace(/\r\n?/g, '\n');

  // Reference definitions produce no token, so they are matched in the text between tokens
  const rewriteDefinitions = (text: string, offset: number): string =>
    text.replace(REFERENCE_DEFINITION, (match: string, prefix: string, destination: string, index: number) => {
      const position = offset + index;
      const atLineStart = position === 0 || source[position - 1] === '\n';
      return atLineStart ? prefix + replaceDestination(destination) : match;
    });

  const rewriteToken = (token: ScannedToken): string => {
    switch (token.type) {
      case 'image':
        return rewriteInlineImage(token.raw, replaceDestination);
      case 'html':
        return token.raw.replace(
          HTML_IMAGE,
          (_match: string, prefix: string, destination: string) => prefix + replaceDestination(destination)
        );
      default:
        return token.raw;
    }
  };

  let output = '';
  let cursor = 0;
  for (const token of scanTokens(source)) {
    const start = source.indexOf(token.raw, cursor);
    if (start < 0) continue;
    output += rewriteDefinitions(source.slice(cursor, start), cursor) + rewriteToken(token);
    cursor = start + token.raw.length;
  }
  output += rewriteDefinitions(source.slice(cursor), cursor);

  return output;
}

interface ScannedToken {
  type: string;
  raw: string;
}

const SCANNED_TYPES = new Set(['image', 'html', 'code', 'codespan']);

/**
 * Images, raw html and code, in document order
 */
function scanTokens(markdown: string): ScannedToken[] {
  const scanned: ScannedToken[] = [];
  walkTokens(Lexer.lex(markdown, MARKED_OPTIONS), token => {
    if (SCANNED_TYPES.has(token.type) && token.raw.length > 0) {
      scanned.push({ type: token.type, raw: token.raw });
    }
  });
  return scanned;
}

/**
 * Swap the destination of `![alt](dest "title")`. Reference images
 * (`![alt][ref]`) are returned unchanged; their definition is rewritten instead.
 */
function rewriteInlineImage(raw: string, replaceDestination: (destination: string) => string): string {
  // Alt text may hold balanced brackets
  let depth = 0;
  let altEnd = 1;
  for (; altEnd < raw.length; altEnd++) {
    const ch = raw[altEnd];
    if (ch === '\\') {
      altEnd++;
    } else if (ch === '[') {
      depth++;
    } else if (ch === ']') {
      depth--;
      if (depth === 0) break;
    }
  }
  if (raw[altEnd + 1] !== '(') return raw;

  let start = altEnd + 2;
  while (start < raw.length && /\s/.test(raw[start])) start++;

  let end = start;
  if (raw[start] === '<') {
    end = raw.indexOf('>', start) + 1;
    if (end === 0) return raw;
  } else {
    // Destinations may hold balanced parentheses
    let parens = 0;
    for (; end < raw.length; end++) {
      const ch = raw[end];
      if (ch === '\\') {
        end++;
      } else if (/\s/.test(ch)) {
        break;
      } else if (ch === '(') {
        parens++;
      } else if (ch === ')') {
        if (parens === 0) break;
        parens--;
      }
    }
  }

  return raw.slice(0, start) + replaceDestination(raw.slice(start, end)) + raw.slice(end);
}
