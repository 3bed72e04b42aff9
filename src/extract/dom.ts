import type { CheerioAPI } from 'cheerio';
import type { AnyNode } from 'domhandler';
import { hasChildren, isTag, isText } from 'domhandler';
import { normalizeWhitespace } from '../utils/text.js';

const SKIPPED_TAGS = new Set(['script', 'style', 'noscript', 'template', 'svg', 'iframe']);

const BLOCK_TAGS = new Set([
  'address',
  'article',
  'aside',
  'blockquote',
  'body',
  'br',
  'dd',
  'div',
  'dl',
  'dt',
  'fieldset',
  'figcaption',
  'figure',
  'footer',
  'form',
  'h1',
  'h2',
  'h3',
  'h4',
  'h5',
  'h6',
  'header',
  'hr',
  'li',
  'main',
  'nav',
  'ol',
  'p',
  'pre',
  'section',
  'table',
  'tbody',
  'td',
  'th',
  'thead',
  'tr',
  'ul',
]);

class LineCollector {
  readonly lines: string[] = [];
  private current = '';

  append(text: string): void {
    this.current += text;
  }

  flush(): void {
    const line = normalizeWhitespace(this.current);
    if (line) {
      this.lines.push(line);
    }
    this.current = '';
  }
}

function walk(node: AnyNode, collector: LineCollector): void {
  if (isText(node)) {
    collector.append(node.data);
    return;
  }

  if (isTag(node)) {
    const name = node.name.toLowerCase();
    if (SKIPPED_TAGS.has(name)) {
      return;
    }
    const isBlock = BLOCK_TAGS.has(name);
    if (isBlock) {
      collector.flush();
    }
    for (const child of node.children) {
      walk(child, collector);
    }
    if (isBlock) {
      collector.flush();
    }
    return;
  }

  if (hasChildren(node)) {
    for (const child of node.children) {
      walk(child, collector);
    }
  }
}

/** Text of the given nodes with one line per block element. */
export function blockText(nodes: readonly AnyNode[]): string {
  const collector = new LineCollector();
  for (const node of nodes) {
    walk(node, collector);
    collector.flush();
  }
  return collector.lines.join('\n');
}

export function blockTextOf($: CheerioAPI, selector: string): string {
  return blockText($(selector).toArray());
}

export function inlineTextOf($: CheerioAPI, selector: string): string {
  return $(selector)
    .toArray()
    .map((element) => normalizeWhitespace($(element).text()))
    .filter(Boolean)
    .join(' ');
}

export function metaContent($: CheerioAPI, selector: string): string {
  return normalizeWhitespace($(selector).first().attr('content') ?? '');
}
