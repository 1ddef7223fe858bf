import * as cheerio from 'cheerio';
import { hasChildren, isTag, isText, type AnyNode } from 'domhandler';
import { cleanText } from './normalize';

const NON_CONTENT_TAGS = new Set(['script', 'style', 'head', 'noscript', 'template']);

function collectText(node: AnyNode, out: string[]): void {
  if (isText(node)) {
    const text = cleanText(node.data);
    if (text) out.push(text);
    return;
  }

  if (isTag(node) && NON_CONTENT_TAGS.has(node.name)) return;

  if (hasChildren(node)) {
    for (const child of node.children) {
      collectText(child, out);
    }
  }
}

/**
 * Non-empty, whitespace-collapsed text nodes under the given nodes, in document order
 */
export function textSegments(nodes: AnyNode | AnyNode[] | undefined): string[] {
  const out: string[] = [];
  if (!nodes) return out;

  for (const node of Array.isArray(nodes) ? nodes : [nodes]) {
    collectText(node, out);
  }
  return out;
}

/**
 * Text of the given nodes with text nodes joined by a separator
 */
export function joinedText(nodes: AnyNode | AnyNode[] | undefined, separator = ' '): string {
  return textSegments(nodes).join(separator);
}

/**
 * HTML fragment or document to plain text
 */
export function stripHtml(html: string): string {
  if (!html.includes('<')) return cleanText(html);

  const $ = cheerio.load(html);
  return joinedText($.root().get(0));
}
