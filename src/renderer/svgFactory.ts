/**
 * SVG node factory utilities
 * Builds an immutable node tree that is serialized once into markup
 */

export type SvgTagName = 'svg' | 'style' | 'rect' | 'line' | 'circle' | 'text' | 'g';

export type SvgAttributes = Record<string, string | number | undefined>;

export interface SvgElementNode {
  readonly kind: 'element';
  readonly tag: SvgTagName;
  readonly attrs: Readonly<Record<string, string>>;
  readonly children: readonly SvgNode[];
}

export interface SvgTextNode {
  readonly kind: 'text';
  readonly value: string;
}

export interface SvgCommentNode {
  readonly kind: 'comment';
  readonly value: string;
}

export type SvgNode = SvgElementNode | SvgTextNode | SvgCommentNode;

const INDENT = '  ';

/**
 * Escape text content
 */
export function escapeText(value: string): string {
  return value.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

/**
 * Escape an attribute value for double-quoted output
 */
export function escapeAttribute(value: string): string {
  return escapeText(value).replace(/"/g, '&quot;');
}

/**
 * Convert attributes to strings, skipping undefined values
 */
function toAttributeMap(attrs: SvgAttributes): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(attrs)) {
    if (value !== undefined) {
      result[key] = String(value);
    }
  }
  return Object.freeze(result);
}

/**
 * Create an SVG element node with attributes and children
 */
export function createSvgElement(
  tag: SvgTagName,
  attrs: SvgAttributes = {},
  children: readonly SvgNode[] = [],
): SvgElementNode {
  const node: SvgElementNode = {
    kind: 'element',
    tag,
    attrs: toAttributeMap(attrs),
    children: Object.freeze([...children]),
  };
  return Object.freeze(node);
}

/**
 * Create a text content node
 */
export function createTextNode(value: string): SvgTextNode {
  const node: SvgTextNode = { kind: 'text', value };
  return Object.freeze(node);
}

/**
 * Create a comment node
 * "--" is not allowed inside XML comments and is replaced with "- -"
 */
export function createComment(value: string): SvgCommentNode {
  const node: SvgCommentNode = { kind: 'comment', value: value.replace(/--/g, '- -') };
  return Object.freeze(node);
}

/**
 * Create a text element
 */
export function createTextElement(
  text: string,
  attrs: SvgAttributes & {
    x: number;
    y: number;
  },
): SvgElementNode {
  return createSvgElement('text', attrs, [createTextNode(text)]);
}

/**
 * Create a line element
 */
export function createLineElement(
  x1: number,
  y1: number,
  x2: number,
  y2: number,
  attrs: SvgAttributes = {},
): SvgElementNode {
  return createSvgElement('line', {
    x1,
    y1,
    x2,
    y2,
    ...attrs,
  });
}

/**
 * Create a rect element
 */
export function createRectElement(attrs: SvgAttributes = {}): SvgElementNode {
  return createSvgElement('rect', attrs);
}

/**
 * Create a circle element
 */
export function createCircleElement(
  cx: number,
  cy: number,
  r: number,
  attrs: SvgAttributes = {},
): SvgElementNode {
  return createSvgElement('circle', {
    cx,
    cy,
    r,
    ...attrs,
  });
}

/**
 * Create a group element translated by (x, y)
 */
export function createGroupElement(
  x: number,
  y: number,
  children: readonly SvgNode[],
  attrs: SvgAttributes = {},
): SvgElementNode {
  return createSvgElement('g', { ...attrs, transform: `translate(${x},${y})` }, children);
}

function formatAttributes(attrs: Readonly<Record<string, string>>): string {
  return Object.entries(attrs)
    .map(([key, value]) => ` ${key}="${escapeAttribute(value)}"`)
    .join('');
}

function serializeNode(node: SvgNode, depth: number, out: string[]): void {
  const pad = INDENT.repeat(depth);

  if (node.kind === 'text') {
    out.push(pad + escapeText(node.value));
    return;
  }
  if (node.kind === 'comment') {
    out.push(`${pad}<!-- ${node.value} -->`);
    return;
  }

  const open = `<${node.tag}${formatAttributes(node.attrs)}`;
  if (node.children.length === 0) {
    out.push(`${pad}${open}/>`);
    return;
  }

  // Single-line text content stays on the tag's line
  const only = node.children.length === 1 ? node.children[0] : undefined;
  if (only?.kind === 'text' && !only.value.includes('\n')) {
    out.push(`${pad}${open}>${escapeText(only.value)}</${node.tag}>`);
    return;
  }

  out.push(`${pad}${open}>`);
  for (const child of node.children) {
    if (child.kind === 'text') {
      for (const line of child.value.split('\n')) {
        out.push(INDENT.repeat(depth + 1) + escapeText(line));
      }
    } else {
      serializeNode(child, depth + 1, out);
    }
  }
  out.push(`${pad}</${node.tag}>`);
}

/**
 * Serialize a node tree into indented markup, one element per line
 */
export function serializeSvg(root: SvgNode): string {
  const out: string[] = [];
  serializeNode(root, 0, out);
  return out.join('\n') + '\n';
}
