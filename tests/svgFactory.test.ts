/**
 * Tests for SVG node construction and serialization
 */

import { describe, it, expect } from 'vitest';
import {
  createSvgElement,
  createTextElement,
  createTextNode,
  createLineElement,
  createRectElement,
  createCircleElement,
  createGroupElement,
  createComment,
  serializeSvg,
} from '../src/renderer/svgFactory';

describe('serializeSvg', () => {
  it('should self-close elements without children', () => {
    expect(serializeSvg(createCircleElement(0, 0, 5, { class: 'event-circle' }))).toBe(
      '<circle cx="0" cy="0" r="5" class="event-circle"/>\n'
    );
  });

  it('should skip undefined attributes', () => {
    expect(serializeSvg(createLineElement(0, 1, 2, 3, { class: undefined }))).toBe(
      '<line x1="0" y1="1" x2="2" y2="3"/>\n'
    );
  });

  it('should escape text content', () => {
    expect(serializeSvg(createTextElement('a < b & c', { x: 15, y: 5 }))).toBe(
      '<text x="15" y="5">a &lt; b &amp; c</text>\n'
    );
  });

  it('should escape attribute values', () => {
    expect(serializeSvg(createRectElement({ title: 'say "hi" & <go>' }))).toBe(
      '<rect title="say &quot;hi&quot; &amp; &lt;go&gt;"/>\n'
    );
  });

  it('should indent nested elements', () => {
    const group = createGroupElement(10, 20, [createCircleElement(0, 0, 6)], { class: 'g' });
    expect(serializeSvg(group)).toBe(
      '<g class="g" transform="translate(10,20)">\n  <circle cx="0" cy="0" r="6"/>\n</g>\n'
    );
  });

  it('should put multi-line text on indented lines', () => {
    const style = createSvgElement('style', {}, [createTextNode('.a { }\n.b { }')]);
    expect(serializeSvg(style)).toBe('<style>\n  .a { }\n  .b { }\n</style>\n');
  });

  it('should write comments and keep them well-formed', () => {
    const root = createSvgElement('g', {}, [createComment('2023-01-15'), createComment('a--b')]);
    expect(serializeSvg(root)).toBe('<g>\n  <!-- 2023-01-15 -->\n  <!-- a- -b -->\n</g>\n');
  });
});

describe('node immutability', () => {
  it('should freeze nodes, attributes and children', () => {
    const node = createGroupElement(0, 0, [createCircleElement(0, 0, 5)]);
    expect(Object.isFrozen(node)).toBe(true);
    expect(Object.isFrozen(node.attrs)).toBe(true);
    expect(Object.isFrozen(node.children)).toBe(true);
  });

  it('should copy the children it is given', () => {
    const children = [createCircleElement(0, 0, 5)];
    const node = createSvgElement('g', {}, children);
    children.push(createCircleElement(1, 1, 5));
    expect(node.children).toHaveLength(1);
  });
});
