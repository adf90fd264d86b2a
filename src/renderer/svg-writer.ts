import type { AttrValue, Declaration, KeyframesRule, SceneDocument, StyleRule, StyleSheet, SvgElement } from './scene-types.js';
import { escapeXml, formatNumber } from './utils.js';

const SVG_NS = 'http://www.w3.org/2000/svg';
const INDENT = '  ';

export function el(tag: string, attrs: Record<string, AttrValue> = {}, children: SvgElement[] = []): SvgElement {
  return { tag, attrs, children };
}

function renderAttrs(attrs: Record<string, AttrValue>): string {
  const parts: string[] = [];
  for (const [name, value] of Object.entries(attrs)) {
    if (value === undefined) continue;
    const text = typeof value === 'number' ? formatNumber(value) : value;
    parts.push(`${name}="${escapeXml(text)}"`);
  }
  return parts.length ? ' ' + parts.join(' ') : '';
}

export function renderElement(node: SvgElement, depth = 0): string[] {
  const pad = INDENT.repeat(depth);
  const open = `${pad}<${node.tag}${renderAttrs(node.attrs)}`;
  if (node.children.length === 0) return [`${open}/>`];
  const lines = [`${open}>`];
  for (const child of node.children) lines.push(...renderElement(child, depth + 1));
  lines.push(`${pad}</${node.tag}>`);
  return lines;
}

function renderDeclarations(declarations: readonly Declaration[]): string {
  return declarations.map(([property, value]) => `${property}: ${value};`).join(' ');
}

function renderRule(rule: StyleRule): string {
  return `${rule.selector} { ${renderDeclarations(rule.declarations)} }`;
}

function renderKeyframes(rule: KeyframesRule): string[] {
  const lines = [`@keyframes ${rule.name} {`];
  for (const frame of rule.frames) {
    lines.push(`${INDENT}${formatNumber(frame.offset)}% { ${renderDeclarations(frame.declarations)} }`);
  }
  lines.push('}');
  return lines;
}

export function renderStyleSheet(sheet: StyleSheet): string[] {
  const lines: string[] = [];
  for (const rule of sheet.rules) lines.push(renderRule(rule));
  for (const keyframes of sheet.keyframes) lines.push(...renderKeyframes(keyframes));
  return lines;
}

/**
 * Serialise a composed scene. Tags are always balanced: elements without
 * children self-close and the style block is written as indented text.
 */
export function serializeScene(doc: SceneDocument): string {
  const w = formatNumber(doc.width);
  const h = formatNumber(doc.height);
  const lines: string[] = [`<svg width="${w}" height="${h}" viewBox="0 0 ${w} ${h}" xmlns="${SVG_NS}">`];

  lines.push(...renderElement(el('defs', {}, doc.defs), 1));

  lines.push(`${INDENT}<style>`);
  for (const line of renderStyleSheet(doc.style)) {
    lines.push(`${INDENT.repeat(2)}${escapeXml(line)}`);
  }
  lines.push(`${INDENT}</style>`);

  for (const node of doc.body) lines.push(...renderElement(node, 1));
  lines.push('</svg>');
  return lines.join('\n') + '\n';
}
