import {Document, HTMLElement} from './dom.js';
import {EMPTY_STYLE, cascadeStyles} from './style.js';
import {calculated} from './style-value.js';
import {id} from './util.js';

import type {DocumentOptions} from './dom.js';
import type {DeclaredStyle} from './style.js';
import type {CalculatedValue} from './style-value.js';

export {environment, defaultEnvironment, resetEnvironment} from './environment.js';
export type {Environment} from './environment.js';

export {
  getComputedStyle,
  resolvedProperty,
  NoModificationAllowedError,
  ResolvedStyleDeclaration
} from './resolved-style.js';
export type {ReadonlyStyleDeclaration, StyleDeclaration} from './resolved-style.js';

export {styleValueForProperty, sidedShorthandValue} from './resolve.js';

export {propertyIdFromString, propertyAffectsLayout, isLonghand, isShorthand, longhandsForShorthand} from './property-id.js';
export type {LonghandId, ShorthandId, PropertyId} from './property-id.js';

export * from './style-value.js';

export {inherited, initial, CascadeStyleComputer} from './style.js';
export type {DeclaredStyle, Style, StyleComputer, Transform} from './style.js';

export {Document, HTMLElement};
export type {DocumentOptions};

/**
 * Merges declared styles, later ones winning, into one object that can be
 * shared between elements
 */
export function style(...styles: DeclaredStyle[]): DeclaredStyle {
  let ret = EMPTY_STYLE;
  for (const s of styles) ret = cascadeStyles(ret, s);
  return ret;
}

/**
 * A calc() that mixes lengths and percentages, such as calc(100% - 8px)
 */
export function calc(expression: string): CalculatedValue {
  return calculated(expression);
}

interface HsData {
  style?: DeclaredStyle | DeclaredStyle[];
}

export function h(tagName: string): HTMLElement;
export function h(tagName: string, data: HsData): HTMLElement;
export function h(tagName: string, children: HTMLElement[]): HTMLElement;
export function h(tagName: string, data: HsData, children: HTMLElement[]): HTMLElement;
export function h(tagName: string, arg2?: HsData | HTMLElement[], arg3?: HTMLElement[]): HTMLElement {
  let data: HsData = {};
  let children: HTMLElement[] = [];

  if (Array.isArray(arg2)) {
    children = arg2;
  } else if (arg2) {
    data = arg2;
  }

  if (arg3) children = arg3;

  const declared = Array.isArray(data.style) ? style(...data.style) : data.style;
  const el = new HTMLElement(id(), tagName, declared);
  for (const child of children) el.appendChild(child);
  return el;
}

/**
 * Attaches a tree made with h() to a new document. If the root is not an
 * <html> element, one is created to hold `el`.
 */
export function dom(el: HTMLElement | HTMLElement[], options?: DocumentOptions): Document {
  const document = new Document(options);
  let root: HTMLElement;

  if (!Array.isArray(el) && el.tagName === 'html') {
    root = el;
  } else {
    root = document.createElement('html');
    for (const child of Array.isArray(el) ? el : [el]) root.appendChild(child);
  }

  document.setDocumentElement(root);
  return document;
}
