import {environment} from './environment.js';
import {isLonghand, propertyAffectsLayout, propertyIdFromString} from './property-id.js';
import {styleValueForProperty} from './resolve.js';
import {serializeStyleValue} from './style-value.js';

import type {Document, HTMLElement} from './dom.js';
import type {PropertyId} from './property-id.js';
import type {Style} from './style.js';
import type {StyleProperty} from './style-value.js';

export class NoModificationAllowedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NoModificationAllowedError';
  }
}

/**
 * What getComputedStyle() hands out. There is nothing to call that could
 * change the element's style.
 */
export interface ReadonlyStyleDeclaration {
  readonly length: number;
  readonly cssText: string;
  item(index: number): string;
  property(id: PropertyId): StyleProperty | null;
  getPropertyValue(name: string): string;
  getPropertyPriority(name: string): string;
  serialized(): string;
}

export interface StyleDeclaration extends ReadonlyStyleDeclaration {
  setProperty(name: string, value: string, priority?: string): void;
  removeProperty(name: string): string;
  setCssText(text: string): void;
}

function errorMessage(e: unknown) {
  return e instanceof Error ? e.message : String(e);
}

function computeStandaloneStyle(element: HTMLElement, document: Document): Style | null {
  try {
    return document.styleComputer.computeStyle(element);
  } catch (e) {
    environment.log(`ResolvedStyleDeclaration: style computer failed: ${errorMessage(e)}`);
    return null;
  }
}

/**
 * https://www.w3.org/TR/cssom-1/#dom-window-getcomputedstyle
 *
 * Brings the element's document up to date (layout if the property can
 * affect geometry, otherwise only style) and returns the resolved value.
 * Returns null rather than throwing when there is no value.
 */
export function resolvedProperty(element: HTMLElement, id: PropertyId): StyleProperty | null {
  const document = element.connectedDocument();
  if (!document) return null;

  if (propertyAffectsLayout(id)) {
    document.updateLayout();
  } else {
    document.updateStyle();
  }

  const box = element.layoutNode;

  if (!box) {
    const style = computeStandaloneStyle(element, document);
    if (!style) return null;

    // No box means nothing to resolve against, so only longhands have a value
    if (!isLonghand(id)) {
      environment.log(`ResolvedStyleDeclaration: no value for ${id} in newly computed style`);
      return null;
    }

    return {id, value: style.property(id)};
  }

  const value = styleValueForProperty(box, id);
  return value ? {id, value} : null;
}

export class ResolvedStyleDeclaration implements StyleDeclaration {
  public element: HTMLElement;

  constructor(element: HTMLElement) {
    this.element = element;
  }

  get length() {
    return 0;
  }

  item(index: number) {
    return '';
  }

  property(id: PropertyId) {
    return resolvedProperty(this.element, id);
  }

  getPropertyValue(name: string) {
    const property = this.property(propertyIdFromString(name));
    return property ? serializeStyleValue(property.value) : '';
  }

  getPropertyPriority(name: string) {
    return '';
  }

  // https://www.w3.org/TR/cssom-1/#dom-cssstyledeclaration-csstext
  // If the computed flag is set, then return the empty string.
  get cssText() {
    return this.serialized();
  }

  set cssText(text: string) {
    this.setCssText(text);
  }

  serialized() {
    return '';
  }

  setProperty(name: string, value: string, priority?: string): never {
    throw new NoModificationAllowedError('Cannot modify properties in result of getComputedStyle()');
  }

  removeProperty(name: string): never {
    throw new NoModificationAllowedError('Cannot remove properties from result of getComputedStyle()');
  }

  setCssText(text: string): never {
    throw new NoModificationAllowedError('Cannot modify properties in result of getComputedStyle()');
  }
}

export function getComputedStyle(element: HTMLElement): ReadonlyStyleDeclaration {
  return new ResolvedStyleDeclaration(element);
}
