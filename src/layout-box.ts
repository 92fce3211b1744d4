import {id} from './util.js';

import type {Document, HTMLElement} from './dom.js';
import type {PaintBox} from './paint.js';
import type {BackgroundPositionX, BackgroundPositionY, LengthPercentage, Style} from './style.js';

/**
 * One entry per background image. Positions are the computed ones for the
 * layer, after the position lists have been repeated to the image count.
 */
export interface BackgroundLayerData {
  image: string;
  positionEdgeX: BackgroundPositionX['edge'];
  positionOffsetX: LengthPercentage;
  positionEdgeY: BackgroundPositionY['edge'];
  positionOffsetY: LengthPercentage;
}

export class Box {
  public id: string;
  public style: Style;
  public element: HTMLElement;
  public parent: Box | null;
  public children: Box[];
  /**
   * Used line-height in px, set by layout()
   */
  public lineHeight: number;
  public backgroundLayers: BackgroundLayerData[];
  public paintable: PaintBox | null;

  constructor(element: HTMLElement, style: Style, parent: Box | null) {
    this.id = id();
    this.element = element;
    this.style = style;
    this.parent = parent;
    this.children = [];
    this.lineHeight = 0;
    this.backgroundLayers = [];
    this.paintable = null;
  }

  computedValues() {
    return this.style;
  }

  document(): Document {
    const document = this.element.ownerDocument;
    if (!document) throw new Error(`Assertion failed: box ${this.id} has no document`);
    return document;
  }

  isPositioned() {
    return this.style.position !== 'static';
  }

  /**
   * CSS 2 Appendix E and CSS Transforms §3: transforms and opacity create a
   * stacking context regardless of position
   */
  isStackingContextRoot() {
    return !this.parent
      || this.style.transform.length > 0
      || this.style.opacity < 1
      || this.isPositioned() && this.style.zIndex !== 'auto';
  }

  /**
   * Takes a newly computed style for the element without regenerating the
   * box tree. Used by the style pass between layouts.
   */
  applyStyle(style: Style) {
    this.style = style;
    this.lineHeight = style.getLineHeight();
    this.backgroundLayers = createBackgroundLayers(style);
  }

  layout() {
    const stack: Box[] = [this];

    while (stack.length) {
      const box = stack.pop();
      if (!box) break;
      box.applyStyle(box.style);
      for (let i = box.children.length - 1; i >= 0; i--) stack.push(box.children[i]);
    }
  }

  /**
   * Elements that generated a box in this subtree, in tree order
   */
  elements() {
    const ret: HTMLElement[] = [];
    const stack: Box[] = [this];

    while (stack.length) {
      const box = stack.pop();
      if (!box) break;
      ret.push(box.element);
      for (let i = box.children.length - 1; i >= 0; i--) stack.push(box.children[i]);
    }

    return ret;
  }

  repr(indent = 0): string {
    const c = this.children.map(c => c.repr(indent + 1)).join('\n');
    const desc = `◼︎ Box ${this.id} <${this.element.tagName}> ${this.element.id}`;
    return '  '.repeat(indent) + desc + (c ? '\n' + c : '');
  }
}

// https://www.w3.org/TR/css-backgrounds-3/#layering
function createBackgroundLayers(style: Style) {
  const layers: BackgroundLayerData[] = [];
  const xs = style.backgroundPositionX;
  const ys = style.backgroundPositionY;

  for (let i = 0; i < style.backgroundImage.length; i++) {
    const x = xs[i % xs.length];
    const y = ys[i % ys.length];
    layers.push({
      image: style.backgroundImage[i],
      positionEdgeX: x.edge,
      positionOffsetX: x.offset,
      positionEdgeY: y.edge,
      positionOffsetY: y.offset
    });
  }

  return layers;
}

/**
 * Creates boxes for `root` and its descendants that are rendered, assigning
 * each element's layoutNode. Returns null if the root itself is not rendered.
 */
export function generateBoxTree(root: HTMLElement): Box | null {
  const rootStyle = root.style;
  if (!rootStyle) throw new Error(`Assertion failed: <${root.tagName}> ${root.id} has no style`);
  if (rootStyle.isDisplayNone()) return null;

  const rootBox = new Box(root, rootStyle, null);
  const stack: {el: HTMLElement, box: Box}[] = [{el: root, box: rootBox}];

  root.layoutNode = rootBox;

  while (stack.length) {
    const item = stack.pop();
    if (!item) break;
    const {el, box} = item;

    for (const child of el.children) {
      const style = child.style;
      if (!style) throw new Error(`Assertion failed: <${child.tagName}> ${child.id} has no style`);
      if (style.isDisplayNone()) continue;
      const childBox = new Box(child, style, box);
      child.layoutNode = childBox;
      box.children.push(childBox);
      stack.push({el: child, box: childBox});
    }
  }

  return rootBox;
}
