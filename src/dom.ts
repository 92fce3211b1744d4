import {generateBoxTree} from './layout-box.js';
import {Viewport} from './paint.js';
import {CascadeStyleComputer, EMPTY_STYLE, computeElementStyle} from './style.js';
import {id} from './util.js';

import type {Box} from './layout-box.js';
import type {DeclaredStyle, Style, StyleComputer} from './style.js';

export class HTMLElement {
  public id: string;
  public tagName: string;
  public style: Style | null;
  public declaredStyle: DeclaredStyle;
  public parent: HTMLElement | null;
  public children: HTMLElement[];
  public ownerDocument: Document | null;
  /**
   * Set by the document's layout pass for elements that generate a box.
   * Elements with display: none (or inside one) never get one.
   */
  public layoutNode: Box | null;

  constructor(
    id: string,
    tagName: string,
    declaredStyle: DeclaredStyle = EMPTY_STYLE,
    ownerDocument: Document | null = null
  ) {
    this.id = id;
    this.tagName = tagName;
    this.style = null;
    this.declaredStyle = declaredStyle;
    this.parent = null;
    this.children = [];
    this.ownerDocument = ownerDocument;
    this.layoutNode = null;
  }

  appendChild(child: HTMLElement) {
    if (child === this || child.contains(this)) {
      throw new Error(`Cannot insert <${child.tagName}> ${child.id} into its own subtree`);
    }

    if (child.parent) child.parent.removeChild(child);
    child.parent = this;
    this.children.push(child);
    child.adopt(this.ownerDocument);
    this.ownerDocument?.invalidateStyle();
    return child;
  }

  removeChild(child: HTMLElement) {
    const index = this.children.indexOf(child);
    if (index < 0) throw new Error(`<${child.tagName}> ${child.id} is not a child of ${this.id}`);
    this.children.splice(index, 1);
    child.parent = null;
    this.ownerDocument?.invalidateStyle();
    return child;
  }

  setStyle(declaredStyle: DeclaredStyle) {
    this.declaredStyle = declaredStyle;
    this.ownerDocument?.invalidateStyle();
  }

  contains(el: HTMLElement) {
    let ancestor: HTMLElement | null = el;
    while (ancestor) {
      if (ancestor === this) return true;
      ancestor = ancestor.parent;
    }
    return false;
  }

  adopt(document: Document | null) {
    const stack: HTMLElement[] = [this];
    while (stack.length) {
      const el = stack.pop();
      if (!el) break;
      // A box belongs to the layout of the document that made it
      if (el.ownerDocument !== document) el.layoutNode = null;
      el.ownerDocument = document;
      for (const child of el.children) stack.push(child);
    }
  }

  /**
   * The owning document if this element is in its tree, otherwise null
   */
  connectedDocument(): Document | null {
    let root: HTMLElement = this;
    while (root.parent) root = root.parent;
    const document = this.ownerDocument;
    return document && document.documentElement === root ? document : null;
  }

  isConnected() {
    return this.connectedDocument() !== null;
  }

  repr(indent = 0, styleProp?: keyof Style): string {
    const c = this.children.map(c => c.repr(indent + 1, styleProp)).join('\n');
    const style = styleProp && this.style ? ` ${styleProp}: ${JSON.stringify(this.style[styleProp])}` : '';
    const desc = `◼ <${this.tagName}> ${this.id}${style}`;
    return '  '.repeat(indent) + desc + (c ? '\n' + c : '');
  }
}

export interface DocumentOptions {
  /**
   * Computes style for elements that have no box, such as those inside a
   * display: none subtree. Defaults to the built-in cascade.
   */
  styleComputer?: StyleComputer;
}

export class Document {
  public documentElement: HTMLElement | null;
  public styleComputer: StyleComputer;
  public styleUpdateCount: number;
  public layoutUpdateCount: number;
  private styleDirty: boolean;
  private layoutDirty: boolean;
  private viewport: Viewport | null;
  private laidOut: HTMLElement[];

  constructor(options: DocumentOptions = {}) {
    this.documentElement = null;
    this.styleComputer = options.styleComputer ?? new CascadeStyleComputer();
    this.styleUpdateCount = 0;
    this.layoutUpdateCount = 0;
    this.styleDirty = true;
    this.layoutDirty = true;
    this.viewport = null;
    this.laidOut = [];
  }

  createElement(tagName: string, declaredStyle: DeclaredStyle = EMPTY_STYLE) {
    return new HTMLElement(id(), tagName, declaredStyle, this);
  }

  setDocumentElement(el: HTMLElement | null) {
    if (el?.parent) el.parent.removeChild(el);
    this.documentElement = el;
    el?.adopt(this);
    this.invalidateStyle();
  }

  invalidateStyle() {
    this.styleDirty = true;
    this.layoutDirty = true;
  }

  /**
   * Computes style for every connected element if anything changed since
   * the last time. Boxes from the last layout take the new style, and
   * elements that are no longer rendered lose theirs.
   */
  updateStyle() {
    if (!this.styleDirty) return;

    if (this.documentElement) {
      const stack: {el: HTMLElement, parentStyle: Style | null, rendered: boolean}[] = [
        {el: this.documentElement, parentStyle: null, rendered: true}
      ];

      while (stack.length) {
        const item = stack.pop();
        if (!item) break;
        const {el, parentStyle} = item;
        const style = computeElementStyle(el, parentStyle);
        const rendered = item.rendered && !style.isDisplayNone();
        el.style = style;
        if (!rendered) {
          el.layoutNode = null;
        } else if (el.layoutNode) {
          el.layoutNode.applyStyle(style);
        }
        for (let i = el.children.length - 1; i >= 0; i--) {
          stack.push({el: el.children[i], parentStyle: style, rendered});
        }
      }
    }

    this.styleDirty = false;
    this.layoutDirty = true;
    this.styleUpdateCount++;
  }

  /**
   * Brings style up to date, then regenerates the box tree and the paint
   * tree if anything changed since the last time
   */
  updateLayout() {
    this.updateStyle();

    if (!this.layoutDirty) return;

    for (const el of this.laidOut) {
      if (el.ownerDocument === this) el.layoutNode = null;
    }

    const root = this.documentElement && generateBoxTree(this.documentElement);

    if (root) {
      root.layout();
      this.viewport = new Viewport(root);
      this.laidOut = root.elements();
    } else {
      this.viewport = null;
      this.laidOut = [];
    }

    this.layoutDirty = false;
    this.layoutUpdateCount++;
  }

  /**
   * The root of the paint tree, present after a layout pass with a rendered
   * document element
   */
  paintable() {
    return this.viewport;
  }
}
