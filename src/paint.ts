import type {Box} from './layout-box.js';
import type {Transform} from './style.js';

/**
 * A 2D affine transform as the six components of
 *
 *   | a c e |
 *   | b d f |
 *   | 0 0 1 |
 */
export interface AffineMatrix {
  a: number;
  b: number;
  c: number;
  d: number;
  e: number;
  f: number;
}

export const IDENTITY: Readonly<AffineMatrix> = Object.freeze({a: 1, b: 0, c: 0, d: 1, e: 0, f: 0});

export function multiply(m: AffineMatrix, n: AffineMatrix): AffineMatrix {
  return {
    a: m.a * n.a + m.c * n.b,
    b: m.b * n.a + m.d * n.b,
    c: m.a * n.c + m.c * n.d,
    d: m.b * n.c + m.d * n.d,
    e: m.a * n.e + m.c * n.f + m.e,
    f: m.b * n.e + m.d * n.f + m.f
  };
}

function rad(deg: number) {
  return deg * Math.PI / 180;
}

// https://www.w3.org/TR/css-transforms-1/#two-d-transform-functions
export function matrixForTransform(t: Transform): AffineMatrix {
  switch (t.fn) {
    case 'matrix': {
      const [a, b, c, d, e, f] = t.args;
      return {a, b, c, d, e, f};
    }
    case 'translate': {
      const [tx, ty = 0] = t.args;
      return {a: 1, b: 0, c: 0, d: 1, e: tx, f: ty};
    }
    case 'translateX':
      return {a: 1, b: 0, c: 0, d: 1, e: t.args[0], f: 0};
    case 'translateY':
      return {a: 1, b: 0, c: 0, d: 1, e: 0, f: t.args[0]};
    case 'scale': {
      const [sx, sy = sx] = t.args;
      return {a: sx, b: 0, c: 0, d: sy, e: 0, f: 0};
    }
    case 'scaleX':
      return {a: t.args[0], b: 0, c: 0, d: 1, e: 0, f: 0};
    case 'scaleY':
      return {a: 1, b: 0, c: 0, d: t.args[0], e: 0, f: 0};
    case 'rotate': {
      const r = rad(t.args[0]);
      return {a: Math.cos(r), b: Math.sin(r), c: -Math.sin(r), d: Math.cos(r), e: 0, f: 0};
    }
    case 'skewX':
      return {a: 1, b: 0, c: Math.tan(rad(t.args[0])), d: 1, e: 0, f: 0};
    case 'skewY':
      return {a: 1, b: Math.tan(rad(t.args[0])), c: 0, d: 1, e: 0, f: 0};
  }
}

/**
 * Post-multiplies the functions left to right, so the last function listed
 * is the first applied to a point
 */
export function combineTransforms(transforms: readonly Transform[]): AffineMatrix {
  let m: AffineMatrix = {...IDENTITY};
  for (const t of transforms) m = multiply(m, matrixForTransform(t));
  return m;
}

export class PaintBox {
  box: Box;
  parent: PaintBox | null;
  children: PaintBox[];
  stackingContext: StackingContext | null;

  constructor(box: Box, parent: PaintBox | null) {
    this.box = box;
    this.parent = parent;
    this.children = [];
    this.stackingContext = null;
  }
}

export class StackingContext {
  paintBox: PaintBox;
  parent: StackingContext | null;
  /**
   * Painted back to front: negative z-index first, then tree order for equal
   * z-index, then positive
   */
  children: StackingContext[];
  private transform: AffineMatrix;

  constructor(paintBox: PaintBox, parent: StackingContext | null) {
    this.paintBox = paintBox;
    this.parent = parent;
    this.children = [];
    this.transform = combineTransforms(paintBox.box.style.transform);
  }

  get zIndex() {
    const zIndex = this.paintBox.box.style.zIndex;
    return zIndex === 'auto' ? 0 : zIndex;
  }

  finalize() {
    // Array.prototype.sort is stable, so tree order is kept for equal z-index
    this.children.sort((a, b) => a.zIndex - b.zIndex);
    for (const child of this.children) child.finalize();
  }

  affineTransformMatrix(): AffineMatrix {
    return {...this.transform};
  }
}

/**
 * Root of the paint tree. A new one is created by every layout pass, so the
 * stacking context tree is built at most once per layout.
 */
export class Viewport {
  root: PaintBox;
  stackingContextRoot: StackingContext | null;

  constructor(rootBox: Box) {
    this.root = createPaintTree(rootBox);
    this.stackingContextRoot = null;
  }

  buildStackingContextTreeIfNeeded() {
    if (this.stackingContextRoot) return;

    const root = new StackingContext(this.root, null);
    const stack: {paintBox: PaintBox, context: StackingContext}[] = [];

    this.root.stackingContext = root;
    for (let i = this.root.children.length - 1; i >= 0; i--) {
      stack.push({paintBox: this.root.children[i], context: root});
    }

    while (stack.length) {
      const item = stack.pop();
      if (!item) break;
      const {paintBox, context} = item;
      let childContext = context;

      if (paintBox.box.isStackingContextRoot()) {
        childContext = new StackingContext(paintBox, context);
        context.children.push(childContext);
        paintBox.stackingContext = childContext;
      }

      for (let i = paintBox.children.length - 1; i >= 0; i--) {
        stack.push({paintBox: paintBox.children[i], context: childContext});
      }
    }

    root.finalize();
    this.stackingContextRoot = root;
  }
}

function createPaintTree(rootBox: Box) {
  const root = new PaintBox(rootBox, null);
  const stack: PaintBox[] = [root];

  rootBox.paintable = root;

  while (stack.length) {
    const paintBox = stack.pop();
    if (!paintBox) break;
    for (const box of paintBox.box.children) {
      const child = new PaintBox(box, paintBox);
      box.paintable = child;
      paintBox.children.push(child);
      stack.push(child);
    }
  }

  return root;
}
