import {describe, it} from 'node:test';
import assert from 'node:assert/strict';
import {dom, h} from '../src/api.js';
import {IDENTITY, combineTransforms, matrixForTransform, multiply} from '../src/paint.js';

import type {HTMLElement} from '../src/dom.js';
import type {Box} from '../src/layout-box.js';
import type {AffineMatrix} from '../src/paint.js';

function boxOf(el: HTMLElement): Box {
  assert.ok(el.layoutNode, `<${el.tagName}> ${el.id} has no box`);
  return el.layoutNode;
}

function assertMatrixClose(actual: AffineMatrix, expected: AffineMatrix) {
  for (const k of ['a', 'b', 'c', 'd', 'e', 'f'] as const) {
    assert.ok(Math.abs(actual[k] - expected[k]) < 1e-9, `${k}: ${actual[k]} != ${expected[k]}`);
  }
}

describe('Transform matrices', function () {
  it('is the identity for no functions', function () {
    assert.deepEqual(combineTransforms([]), IDENTITY);
  });

  it('applies the last function first', function () {
    assert.deepEqual(
      combineTransforms([{fn: 'translate', args: [10, 0]}, {fn: 'scale', args: [2]}]),
      {a: 2, b: 0, c: 0, d: 2, e: 10, f: 0}
    );
    assert.deepEqual(
      combineTransforms([{fn: 'scale', args: [2]}, {fn: 'translate', args: [10, 0]}]),
      {a: 2, b: 0, c: 0, d: 2, e: 20, f: 0}
    );
  });

  it('multiplies matrices', function () {
    const m = {a: 1, b: 2, c: 3, d: 4, e: 5, f: 6};
    assert.deepEqual(multiply(m, IDENTITY), m);
    assert.deepEqual(multiply(IDENTITY, m), m);
  });

  it('computes each function', function () {
    assert.deepEqual(matrixForTransform({fn: 'matrix', args: [1, 2, 3, 4, 5, 6]}), {a: 1, b: 2, c: 3, d: 4, e: 5, f: 6});
    assert.deepEqual(matrixForTransform({fn: 'translate', args: [7]}), {a: 1, b: 0, c: 0, d: 1, e: 7, f: 0});
    assert.deepEqual(matrixForTransform({fn: 'translateY', args: [7]}), {a: 1, b: 0, c: 0, d: 1, e: 0, f: 7});
    assert.deepEqual(matrixForTransform({fn: 'scale', args: [3]}), {a: 3, b: 0, c: 0, d: 3, e: 0, f: 0});
    assert.deepEqual(matrixForTransform({fn: 'scale', args: [3, 4]}), {a: 3, b: 0, c: 0, d: 4, e: 0, f: 0});
    assert.deepEqual(matrixForTransform({fn: 'scaleX', args: [3]}), {a: 3, b: 0, c: 0, d: 1, e: 0, f: 0});
    assertMatrixClose(matrixForTransform({fn: 'rotate', args: [90]}), {a: 0, b: 1, c: -1, d: 0, e: 0, f: 0});
    assertMatrixClose(matrixForTransform({fn: 'skewX', args: [45]}), {a: 1, b: 0, c: 1, d: 1, e: 0, f: 0});
    assertMatrixClose(matrixForTransform({fn: 'skewY', args: [45]}), {a: 1, b: 1, c: 0, d: 1, e: 0, f: 0});
  });
});

describe('Layout', function () {
  it('generates boxes for rendered elements only', function () {
    const span = h('span');
    const hidden = h('div', {style: {display: {outer: 'none', inner: 'none'}}}, [span]);
    const shown = h('div');
    const document = dom([hidden, shown]);
    document.updateLayout();
    assert.equal(hidden.layoutNode, null);
    assert.equal(span.layoutNode, null);
    assert.equal(boxOf(shown).parent, document.documentElement?.layoutNode);
  });

  it('prints the box tree', function () {
    const div = h('div');
    dom(div).updateLayout();
    const box = boxOf(div);
    assert.equal(box.repr(1), `  ◼︎ Box ${box.id} <div> ${div.id}`);
  });

  it('drops boxes of elements that stop being rendered', function () {
    const div = h('div');
    const document = dom(div);
    document.updateLayout();
    boxOf(div);
    div.setStyle({display: {outer: 'none', inner: 'none'}});
    document.updateLayout();
    assert.equal(div.layoutNode, null);
  });

  it('only lays out again after a change', function () {
    const div = h('div');
    const document = dom(div);
    document.updateLayout();
    document.updateLayout();
    assert.equal(document.layoutUpdateCount, 1);
    assert.equal(document.styleUpdateCount, 1);
    div.setStyle({color: {r: 1, g: 2, b: 3, a: 1}});
    document.updateLayout();
    assert.equal(document.layoutUpdateCount, 2);
    assert.equal(document.styleUpdateCount, 2);
  });

  it('computes the used line height', function () {
    const a = h('div', {style: {fontSize: 20}});
    const b = h('div', {style: {fontSize: 20, lineHeight: {value: 1.5, unit: null}}});
    const c = h('div', {style: {lineHeight: 18}});
    dom([a, b, c]).updateLayout();
    assert.equal(boxOf(a).lineHeight, 24);
    assert.equal(boxOf(b).lineHeight, 30);
    assert.equal(boxOf(c).lineHeight, 18);
  });

  it('repeats background positions over the layers', function () {
    const div = h('div', {style: {
      backgroundImage: ['a.png', 'b.png', 'c.png'],
      backgroundPositionX: [{edge: 'left', offset: 10}, {edge: 'right', offset: {value: 50, unit: '%'}}],
      backgroundPositionY: [{edge: 'bottom', offset: 4}]
    }});
    dom(div).updateLayout();
    assert.deepEqual(boxOf(div).backgroundLayers, [
      {image: 'a.png', positionEdgeX: 'left', positionOffsetX: 10, positionEdgeY: 'bottom', positionOffsetY: 4},
      {
        image: 'b.png',
        positionEdgeX: 'right',
        positionOffsetX: {value: 50, unit: '%'},
        positionEdgeY: 'bottom',
        positionOffsetY: 4
      },
      {image: 'c.png', positionEdgeX: 'left', positionOffsetX: 10, positionEdgeY: 'bottom', positionOffsetY: 4}
    ]);
  });

  it('gives boxes a new style without laying out again', function () {
    const div = h('div');
    const document = dom(div);
    document.updateLayout();
    const box = boxOf(div);

    div.setStyle({fontSize: 10, backgroundImage: ['a.png']});
    document.updateStyle();
    assert.equal(div.layoutNode, box);
    assert.equal(box.style, div.style);
    assert.equal(box.lineHeight, 12);
    assert.deepEqual(box.backgroundLayers, [
      {image: 'a.png', positionEdgeX: 'left', positionOffsetX: {value: 0, unit: '%'}, positionEdgeY: 'top', positionOffsetY: {value: 0, unit: '%'}}
    ]);
    assert.equal(document.layoutUpdateCount, 1);
  });

  it('has no background layers without images', function () {
    const div = h('div');
    dom(div).updateLayout();
    assert.deepEqual(boxOf(div).backgroundLayers, []);
  });
});

describe('Stacking contexts', function () {
  it('builds stacking contexts on demand, once per layout', function () {
    const div = h('div', {style: {transform: [{fn: 'translateX', args: [5]}]}});
    const document = dom(div);
    document.updateLayout();

    const viewport = document.paintable();
    assert.ok(viewport);
    assert.equal(viewport.stackingContextRoot, null);
    viewport.buildStackingContextTreeIfNeeded();
    const root = viewport.stackingContextRoot;
    assert.ok(root);
    viewport.buildStackingContextTreeIfNeeded();
    assert.equal(viewport.stackingContextRoot, root);

    div.setStyle({transform: [{fn: 'translateX', args: [6]}]});
    document.updateLayout();
    assert.notEqual(document.paintable(), viewport);
  });

  it('creates contexts for transforms, opacity and positioned z-index', function () {
    const a = h('div', {style: {transform: [{fn: 'scale', args: [2]}]}});
    const b = h('div', {style: {position: 'relative', zIndex: 2}});
    const c = h('div', {style: {opacity: 0.5}});
    const d = h('div', {style: {position: 'relative', zIndex: -1}});
    const e = h('div', {style: {zIndex: 5}});
    const document = dom([a, b, c, d, e]);
    document.updateLayout();
    const viewport = document.paintable();
    assert.ok(viewport);
    viewport.buildStackingContextTreeIfNeeded();

    const root = viewport.stackingContextRoot;
    assert.ok(root);
    assert.deepEqual(root.children.map(context => context.paintBox.box.element), [d, a, c, b]);
    assert.equal(boxOf(e).paintable?.stackingContext, null);
    assert.deepEqual(boxOf(a).paintable?.stackingContext?.affineTransformMatrix(), {a: 2, b: 0, c: 0, d: 2, e: 0, f: 0});
  });

  it('nests contexts inside their parent context', function () {
    const inner = h('div', {style: {opacity: 0.9}});
    const outer = h('div', {style: {opacity: 0.5}}, [h('div', [inner])]);
    const document = dom(outer);
    document.updateLayout();
    const viewport = document.paintable();
    assert.ok(viewport);
    viewport.buildStackingContextTreeIfNeeded();

    const context = boxOf(inner).paintable?.stackingContext;
    assert.ok(context);
    assert.equal(context.parent, boxOf(outer).paintable?.stackingContext);
  });
});
