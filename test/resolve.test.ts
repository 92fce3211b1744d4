import {afterEach, beforeEach, describe, it} from 'node:test';
import assert from 'node:assert/strict';
import {calc, dom, h} from '../src/api.js';
import {environment, resetEnvironment} from '../src/environment.js';
import {longhandsForShorthand} from '../src/property-id.js';
import {resolveLonghand, sidedShorthandValue, styleValueForProperty} from '../src/resolve.js';
import {
  color,
  edge,
  identifier,
  length,
  list,
  number,
  percentage,
  position,
  serializeStyleValue,
  shorthand,
  styleValuesEqual,
  transformation
} from '../src/style-value.js';

import type {Box} from '../src/layout-box.js';
import type {PropertyId, ShorthandId} from '../src/property-id.js';
import type {DeclaredStyle} from '../src/style.js';
import type {StyleValue} from '../src/style-value.js';

const black = {r: 0, g: 0, b: 0, a: 1};
const green = {r: 0, g: 128, b: 0, a: 1};

function layoutBox(declared: DeclaredStyle = {}): Box {
  const div = h('div', {style: declared});
  dom(div).updateLayout();
  assert.ok(div.layoutNode);
  return div.layoutNode;
}

function resolve(box: Box, id: PropertyId): StyleValue {
  const value = styleValueForProperty(box, id);
  assert.ok(value, `${id} has no resolved value`);
  return value;
}

describe('Sided shorthands', function () {
  const [a, b, c, d] = [length(1), length(2), length(3), length(4)];

  it('collapses four equal sides to one value', function () {
    assert.equal(sidedShorthandValue(a, length(1), length(1), length(1)), a);
  });

  it('uses two values when top matches bottom and left matches right', function () {
    assert.deepEqual(sidedShorthandValue(a, b, a, b), list([a, b], 'space'));
  });

  it('uses three values when only left matches right', function () {
    assert.deepEqual(sidedShorthandValue(a, b, c, b), list([a, b, c], 'space'));
    assert.deepEqual(sidedShorthandValue(a, a, b, a), list([a, a, b], 'space'));
  });

  it('uses four values otherwise', function () {
    assert.deepEqual(sidedShorthandValue(a, b, c, d), list([a, b, c, d], 'space'));
    assert.deepEqual(sidedShorthandValue(a, b, a, c), list([a, b, a, c], 'space'));
  });

  it('collapses margin and padding', function () {
    const box = layoutBox({marginTop: 4, marginRight: 8, marginBottom: 4, marginLeft: 8});
    assert.deepEqual(resolve(box, 'margin'), list([length(4), length(8)], 'space'));
    assert.deepEqual(resolve(box, 'padding'), length(0));
  });

  it('collapses border sides', function () {
    const box = layoutBox({borderTopStyle: 'solid', borderBottomStyle: 'solid'});
    assert.deepEqual(resolve(box, 'border-width'), length(3));
    assert.deepEqual(resolve(box, 'border-style'), list([identifier('solid'), identifier('none')], 'space'));
    assert.deepEqual(resolve(box, 'border-color'), color(black));
  });
});

describe('border', function () {
  it('combines uniform sides', function () {
    const box = layoutBox({
      borderTopStyle: 'dashed',
      borderRightStyle: 'dashed',
      borderBottomStyle: 'dashed',
      borderLeftStyle: 'dashed'
    });
    const border = resolve(box, 'border');
    assert.deepEqual(border, shorthand(
      'border',
      ['border-width', 'border-style', 'border-color'],
      [length(3), identifier('dashed'), color(black)]
    ));
    assert.equal(serializeStyleValue(border), '3px dashed rgb(0, 0, 0)');
  });

  it('has no value when widths differ', function () {
    assert.equal(styleValueForProperty(layoutBox({borderTopWidth: 1}), 'border'), null);
  });

  it('has no value when styles differ', function () {
    assert.equal(styleValueForProperty(layoutBox({borderLeftStyle: 'solid'}), 'border'), null);
  });

  it('has no value when colors differ', function () {
    assert.equal(styleValueForProperty(layoutBox({borderRightColor: green}), 'border'), null);
  });
});

describe('background-position', function () {
  it('is left 0% top 0% without layers', function () {
    assert.deepEqual(
      resolve(layoutBox(), 'background-position'),
      position(edge('left', percentage(0)), edge('top', percentage(0)))
    );
  });

  it('is the position of a single layer', function () {
    const box = layoutBox({
      backgroundImage: ['a.png'],
      backgroundPositionX: [{edge: 'right', offset: 10}],
      backgroundPositionY: [{edge: 'bottom', offset: {value: 25, unit: '%'}}]
    });
    assert.deepEqual(
      resolve(box, 'background-position'),
      position(edge('right', length(10)), edge('bottom', percentage(25)))
    );
  });

  it('is a comma-separated list for several layers', function () {
    const box = layoutBox({
      backgroundImage: ['a.png', 'b.png'],
      backgroundPositionX: [{edge: 'left', offset: 1}, {edge: 'left', offset: 2}]
    });
    const value = resolve(box, 'background-position');
    assert.deepEqual(value, list([
      position(edge('left', length(1)), edge('top', percentage(0))),
      position(edge('left', length(2)), edge('top', percentage(0)))
    ], 'comma'));
    assert.equal(serializeStyleValue(value), 'left 1px top 0%, left 2px top 0%');
  });
});

describe('transform', function () {
  it('is none without transform functions', function () {
    assert.deepEqual(resolve(layoutBox(), 'transform'), identifier('none'));
  });

  it('is one matrix built from the stacking context', function () {
    const box = layoutBox({transform: [{fn: 'translate', args: [10, 20]}, {fn: 'scale', args: [2]}]});
    const value = resolve(box, 'transform');
    assert.deepEqual(value, list([transformation('matrix', [2, 0, 0, 2, 10, 20].map(n => number(n)))], 'space'));
    assert.equal(serializeStyleValue(value), 'matrix(2, 0, 0, 2, 10, 20)');
    assert.ok(box.document().paintable()?.stackingContextRoot);
  });

  it('requires a paint tree', function () {
    const box = layoutBox({transform: [{fn: 'rotate', args: [45]}]});
    box.paintable = null;
    assert.throws(() => styleValueForProperty(box, 'transform'), /Assertion failed/);
  });
});

describe('line-height', function () {
  it('keeps normal', function () {
    assert.deepEqual(resolve(layoutBox({fontSize: 20}), 'line-height'), identifier('normal'));
  });

  it('is the used value otherwise', function () {
    assert.deepEqual(resolve(layoutBox({fontSize: 20, lineHeight: {value: 1.5, unit: null}}), 'line-height'), length(30));
    assert.deepEqual(resolve(layoutBox({lineHeight: 18}), 'line-height'), length(18));
  });
});

describe('Longhands', function () {
  it('resolves colors to the used color', function () {
    const box = layoutBox({color: green, borderLeftColor: 'currentcolor'});
    assert.deepEqual(resolve(box, 'border-left-color'), color(green));
    assert.deepEqual(resolve(box, 'text-decoration-color'), color(green));
    assert.deepEqual(resolve(box, 'background-color'), color({r: 0, g: 0, b: 0, a: 0}));
  });

  it('resolves sizes and offsets to their computed values', function () {
    const expression = calc('100% - 8px');
    const box = layoutBox({width: {value: 50, unit: '%'}, height: expression, left: 4, paddingTop: {value: 1, unit: 'em'}});
    assert.deepEqual(resolve(box, 'width'), percentage(50));
    assert.equal(resolve(box, 'height'), expression);
    assert.deepEqual(resolve(box, 'left'), length(4));
    assert.deepEqual(resolve(box, 'top'), identifier('auto'));
    assert.deepEqual(resolve(box, 'padding-top'), length(16));
  });

  it('uses the computed value for everything else', function () {
    const box = layoutBox({zIndex: 3, opacity: 0.25});
    assert.deepEqual(resolve(box, 'display'), identifier('block'));
    assert.deepEqual(resolve(box, 'z-index'), {type: 'integer', value: 3});
    assert.deepEqual(resolve(box, 'opacity'), number(0.25));
    assert.deepEqual(resolve(box, 'font-weight'), number(400));
  });
});

describe('Sentinels', function () {
  let logged: string[] = [];

  beforeEach(function () {
    logged = [];
    environment.log = message => logged.push(message);
  });

  afterEach(function () {
    resetEnvironment();
  });

  it('resolves invalid to the invalid keyword', function () {
    assert.deepEqual(resolve(layoutBox(), 'invalid'), identifier('invalid'));
  });

  it('has no value for custom properties', function () {
    assert.equal(styleValueForProperty(layoutBox(), 'custom'), null);
    assert.deepEqual(logged, []);
  });

  it('logs custom property queries when debugging', function () {
    environment.cssDebug = true;
    assert.equal(styleValueForProperty(layoutBox(), 'custom'), null);
    assert.deepEqual(logged, ['Computed style for custom properties was requested (?)']);
  });
});

describe('Generic shorthands', function () {
  const generic: ShorthandId[] = ['border-top', 'border-left', 'font', 'inset', 'outline', 'text-decoration'];

  for (const id of generic) {
    it(`${id} wraps its resolved longhands`, function () {
      const box = layoutBox({
        fontSize: 20,
        lineHeight: {value: 1.5, unit: null},
        borderTopStyle: 'solid',
        outlineColor: green,
        textDecorationLine: ['underline']
      });
      const longhands = longhandsForShorthand(id);
      const expected = shorthand(id, longhands, longhands.map(longhand => resolveLonghand(box, longhand)));
      assert.equal(styleValuesEqual(resolve(box, id), expected), true);
    });
  }

  it('uses the used line height inside font', function () {
    const box = layoutBox({fontSize: 20, lineHeight: {value: 1.5, unit: null}, fontFamily: ['Arimo', 'serif']});
    assert.equal(
      serializeStyleValue(resolve(box, 'font')),
      'normal normal 400 normal 20px 30px "Arimo", serif'
    );
  });

  it('serializes outline in longhand order', function () {
    const box = layoutBox({outlineColor: green, outlineStyle: 'dotted', outlineWidth: 2});
    assert.equal(serializeStyleValue(resolve(box, 'outline')), 'rgb(0, 128, 0) dotted 2px');
  });
});
