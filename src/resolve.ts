import {environment} from './environment.js';
import {longhandsForShorthand} from './property-id.js';
import {
  colorValue,
  edge,
  identifier,
  length,
  lengthPercentageValue,
  list,
  number,
  percentage,
  position,
  shorthand,
  sizeValue,
  styleValuesEqual,
  transformation
} from './style-value.js';

import type {BackgroundLayerData, Box} from './layout-box.js';
import type {LonghandId, PropertyId, ShorthandId} from './property-id.js';
import type {StyleValue} from './style-value.js';

type LonghandResolver = (box: Box) => StyleValue;

type ShorthandResolver = (box: Box, id: ShorthandId) => StyleValue | null;

// https://www.w3.org/TR/cssom-1/#resolved-values
// Any other property: the resolved value is the computed value
function computed(id: LonghandId): LonghandResolver {
  return box => box.computedValues().property(id);
}

function resolveTransform(box: Box): StyleValue {
  const transforms = box.computedValues().transform;
  if (transforms.length === 0) return identifier('none');

  // The matrix belongs to the stacking context, so the tree has to exist
  const viewport = box.document().paintable();
  if (!viewport) throw new Error(`Assertion failed: box ${box.id} has no viewport`);
  viewport.buildStackingContextTreeIfNeeded();

  const paintable = box.paintable;
  if (!paintable) throw new Error(`Assertion failed: box ${box.id} has no paintable`);
  const context = paintable.stackingContext;
  if (!context) throw new Error(`Assertion failed: paintable for box ${box.id} has no stacking context`);

  // TODO: serialize as matrix3d once 3D transform functions are computed
  const {a, b, c, d, e, f} = context.affineTransformMatrix();
  const matrix = transformation('matrix', [a, b, c, d, e, f].map(n => number(n)));

  // transform is always a list of functions elsewhere, so keep the shape
  return list([matrix], 'space');
}

function resolveLineHeight(box: Box): StyleValue {
  if (box.computedValues().lineHeight === 'normal') return identifier('normal');
  return length(box.lineHeight);
}

const longhandResolvers: {[K in LonghandId]: LonghandResolver} = Object.freeze({
  'background-clip': computed('background-clip'),
  // For colors the resolved value is the used value
  'background-color': box => colorValue(box.computedValues().backgroundColor),
  'background-image': computed('background-image'),
  'background-position-x': computed('background-position-x'),
  'background-position-y': computed('background-position-y'),
  'border-bottom-color': box => colorValue(box.computedValues().getBorder('bottom').color),
  'border-bottom-style': computed('border-bottom-style'),
  'border-bottom-width': computed('border-bottom-width'),
  'border-left-color': box => colorValue(box.computedValues().getBorder('left').color),
  'border-left-style': computed('border-left-style'),
  'border-left-width': computed('border-left-width'),
  'border-right-color': box => colorValue(box.computedValues().getBorder('right').color),
  'border-right-style': computed('border-right-style'),
  'border-right-width': computed('border-right-width'),
  'border-top-color': box => colorValue(box.computedValues().getBorder('top').color),
  'border-top-style': computed('border-top-style'),
  'border-top-width': computed('border-top-width'),
  // Insets, margins, paddings and sizes resolve to the computed value here.
  // The used value is only meaningful once boxes have geometry.
  'bottom': box => lengthPercentageValue(box.computedValues().getInset().bottom),
  'box-sizing': computed('box-sizing'),
  'clear': computed('clear'),
  'color': box => colorValue(box.computedValues().color),
  'direction': computed('direction'),
  'display': computed('display'),
  'float': computed('float'),
  'font-family': computed('font-family'),
  'font-size': computed('font-size'),
  'font-stretch': computed('font-stretch'),
  'font-style': computed('font-style'),
  'font-variant': computed('font-variant'),
  'font-weight': computed('font-weight'),
  'height': box => sizeValue(box.computedValues().height),
  'left': box => lengthPercentageValue(box.computedValues().getInset().left),
  'line-height': resolveLineHeight,
  'margin-bottom': box => lengthPercentageValue(box.computedValues().getMargin().bottom),
  'margin-left': box => lengthPercentageValue(box.computedValues().getMargin().left),
  'margin-right': box => lengthPercentageValue(box.computedValues().getMargin().right),
  'margin-top': box => lengthPercentageValue(box.computedValues().getMargin().top),
  'opacity': computed('opacity'),
  'outline-color': box => colorValue(box.computedValues().outlineColor),
  'outline-style': computed('outline-style'),
  'outline-width': computed('outline-width'),
  'overflow': computed('overflow'),
  'overflow-wrap': computed('overflow-wrap'),
  'padding-bottom': box => lengthPercentageValue(box.computedValues().getPadding().bottom),
  'padding-left': box => lengthPercentageValue(box.computedValues().getPadding().left),
  'padding-right': box => lengthPercentageValue(box.computedValues().getPadding().right),
  'padding-top': box => lengthPercentageValue(box.computedValues().getPadding().top),
  'position': computed('position'),
  'right': box => lengthPercentageValue(box.computedValues().getInset().right),
  'tab-size': computed('tab-size'),
  'text-align': computed('text-align'),
  'text-decoration-color': box => colorValue(box.computedValues().textDecorationColor),
  'text-decoration-line': computed('text-decoration-line'),
  'top': box => lengthPercentageValue(box.computedValues().getInset().top),
  'transform': resolveTransform,
  'vertical-align': computed('vertical-align'),
  'white-space': computed('white-space'),
  'width': box => sizeValue(box.computedValues().width),
  'word-break': computed('word-break'),
  'writing-mode': computed('writing-mode'),
  'z-index': computed('z-index')
});

export function resolveLonghand(box: Box, id: LonghandId): StyleValue {
  return longhandResolvers[id](box);
}

/**
 * Collapses four sides into the shortest equivalent form: one value if all
 * sides match, otherwise a space-separated list of two, three or four.
 */
export function sidedShorthandValue(
  top: StyleValue,
  right: StyleValue,
  bottom: StyleValue,
  left: StyleValue
): StyleValue {
  const topAndBottomSame = styleValuesEqual(top, bottom);
  const leftAndRightSame = styleValuesEqual(left, right);

  if (topAndBottomSame && leftAndRightSame && styleValuesEqual(top, left)) return top;
  if (topAndBottomSame && leftAndRightSame) return list([top, right], 'space');
  if (leftAndRightSame) return list([top, right, bottom], 'space');
  return list([top, right, bottom, left], 'space');
}

function sided(
  top: LonghandId,
  right: LonghandId,
  bottom: LonghandId,
  left: LonghandId
): (box: Box) => StyleValue {
  return box => sidedShorthandValue(
    resolveLonghand(box, top),
    resolveLonghand(box, right),
    resolveLonghand(box, bottom),
    resolveLonghand(box, left)
  );
}

const resolveBorderWidth = sided('border-top-width', 'border-right-width', 'border-bottom-width', 'border-left-width');
const resolveBorderStyle = sided('border-top-style', 'border-right-style', 'border-bottom-style', 'border-left-style');
const resolveBorderColor = sided('border-top-color', 'border-right-color', 'border-bottom-color', 'border-left-color');

function resolveBorder(box: Box): StyleValue | null {
  const width = resolveBorderWidth(box);
  const style = resolveBorderStyle(box);
  const color = resolveBorderColor(box);

  // Only a border with the same value on every side has a single value
  if (width.type === 'list' || style.type === 'list' || color.type === 'list') return null;

  return shorthand('border', ['border-width', 'border-style', 'border-color'], [width, style, color]);
}

function layerPosition(layer: BackgroundLayerData) {
  return position(
    edge(layer.positionEdgeX, lengthPercentageValue(layer.positionOffsetX)),
    edge(layer.positionEdgeY, lengthPercentageValue(layer.positionOffsetY))
  );
}

function resolveBackgroundPosition(box: Box): StyleValue {
  const layers = box.backgroundLayers;
  if (layers.length === 0) return position(edge('left', percentage(0)), edge('top', percentage(0)));
  if (layers.length === 1) return layerPosition(layers[0]);
  return list(layers.map(layerPosition), 'comma');
}

/**
 * Resolves every longhand of the shorthand and pairs them up in order
 */
function resolveShorthandGeneric(box: Box, id: ShorthandId): StyleValue {
  const longhands = longhandsForShorthand(id);
  return shorthand(id, longhands, longhands.map(longhand => resolveLonghand(box, longhand)));
}

const shorthandResolvers: {[K in ShorthandId]: ShorthandResolver} = Object.freeze({
  'background-position': resolveBackgroundPosition,
  'border': resolveBorder,
  'border-bottom': resolveShorthandGeneric,
  'border-color': resolveBorderColor,
  'border-left': resolveShorthandGeneric,
  'border-right': resolveShorthandGeneric,
  'border-style': resolveBorderStyle,
  'border-top': resolveShorthandGeneric,
  'border-width': resolveBorderWidth,
  'font': resolveShorthandGeneric,
  'inset': resolveShorthandGeneric,
  'margin': sided('margin-top', 'margin-right', 'margin-bottom', 'margin-left'),
  'outline': resolveShorthandGeneric,
  'padding': sided('padding-top', 'padding-right', 'padding-bottom', 'padding-left'),
  'text-decoration': resolveShorthandGeneric
});

export function resolveShorthand(box: Box, id: ShorthandId): StyleValue | null {
  return shorthandResolvers[id](box, id);
}

/**
 * The resolved value of a property for a box that has been laid out, or null
 * if the property has none (custom properties, a border whose sides differ).
 *
 * Apart from building the stacking context tree for `transform`, this does
 * not change the document.
 */
export function styleValueForProperty(box: Box, id: PropertyId): StyleValue | null {
  switch (id) {
    case 'invalid':
      return identifier('invalid');
    case 'custom':
      if (environment.cssDebug) environment.log('Computed style for custom properties was requested (?)');
      return null;
    case 'background-position':
    case 'border':
    case 'border-bottom':
    case 'border-color':
    case 'border-left':
    case 'border-right':
    case 'border-style':
    case 'border-top':
    case 'border-width':
    case 'font':
    case 'inset':
    case 'margin':
    case 'outline':
    case 'padding':
    case 'text-decoration':
      return resolveShorthand(box, id);
    default:
      return resolveLonghand(box, id);
  }
}
