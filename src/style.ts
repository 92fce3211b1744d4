import {
  angle,
  colorValue,
  edge,
  identifier,
  integer,
  length,
  lengthPercentageValue,
  list,
  number,
  percentage,
  sizeValue,
  string,
  transformation,
  url
} from './style-value.js';

import type {HTMLElement} from './dom.js';
import type {LonghandId} from './property-id.js';
import type {CalculatedValue, StyleValue, TransformFunction} from './style-value.js';

export const inherited = Symbol('inherited');

type Inherited = typeof inherited;

export const initial = Symbol('initial');

type Initial = typeof initial;

type CssWide = Inherited | Initial;

export type WhiteSpace = 'normal' | 'nowrap' | 'pre-wrap' | 'pre-line' | 'pre';

export type Em = {value: number, unit: 'em'};

type Length = number | Em;

export type Percentage = {value: number, unit: '%'};

type Number = {value: number, unit: null};

/**
 * Computed <length-percentage>: px, a percentage, or a calc() mixing the two
 */
export type LengthPercentage = number | Percentage | CalculatedValue;

type DeclaredLengthPercentage = Length | Percentage | CalculatedValue;

export type FitContent = {fitContent: LengthPercentage};

export type Size = LengthPercentage | 'auto' | 'none' | 'min-content'
  | 'max-content' | 'fit-content' | FitContent;

type DeclaredSize = DeclaredLengthPercentage | 'auto' | 'none' | 'min-content'
  | 'max-content' | 'fit-content' | FitContent;

type FontWeight = number | 'normal' | 'bolder' | 'lighter';

type FontStyle = 'normal' | 'italic' | 'oblique';

type FontVariant = 'normal' | 'small-caps';

export type FontStretch = 'normal' | 'ultra-condensed' | 'extra-condensed' | 'condensed'
  | 'semi-condensed' | 'semi-expanded' | 'expanded'
  | 'extra-expanded' | 'ultra-expanded';

type VerticalAlign = 'baseline' | 'middle' | 'sub' | 'super' | 'text-top'
  | 'text-bottom' | 'top' | 'bottom';

type BackgroundClip = 'border-box' | 'padding-box' | 'content-box';

export type Direction = 'ltr' | 'rtl';

type Display = {outer: OuterDisplay, inner: InnerDisplay};

export type WritingMode = 'horizontal-tb' | 'vertical-lr' | 'vertical-rl';

type Position = 'absolute' | 'relative' | 'static' | 'fixed' | 'sticky';

export type Color = {r: number, g: number, b: number, a: number};

type OuterDisplay = 'inline' | 'block' | 'none';

type InnerDisplay = 'flow' | 'flow-root' | 'none';

type BorderStyle = 'none' | 'hidden' | 'dotted' | 'dashed' | 'solid'
  | 'double' | 'groove' | 'ridge' | 'inset' | 'outset';

type BoxSizing = 'border-box' | 'content-box';

export type TextAlign = 'start' | 'end' | 'left' | 'right' | 'center';

type Float = 'left' | 'right' | 'none';

type Clear = 'left' | 'right' | 'both' | 'none';

type TextDecorationLine = 'underline' | 'overline' | 'line-through';

export type BackgroundPositionX = {edge: 'left' | 'right', offset: LengthPercentage};

export type BackgroundPositionY = {edge: 'top' | 'bottom', offset: LengthPercentage};

/**
 * Transform functions as they are specified. Translations are px, rotations
 * and skews are degrees.
 */
export type Transform =
  | {fn: 'matrix', args: [number, number, number, number, number, number]}
  | {fn: 'translate' | 'scale', args: [number] | [number, number]}
  | {fn: Exclude<TransformFunction, 'matrix' | 'translate' | 'scale'>, args: [number]};

export type Sides<T> = {top: T, right: T, bottom: T, left: T};

export type Side = keyof Sides<unknown>;

export type BorderSide = {width: number, style: BorderStyle, color: Color};

export interface DeclaredStyle {
  backgroundClip?: BackgroundClip | CssWide;
  backgroundColor?: Color | 'currentcolor' | CssWide;
  backgroundImage?: string[] | CssWide;
  backgroundPositionX?: BackgroundPositionX[] | CssWide;
  backgroundPositionY?: BackgroundPositionY[] | CssWide;
  borderTopColor?: Color | 'currentcolor' | CssWide;
  borderRightColor?: Color | 'currentcolor' | CssWide;
  borderBottomColor?: Color | 'currentcolor' | CssWide;
  borderLeftColor?: Color | 'currentcolor' | CssWide;
  borderTopStyle?: BorderStyle | CssWide;
  borderRightStyle?: BorderStyle | CssWide;
  borderBottomStyle?: BorderStyle | CssWide;
  borderLeftStyle?: BorderStyle | CssWide;
  borderTopWidth?: Length | CssWide;
  borderRightWidth?: Length | CssWide;
  borderBottomWidth?: Length | CssWide;
  borderLeftWidth?: Length | CssWide;
  top?: DeclaredLengthPercentage | 'auto' | CssWide;
  right?: DeclaredLengthPercentage | 'auto' | CssWide;
  bottom?: DeclaredLengthPercentage | 'auto' | CssWide;
  left?: DeclaredLengthPercentage | 'auto' | CssWide;
  boxSizing?: BoxSizing | CssWide;
  clear?: Clear | CssWide;
  color?: Color | CssWide;
  direction?: Direction | CssWide;
  display?: Display | CssWide;
  float?: Float | CssWide;
  fontFamily?: string[] | CssWide;
  fontSize?: Length | Percentage | CssWide;
  fontStretch?: FontStretch | CssWide;
  fontStyle?: FontStyle | CssWide;
  fontVariant?: FontVariant | CssWide;
  fontWeight?: FontWeight | CssWide;
  width?: DeclaredSize | CssWide;
  height?: DeclaredSize | CssWide;
  lineHeight?: 'normal' | Length | Percentage | Number | CssWide;
  marginTop?: DeclaredLengthPercentage | 'auto' | CssWide;
  marginRight?: DeclaredLengthPercentage | 'auto' | CssWide;
  marginBottom?: DeclaredLengthPercentage | 'auto' | CssWide;
  marginLeft?: DeclaredLengthPercentage | 'auto' | CssWide;
  opacity?: number | CssWide;
  outlineColor?: Color | 'currentcolor' | CssWide;
  outlineStyle?: BorderStyle | CssWide;
  outlineWidth?: Length | CssWide;
  overflow?: 'visible' | 'hidden' | CssWide;
  overflowWrap?: 'anywhere' | 'break-word' | 'normal' | CssWide;
  paddingTop?: DeclaredLengthPercentage | CssWide;
  paddingRight?: DeclaredLengthPercentage | CssWide;
  paddingBottom?: DeclaredLengthPercentage | CssWide;
  paddingLeft?: DeclaredLengthPercentage | CssWide;
  position?: Position | CssWide;
  tabSize?: Length | Number | CssWide;
  textAlign?: TextAlign | CssWide;
  textDecorationColor?: Color | 'currentcolor' | CssWide;
  textDecorationLine?: TextDecorationLine[] | CssWide;
  transform?: Transform[] | CssWide;
  verticalAlign?: VerticalAlign | Length | Percentage | CssWide;
  whiteSpace?: WhiteSpace | CssWide;
  wordBreak?: 'break-word' | 'normal' | CssWide;
  writingMode?: WritingMode | CssWide;
  zIndex?: number | 'auto' | CssWide;
}

export const EMPTY_STYLE: DeclaredStyle = Object.freeze({});

export interface ComputedStyle {
  backgroundClip: BackgroundClip;
  backgroundColor: Color;
  backgroundImage: readonly string[];
  backgroundPositionX: readonly BackgroundPositionX[];
  backgroundPositionY: readonly BackgroundPositionY[];
  borderTopColor: Color;
  borderRightColor: Color;
  borderBottomColor: Color;
  borderLeftColor: Color;
  borderTopStyle: BorderStyle;
  borderRightStyle: BorderStyle;
  borderBottomStyle: BorderStyle;
  borderLeftStyle: BorderStyle;
  borderTopWidth: number;
  borderRightWidth: number;
  borderBottomWidth: number;
  borderLeftWidth: number;
  top: LengthPercentage | 'auto';
  right: LengthPercentage | 'auto';
  bottom: LengthPercentage | 'auto';
  left: LengthPercentage | 'auto';
  boxSizing: BoxSizing;
  clear: Clear;
  color: Color;
  direction: Direction;
  display: Display;
  float: Float;
  fontFamily: readonly string[];
  fontSize: number;
  fontStretch: FontStretch;
  fontStyle: FontStyle;
  fontVariant: FontVariant;
  fontWeight: number;
  width: Size;
  height: Size;
  lineHeight: 'normal' | number | Number;
  marginTop: LengthPercentage | 'auto';
  marginRight: LengthPercentage | 'auto';
  marginBottom: LengthPercentage | 'auto';
  marginLeft: LengthPercentage | 'auto';
  opacity: number;
  outlineColor: Color;
  outlineStyle: BorderStyle;
  outlineWidth: number;
  overflow: 'visible' | 'hidden';
  overflowWrap: 'anywhere' | 'break-word' | 'normal';
  paddingTop: LengthPercentage;
  paddingRight: LengthPercentage;
  paddingBottom: LengthPercentage;
  paddingLeft: LengthPercentage;
  position: Position;
  tabSize: number | Number;
  textAlign: TextAlign;
  textDecorationColor: Color;
  textDecorationLine: readonly TextDecorationLine[];
  transform: readonly Transform[];
  verticalAlign: VerticalAlign | number | Percentage;
  whiteSpace: WhiteSpace;
  wordBreak: 'break-word' | 'normal';
  writingMode: WritingMode;
  zIndex: number | 'auto';
}

// The used line-height of `normal` without font metrics to consult
const NORMAL_LINE_HEIGHT = 1.2;

export class Style implements ComputedStyle {
  backgroundClip: ComputedStyle['backgroundClip'];
  backgroundColor: ComputedStyle['backgroundColor'];
  backgroundImage: ComputedStyle['backgroundImage'];
  backgroundPositionX: ComputedStyle['backgroundPositionX'];
  backgroundPositionY: ComputedStyle['backgroundPositionY'];
  borderTopColor: ComputedStyle['borderTopColor'];
  borderRightColor: ComputedStyle['borderRightColor'];
  borderBottomColor: ComputedStyle['borderBottomColor'];
  borderLeftColor: ComputedStyle['borderLeftColor'];
  borderTopStyle: ComputedStyle['borderTopStyle'];
  borderRightStyle: ComputedStyle['borderRightStyle'];
  borderBottomStyle: ComputedStyle['borderBottomStyle'];
  borderLeftStyle: ComputedStyle['borderLeftStyle'];
  borderTopWidth: ComputedStyle['borderTopWidth'];
  borderRightWidth: ComputedStyle['borderRightWidth'];
  borderBottomWidth: ComputedStyle['borderBottomWidth'];
  borderLeftWidth: ComputedStyle['borderLeftWidth'];
  top: ComputedStyle['top'];
  right: ComputedStyle['right'];
  bottom: ComputedStyle['bottom'];
  left: ComputedStyle['left'];
  boxSizing: ComputedStyle['boxSizing'];
  clear: ComputedStyle['clear'];
  color: ComputedStyle['color'];
  direction: ComputedStyle['direction'];
  display: ComputedStyle['display'];
  float: ComputedStyle['float'];
  fontFamily: ComputedStyle['fontFamily'];
  fontSize: ComputedStyle['fontSize'];
  fontStretch: ComputedStyle['fontStretch'];
  fontStyle: ComputedStyle['fontStyle'];
  fontVariant: ComputedStyle['fontVariant'];
  fontWeight: ComputedStyle['fontWeight'];
  width: ComputedStyle['width'];
  height: ComputedStyle['height'];
  lineHeight: ComputedStyle['lineHeight'];
  marginTop: ComputedStyle['marginTop'];
  marginRight: ComputedStyle['marginRight'];
  marginBottom: ComputedStyle['marginBottom'];
  marginLeft: ComputedStyle['marginLeft'];
  opacity: ComputedStyle['opacity'];
  outlineColor: ComputedStyle['outlineColor'];
  outlineStyle: ComputedStyle['outlineStyle'];
  outlineWidth: ComputedStyle['outlineWidth'];
  overflow: ComputedStyle['overflow'];
  overflowWrap: ComputedStyle['overflowWrap'];
  paddingTop: ComputedStyle['paddingTop'];
  paddingRight: ComputedStyle['paddingRight'];
  paddingBottom: ComputedStyle['paddingBottom'];
  paddingLeft: ComputedStyle['paddingLeft'];
  position: ComputedStyle['position'];
  tabSize: ComputedStyle['tabSize'];
  textAlign: ComputedStyle['textAlign'];
  textDecorationColor: ComputedStyle['textDecorationColor'];
  textDecorationLine: ComputedStyle['textDecorationLine'];
  transform: ComputedStyle['transform'];
  verticalAlign: ComputedStyle['verticalAlign'];
  whiteSpace: ComputedStyle['whiteSpace'];
  wordBreak: ComputedStyle['wordBreak'];
  writingMode: ComputedStyle['writingMode'];
  zIndex: ComputedStyle['zIndex'];

  constructor(style: ComputedStyle) {
    this.backgroundClip = style.backgroundClip;
    this.backgroundColor = style.backgroundColor;
    this.backgroundImage = style.backgroundImage;
    this.backgroundPositionX = style.backgroundPositionX;
    this.backgroundPositionY = style.backgroundPositionY;
    this.borderTopColor = style.borderTopColor;
    this.borderRightColor = style.borderRightColor;
    this.borderBottomColor = style.borderBottomColor;
    this.borderLeftColor = style.borderLeftColor;
    this.borderTopStyle = style.borderTopStyle;
    this.borderRightStyle = style.borderRightStyle;
    this.borderBottomStyle = style.borderBottomStyle;
    this.borderLeftStyle = style.borderLeftStyle;
    this.borderTopWidth = style.borderTopWidth;
    this.borderRightWidth = style.borderRightWidth;
    this.borderBottomWidth = style.borderBottomWidth;
    this.borderLeftWidth = style.borderLeftWidth;
    this.top = style.top;
    this.right = style.right;
    this.bottom = style.bottom;
    this.left = style.left;
    this.boxSizing = style.boxSizing;
    this.clear = style.clear;
    this.color = style.color;
    this.direction = style.direction;
    this.display = style.display;
    this.float = style.float;
    this.fontFamily = style.fontFamily;
    this.fontSize = style.fontSize;
    this.fontStretch = style.fontStretch;
    this.fontStyle = style.fontStyle;
    this.fontVariant = style.fontVariant;
    this.fontWeight = style.fontWeight;
    this.width = style.width;
    this.height = style.height;
    this.lineHeight = style.lineHeight;
    this.marginTop = style.marginTop;
    this.marginRight = style.marginRight;
    this.marginBottom = style.marginBottom;
    this.marginLeft = style.marginLeft;
    this.opacity = style.opacity;
    this.outlineColor = style.outlineColor;
    this.outlineStyle = style.outlineStyle;
    this.outlineWidth = style.outlineWidth;
    this.overflow = style.overflow;
    this.overflowWrap = style.overflowWrap;
    this.paddingTop = style.paddingTop;
    this.paddingRight = style.paddingRight;
    this.paddingBottom = style.paddingBottom;
    this.paddingLeft = style.paddingLeft;
    this.position = style.position;
    this.tabSize = style.tabSize;
    this.textAlign = style.textAlign;
    this.textDecorationColor = style.textDecorationColor;
    this.textDecorationLine = style.textDecorationLine;
    this.transform = style.transform;
    this.verticalAlign = style.verticalAlign;
    this.whiteSpace = style.whiteSpace;
    this.wordBreak = style.wordBreak;
    this.writingMode = style.writingMode;
    this.zIndex = style.zIndex;
  }

  getMargin(): Sides<LengthPercentage | 'auto'> {
    return {
      top: this.marginTop,
      right: this.marginRight,
      bottom: this.marginBottom,
      left: this.marginLeft
    };
  }

  getPadding(): Sides<LengthPercentage> {
    return {
      top: this.paddingTop,
      right: this.paddingRight,
      bottom: this.paddingBottom,
      left: this.paddingLeft
    };
  }

  getInset(): Sides<LengthPercentage | 'auto'> {
    return {top: this.top, right: this.right, bottom: this.bottom, left: this.left};
  }

  getBorder(side: Side): BorderSide {
    switch (side) {
      case 'top':
        return {width: this.borderTopWidth, style: this.borderTopStyle, color: this.borderTopColor};
      case 'right':
        return {width: this.borderRightWidth, style: this.borderRightStyle, color: this.borderRightColor};
      case 'bottom':
        return {width: this.borderBottomWidth, style: this.borderBottomStyle, color: this.borderBottomColor};
      case 'left':
        return {width: this.borderLeftWidth, style: this.borderLeftStyle, color: this.borderLeftColor};
    }
  }

  /**
   * The used line-height in px
   */
  getLineHeight() {
    if (this.lineHeight === 'normal') return NORMAL_LINE_HEIGHT * this.fontSize;
    if (typeof this.lineHeight === 'object') return this.lineHeight.value * this.fontSize;
    return this.lineHeight;
  }

  isDisplayNone() {
    return this.display.outer === 'none';
  }

  /**
   * The computed value of a longhand as a StyleValue
   */
  property(id: LonghandId): StyleValue {
    return computedValues[id](this);
  }
}

function displayKeyword(display: Display) {
  if (display.outer === 'none' || display.inner === 'none') return 'none';
  if (display.inner === 'flow-root') return display.outer === 'inline' ? 'inline-block' : 'flow-root';
  return display.outer;
}

const genericFamilies = new Set([
  'serif', 'sans-serif', 'monospace', 'cursive', 'fantasy', 'system-ui'
]);

function lengthOrPercentage(value: number | Percentage) {
  return typeof value === 'number' ? length(value) : percentage(value.value);
}

function numberOrLength(value: number | Number) {
  return typeof value === 'number' ? length(value) : number(value.value);
}

function commaListOrSingle(values: StyleValue[]) {
  return values.length === 1 ? values[0] : list(values, 'comma');
}

function transformArgs(args: readonly number[], create: (value: number) => StyleValue) {
  return args.map(arg => create(arg));
}

function transformValue(t: Transform) {
  switch (t.fn) {
    case 'matrix':
    case 'scale':
    case 'scaleX':
    case 'scaleY':
      return transformation(t.fn, transformArgs(t.args, number));
    case 'translate':
    case 'translateX':
    case 'translateY':
      return transformation(t.fn, transformArgs(t.args, length));
    case 'rotate':
    case 'skewX':
    case 'skewY':
      return transformation(t.fn, transformArgs(t.args, angle));
  }
}

const computedValues: {[K in LonghandId]: (style: Style) => StyleValue} = Object.freeze({
  'background-clip': s => identifier(s.backgroundClip),
  'background-color': s => colorValue(s.backgroundColor),
  'background-image': s => {
    if (s.backgroundImage.length === 0) return identifier('none');
    return commaListOrSingle(s.backgroundImage.map(url));
  },
  'background-position-x': s => commaListOrSingle(
    s.backgroundPositionX.map(p => edge(p.edge, lengthPercentageValue(p.offset)))
  ),
  'background-position-y': s => commaListOrSingle(
    s.backgroundPositionY.map(p => edge(p.edge, lengthPercentageValue(p.offset)))
  ),
  'border-bottom-color': s => colorValue(s.borderBottomColor),
  'border-bottom-style': s => identifier(s.borderBottomStyle),
  'border-bottom-width': s => length(s.borderBottomWidth),
  'border-left-color': s => colorValue(s.borderLeftColor),
  'border-left-style': s => identifier(s.borderLeftStyle),
  'border-left-width': s => length(s.borderLeftWidth),
  'border-right-color': s => colorValue(s.borderRightColor),
  'border-right-style': s => identifier(s.borderRightStyle),
  'border-right-width': s => length(s.borderRightWidth),
  'border-top-color': s => colorValue(s.borderTopColor),
  'border-top-style': s => identifier(s.borderTopStyle),
  'border-top-width': s => length(s.borderTopWidth),
  'bottom': s => lengthPercentageValue(s.bottom),
  'box-sizing': s => identifier(s.boxSizing),
  'clear': s => identifier(s.clear),
  'color': s => colorValue(s.color),
  'direction': s => identifier(s.direction),
  'display': s => identifier(displayKeyword(s.display)),
  'float': s => identifier(s.float),
  'font-family': s => commaListOrSingle(s.fontFamily.map(family => {
    return genericFamilies.has(family) ? identifier(family) : string(family);
  })),
  'font-size': s => length(s.fontSize),
  'font-stretch': s => identifier(s.fontStretch),
  'font-style': s => identifier(s.fontStyle),
  'font-variant': s => identifier(s.fontVariant),
  'font-weight': s => number(s.fontWeight),
  'height': s => sizeValue(s.height),
  'left': s => lengthPercentageValue(s.left),
  'line-height': s => s.lineHeight === 'normal' ? identifier('normal') : numberOrLength(s.lineHeight),
  'margin-bottom': s => lengthPercentageValue(s.marginBottom),
  'margin-left': s => lengthPercentageValue(s.marginLeft),
  'margin-right': s => lengthPercentageValue(s.marginRight),
  'margin-top': s => lengthPercentageValue(s.marginTop),
  'opacity': s => number(s.opacity),
  'outline-color': s => colorValue(s.outlineColor),
  'outline-style': s => identifier(s.outlineStyle),
  'outline-width': s => length(s.outlineWidth),
  'overflow': s => identifier(s.overflow),
  'overflow-wrap': s => identifier(s.overflowWrap),
  'padding-bottom': s => lengthPercentageValue(s.paddingBottom),
  'padding-left': s => lengthPercentageValue(s.paddingLeft),
  'padding-right': s => lengthPercentageValue(s.paddingRight),
  'padding-top': s => lengthPercentageValue(s.paddingTop),
  'position': s => identifier(s.position),
  'right': s => lengthPercentageValue(s.right),
  'tab-size': s => numberOrLength(s.tabSize),
  'text-align': s => identifier(s.textAlign),
  'text-decoration-color': s => colorValue(s.textDecorationColor),
  'text-decoration-line': s => {
    if (s.textDecorationLine.length === 0) return identifier('none');
    return list(s.textDecorationLine.map(identifier), 'space');
  },
  'top': s => lengthPercentageValue(s.top),
  'transform': s => {
    if (s.transform.length === 0) return identifier('none');
    return list(s.transform.map(transformValue), 'space');
  },
  'vertical-align': s => {
    if (typeof s.verticalAlign === 'string') return identifier(s.verticalAlign);
    return lengthOrPercentage(s.verticalAlign);
  },
  'white-space': s => identifier(s.whiteSpace),
  'width': s => sizeValue(s.width),
  'word-break': s => identifier(s.wordBreak),
  'writing-mode': s => identifier(s.writingMode),
  'z-index': s => s.zIndex === 'auto' ? identifier('auto') : integer(s.zIndex)
});

const transparent: Color = Object.freeze({r: 0, g: 0, b: 0, a: 0});

// Initial values for every property. Different properties have different
// initial values as specified in the property's specification. This is also
// the style that's used as the root style for inheritance. These are the
// "computed value"s as described in CSS Cascading and Inheritance Level 4 § 4.4
//
// Colors whose initial value is currentcolor are resolved against the initial
// color here, and against the element's color in computeStyle.
const initialPlainStyle: ComputedStyle = Object.freeze<ComputedStyle>({
  backgroundClip: 'border-box',
  backgroundColor: transparent,
  backgroundImage: [],
  backgroundPositionX: [{edge: 'left', offset: {value: 0, unit: '%'}}],
  backgroundPositionY: [{edge: 'top', offset: {value: 0, unit: '%'}}],
  borderTopColor: {r: 0, g: 0, b: 0, a: 1},
  borderRightColor: {r: 0, g: 0, b: 0, a: 1},
  borderBottomColor: {r: 0, g: 0, b: 0, a: 1},
  borderLeftColor: {r: 0, g: 0, b: 0, a: 1},
  borderTopStyle: 'none',
  borderRightStyle: 'none',
  borderBottomStyle: 'none',
  borderLeftStyle: 'none',
  borderTopWidth: 3,
  borderRightWidth: 3,
  borderBottomWidth: 3,
  borderLeftWidth: 3,
  top: 'auto',
  right: 'auto',
  bottom: 'auto',
  left: 'auto',
  boxSizing: 'content-box',
  clear: 'none',
  color: {r: 0, g: 0, b: 0, a: 1},
  direction: 'ltr',
  display: {outer: 'inline', inner: 'flow'},
  float: 'none',
  fontFamily: ['Helvetica'],
  fontSize: 16,
  fontStretch: 'normal',
  fontStyle: 'normal',
  fontVariant: 'normal',
  fontWeight: 400,
  width: 'auto',
  height: 'auto',
  lineHeight: 'normal',
  marginTop: 0,
  marginRight: 0,
  marginBottom: 0,
  marginLeft: 0,
  opacity: 1,
  outlineColor: {r: 0, g: 0, b: 0, a: 1},
  outlineStyle: 'none',
  outlineWidth: 3,
  overflow: 'visible',
  overflowWrap: 'normal',
  paddingTop: 0,
  paddingRight: 0,
  paddingBottom: 0,
  paddingLeft: 0,
  position: 'static',
  tabSize: {value: 8, unit: null},
  textAlign: 'start',
  textDecorationColor: {r: 0, g: 0, b: 0, a: 1},
  textDecorationLine: [],
  transform: [],
  verticalAlign: 'baseline',
  whiteSpace: 'normal',
  wordBreak: 'normal',
  writingMode: 'horizontal-tb',
  zIndex: 'auto'
});

export const initialStyle = new Style(initialPlainStyle);

type UaDeclaredStyles = {[tagName: string]: DeclaredStyle};

export const uaDeclaredStyles: UaDeclaredStyles = Object.freeze({
  head: {display: {outer: 'none', inner: 'none'}},
  style: {display: {outer: 'none', inner: 'none'}},
  script: {display: {outer: 'none', inner: 'none'}},
  body: {
    display: {outer: 'block', inner: 'flow'},
    marginTop: 8,
    marginRight: 8,
    marginBottom: 8,
    marginLeft: 8
  },
  div: {
    display: {outer: 'block', inner: 'flow'}
  },
  span: {
    display: {outer: 'inline', inner: 'flow'}
  },
  p: {
    display: {outer: 'block', inner: 'flow'},
    marginTop: {value: 1, unit: 'em'},
    marginBottom: {value: 1, unit: 'em'}
  },
  strong: {
    fontWeight: 700
  },
  b: {
    fontWeight: 700
  },
  em: {
    fontStyle: 'italic'
  },
  i: {
    fontStyle: 'italic'
  },
  h1: {
    fontSize: {value: 2, unit: 'em'},
    display: {outer: 'block', inner: 'flow'},
    marginTop: {value: 0.67, unit: 'em'},
    marginBottom: {value: 0.67, unit: 'em'},
    fontWeight: 700
  },
  h2: {
    fontSize: {value: 1.5, unit: 'em'},
    display: {outer: 'block', inner: 'flow'},
    marginTop: {value: 0.83, unit: 'em'},
    marginBottom: {value: 0.83, unit: 'em'},
    fontWeight: 700
  }
});

const cascadedCache = new WeakMap<DeclaredStyle, WeakMap<DeclaredStyle, DeclaredStyle>>();

export function cascadeStyles(s1: DeclaredStyle, s2: DeclaredStyle): DeclaredStyle {
  let m1 = cascadedCache.get(s1);
  let m2 = m1 && m1.get(s2);

  if (m2) return m2;

  const ret = {...s1, ...s2};

  if (m1) {
    m1.set(s2, ret);
    return ret;
  }

  m1 = new WeakMap();
  m1.set(s2, ret);
  cascadedCache.set(s1, m1);

  return ret;
}

/**
 * Defaulting (CSS Cascading and Inheritance Level 4 §7): an absent declaration
 * inherits if the property is inherited, otherwise takes the initial value
 */
function specified<T>(
  declared: T | CssWide | undefined,
  isInherited: boolean,
  parentValue: T,
  initialValue: T
): T {
  if (declared === inherited) return parentValue;
  if (declared === initial) return initialValue;
  if (declared === undefined) return isInherited ? parentValue : initialValue;
  return declared;
}

function absolutify(value: Length, fontSize: number) {
  return typeof value === 'number' ? value : value.value * fontSize;
}

function computeLengthPercentage(value: DeclaredLengthPercentage, fontSize: number): LengthPercentage {
  if (typeof value === 'object' && 'unit' in value && value.unit === 'em') {
    return value.value * fontSize;
  }
  return value;
}

function computeLengthPercentageAuto(
  value: DeclaredLengthPercentage | 'auto',
  fontSize: number
): LengthPercentage | 'auto' {
  return value === 'auto' ? value : computeLengthPercentage(value, fontSize);
}

function computeSize(value: DeclaredSize, fontSize: number): Size {
  if (typeof value === 'string') return value;
  if (typeof value === 'object' && 'fitContent' in value) return value;
  return computeLengthPercentage(value, fontSize);
}

function computeColor(value: Color | 'currentcolor', currentColor: Color) {
  return value === 'currentcolor' ? currentColor : value;
}

function computeFontSize(parentStyle: Style, style: DeclaredStyle) {
  const fontSize = specified(style.fontSize, true, parentStyle.fontSize, initialPlainStyle.fontSize);
  if (typeof fontSize === 'object') {
    if (fontSize.unit === '%') return parentStyle.fontSize * fontSize.value / 100;
    return parentStyle.fontSize * fontSize.value;
  }
  return fontSize;
}

// https://www.w3.org/TR/css-fonts-4/#relative-weights
function computeFontWeight(parentWeight: number, weight: FontWeight) {
  if (weight === 'normal') return 400;
  if (weight !== 'bolder' && weight !== 'lighter') return weight;

  const bolder = weight === 'bolder';

  if (parentWeight < 100) {
    return bolder ? 400 : parentWeight;
  } else if (parentWeight >= 100 && parentWeight < 350) {
    return bolder ? 400 : 100;
  } else if (parentWeight >= 350 && parentWeight < 550) {
    return bolder ? 700 : 100;
  } else if (parentWeight >= 550 && parentWeight < 750) {
    return bolder ? 900 : 400;
  } else if (parentWeight >= 750 && parentWeight < 900) {
    return bolder ? 900 : 700;
  } else {
    return bolder ? parentWeight : 700;
  }
}

function computeLineHeight(value: 'normal' | Length | Percentage | Number, fontSize: number) {
  if (typeof value === 'object') {
    if (value.unit === '%') return value.value / 100 * fontSize;
    if (value.unit === 'em') return value.value * fontSize;
  }
  return value;
}

function computeVerticalAlign(value: VerticalAlign | Length | Percentage, fontSize: number) {
  if (typeof value === 'object' && value.unit === 'em') return value.value * fontSize;
  return value;
}

function computeTabSize(value: Length | Number, fontSize: number) {
  if (typeof value === 'object' && value.unit === 'em') return value.value * fontSize;
  return value;
}

/**
 * Calculates the specified style (§4.3) by doing inheritance and defaulting,
 * and then the computed style (§4.4) by resolving em, some percentages,
 * currentcolor, etc.
 */
function computeStyle(p: Style, s: DeclaredStyle) {
  const i = initialPlainStyle;
  const fontSize = computeFontSize(p, s);
  const color = specified(s.color, true, p.color, i.color);

  return new Style({
    backgroundClip: specified(s.backgroundClip, false, p.backgroundClip, i.backgroundClip),
    backgroundColor: computeColor(
      specified(s.backgroundColor, false, p.backgroundColor, i.backgroundColor),
      color
    ),
    backgroundImage: specified(s.backgroundImage, false, p.backgroundImage, i.backgroundImage),
    backgroundPositionX: specified(s.backgroundPositionX, false, p.backgroundPositionX, i.backgroundPositionX),
    backgroundPositionY: specified(s.backgroundPositionY, false, p.backgroundPositionY, i.backgroundPositionY),
    borderTopColor: computeColor(specified(s.borderTopColor, false, p.borderTopColor, 'currentcolor'), color),
    borderRightColor: computeColor(specified(s.borderRightColor, false, p.borderRightColor, 'currentcolor'), color),
    borderBottomColor: computeColor(specified(s.borderBottomColor, false, p.borderBottomColor, 'currentcolor'), color),
    borderLeftColor: computeColor(specified(s.borderLeftColor, false, p.borderLeftColor, 'currentcolor'), color),
    borderTopStyle: specified(s.borderTopStyle, false, p.borderTopStyle, i.borderTopStyle),
    borderRightStyle: specified(s.borderRightStyle, false, p.borderRightStyle, i.borderRightStyle),
    borderBottomStyle: specified(s.borderBottomStyle, false, p.borderBottomStyle, i.borderBottomStyle),
    borderLeftStyle: specified(s.borderLeftStyle, false, p.borderLeftStyle, i.borderLeftStyle),
    borderTopWidth: absolutify(specified(s.borderTopWidth, false, p.borderTopWidth, i.borderTopWidth), fontSize),
    borderRightWidth: absolutify(specified(s.borderRightWidth, false, p.borderRightWidth, i.borderRightWidth), fontSize),
    borderBottomWidth: absolutify(specified(s.borderBottomWidth, false, p.borderBottomWidth, i.borderBottomWidth), fontSize),
    borderLeftWidth: absolutify(specified(s.borderLeftWidth, false, p.borderLeftWidth, i.borderLeftWidth), fontSize),
    top: computeLengthPercentageAuto(specified(s.top, false, p.top, i.top), fontSize),
    right: computeLengthPercentageAuto(specified(s.right, false, p.right, i.right), fontSize),
    bottom: computeLengthPercentageAuto(specified(s.bottom, false, p.bottom, i.bottom), fontSize),
    left: computeLengthPercentageAuto(specified(s.left, false, p.left, i.left), fontSize),
    boxSizing: specified(s.boxSizing, false, p.boxSizing, i.boxSizing),
    clear: specified(s.clear, false, p.clear, i.clear),
    color,
    direction: specified(s.direction, true, p.direction, i.direction),
    display: specified(s.display, false, p.display, i.display),
    float: specified(s.float, false, p.float, i.float),
    fontFamily: specified(s.fontFamily, true, p.fontFamily, i.fontFamily),
    fontSize,
    fontStretch: specified(s.fontStretch, true, p.fontStretch, i.fontStretch),
    fontStyle: specified(s.fontStyle, true, p.fontStyle, i.fontStyle),
    fontVariant: specified(s.fontVariant, true, p.fontVariant, i.fontVariant),
    fontWeight: computeFontWeight(p.fontWeight, specified(s.fontWeight, true, p.fontWeight, i.fontWeight)),
    width: computeSize(specified(s.width, false, p.width, i.width), fontSize),
    height: computeSize(specified(s.height, false, p.height, i.height), fontSize),
    lineHeight: computeLineHeight(specified(s.lineHeight, true, p.lineHeight, i.lineHeight), fontSize),
    marginTop: computeLengthPercentageAuto(specified(s.marginTop, false, p.marginTop, i.marginTop), fontSize),
    marginRight: computeLengthPercentageAuto(specified(s.marginRight, false, p.marginRight, i.marginRight), fontSize),
    marginBottom: computeLengthPercentageAuto(specified(s.marginBottom, false, p.marginBottom, i.marginBottom), fontSize),
    marginLeft: computeLengthPercentageAuto(specified(s.marginLeft, false, p.marginLeft, i.marginLeft), fontSize),
    opacity: Math.min(1, Math.max(0, specified(s.opacity, false, p.opacity, i.opacity))),
    outlineColor: computeColor(specified(s.outlineColor, false, p.outlineColor, 'currentcolor'), color),
    outlineStyle: specified(s.outlineStyle, false, p.outlineStyle, i.outlineStyle),
    outlineWidth: absolutify(specified(s.outlineWidth, false, p.outlineWidth, i.outlineWidth), fontSize),
    overflow: specified(s.overflow, false, p.overflow, i.overflow),
    overflowWrap: specified(s.overflowWrap, true, p.overflowWrap, i.overflowWrap),
    paddingTop: computeLengthPercentage(specified(s.paddingTop, false, p.paddingTop, i.paddingTop), fontSize),
    paddingRight: computeLengthPercentage(specified(s.paddingRight, false, p.paddingRight, i.paddingRight), fontSize),
    paddingBottom: computeLengthPercentage(specified(s.paddingBottom, false, p.paddingBottom, i.paddingBottom), fontSize),
    paddingLeft: computeLengthPercentage(specified(s.paddingLeft, false, p.paddingLeft, i.paddingLeft), fontSize),
    position: specified(s.position, false, p.position, i.position),
    tabSize: computeTabSize(specified(s.tabSize, true, p.tabSize, i.tabSize), fontSize),
    textAlign: specified(s.textAlign, true, p.textAlign, i.textAlign),
    textDecorationColor: computeColor(
      specified(s.textDecorationColor, false, p.textDecorationColor, 'currentcolor'),
      color
    ),
    textDecorationLine: specified(s.textDecorationLine, false, p.textDecorationLine, i.textDecorationLine),
    transform: specified(s.transform, false, p.transform, i.transform),
    verticalAlign: computeVerticalAlign(specified(s.verticalAlign, false, p.verticalAlign, i.verticalAlign), fontSize),
    whiteSpace: specified(s.whiteSpace, true, p.whiteSpace, i.whiteSpace),
    wordBreak: specified(s.wordBreak, true, p.wordBreak, i.wordBreak),
    writingMode: specified(s.writingMode, true, p.writingMode, i.writingMode),
    zIndex: specified(s.zIndex, false, p.zIndex, i.zIndex)
  });
}

const styleCache = new WeakMap<Style, WeakMap<DeclaredStyle, Style>>();

/**
 * Very simple property inheritance model. createStyle starts out with cascaded
 * styles (CSS Cascading and Inheritance Level 4 §4.2) which is computed from
 * the element's declared style and a default internal style, and returns the
 * computed style. Results are cached per (parent style, cascaded style) pair,
 * so elements with identical inputs share one Style.
 */
export function createStyle(s1: Style, s2: DeclaredStyle) {
  let m1 = styleCache.get(s1);
  let m2 = m1 && m1.get(s2);

  if (m2) return m2;

  const ret = computeStyle(s1, s2);

  if (m1) {
    m1.set(s2, ret);
    return ret;
  }

  m1 = new WeakMap();
  m1.set(s2, ret);
  styleCache.set(s1, m1);

  return ret;
}

// required styles that always come last in the cascade
const rootDeclaredStyle: DeclaredStyle = {
  display: {
    outer: 'block',
    inner: 'flow-root'
  }
};

export function getRootStyle(style: DeclaredStyle = EMPTY_STYLE) {
  return createStyle(initialStyle, cascadeStyles(style, rootDeclaredStyle));
}

function cascadedStyleFor(el: HTMLElement) {
  const uaDeclaredStyle = uaDeclaredStyles[el.tagName];
  return uaDeclaredStyle ? cascadeStyles(uaDeclaredStyle, el.declaredStyle) : el.declaredStyle;
}

/**
 * Computes the style of `el` given its parent's already-computed style
 */
export function computeElementStyle(el: HTMLElement, parentStyle: Style | null) {
  const cascaded = cascadedStyleFor(el);
  return parentStyle ? createStyle(parentStyle, cascaded) : getRootStyle(cascaded);
}

/**
 * Standalone style computation for a single element, independent of the
 * styles the document has already assigned. Throws if the style cannot be
 * computed.
 */
export interface StyleComputer {
  computeStyle(el: HTMLElement): Style;
}

export class CascadeStyleComputer implements StyleComputer {
  computeStyle(el: HTMLElement): Style {
    const parentStyle = el.parent ? this.computeStyle(el.parent) : null;
    return computeElementStyle(el, parentStyle);
  }
}
