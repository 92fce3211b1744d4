import type {Color, LengthPercentage, Size} from './style.js';
import type {PropertyId} from './property-id.js';

export interface ColorValue {
  readonly type: 'color';
  readonly color: Readonly<Color>;
}

export interface LengthValue {
  readonly type: 'length';
  readonly value: number;
  readonly unit: 'px';
}

export interface PercentageValue {
  readonly type: 'percentage';
  readonly value: number;
}

export interface IdentifierValue {
  readonly type: 'identifier';
  readonly keyword: string;
}

export interface NumberValue {
  readonly type: 'number';
  readonly value: number;
}

export interface IntegerValue {
  readonly type: 'integer';
  readonly value: number;
}

export interface AngleValue {
  readonly type: 'angle';
  readonly value: number;
  readonly unit: 'deg';
}

export interface StringValue {
  readonly type: 'string';
  readonly value: string;
}

export interface UrlValue {
  readonly type: 'url';
  readonly url: string;
}

export type PositionEdge = 'left' | 'right' | 'top' | 'bottom';

export interface EdgeValue {
  readonly type: 'edge';
  readonly edge: PositionEdge;
  readonly offset: LengthValue | PercentageValue | CalculatedValue;
}

export interface PositionValue {
  readonly type: 'position';
  readonly x: EdgeValue;
  readonly y: EdgeValue;
}

export type ListSeparator = 'space' | 'comma';

export interface ListValue {
  readonly type: 'list';
  readonly values: readonly StyleValue[];
  readonly separator: ListSeparator;
}

export interface ShorthandValue {
  readonly type: 'shorthand';
  readonly property: PropertyId;
  readonly longhands: readonly PropertyId[];
  readonly values: readonly StyleValue[];
}

export type TransformFunction = 'matrix' | 'translate' | 'translateX'
  | 'translateY' | 'scale' | 'scaleX' | 'scaleY' | 'rotate' | 'skewX'
  | 'skewY';

export interface TransformationValue {
  readonly type: 'transformation';
  readonly fn: TransformFunction;
  readonly parameters: readonly StyleValue[];
}

/**
 * A calc() that could not be reduced at computed-value time because it mixes
 * percentages and lengths. It passes through resolution untouched.
 */
export interface CalculatedValue {
  readonly type: 'calculated';
  readonly expression: string;
}

export type StyleValue = ColorValue
  | LengthValue
  | PercentageValue
  | IdentifierValue
  | NumberValue
  | IntegerValue
  | AngleValue
  | StringValue
  | UrlValue
  | EdgeValue
  | PositionValue
  | ListValue
  | ShorthandValue
  | TransformationValue
  | CalculatedValue;

export interface StyleProperty {
  readonly id: PropertyId;
  readonly value: StyleValue;
}

export function color(c: Color): ColorValue {
  return Object.freeze({type: 'color', color: Object.freeze({r: c.r, g: c.g, b: c.b, a: c.a})});
}

export function length(value: number): LengthValue {
  return Object.freeze({type: 'length', value, unit: 'px'});
}

export function percentage(value: number): PercentageValue {
  return Object.freeze({type: 'percentage', value});
}

export function identifier(keyword: string): IdentifierValue {
  return Object.freeze({type: 'identifier', keyword});
}

export function number(value: number): NumberValue {
  return Object.freeze({type: 'number', value});
}

export function integer(value: number): IntegerValue {
  return Object.freeze({type: 'integer', value: Math.trunc(value)});
}

export function angle(value: number): AngleValue {
  return Object.freeze({type: 'angle', value, unit: 'deg'});
}

export function string(value: string): StringValue {
  return Object.freeze({type: 'string', value});
}

export function url(href: string): UrlValue {
  return Object.freeze({type: 'url', url: href});
}

export function calculated(expression: string): CalculatedValue {
  return Object.freeze({type: 'calculated', expression});
}

export function edge(
  side: PositionEdge,
  offset: LengthValue | PercentageValue | CalculatedValue
): EdgeValue {
  return Object.freeze({type: 'edge', edge: side, offset});
}

export function position(x: EdgeValue, y: EdgeValue): PositionValue {
  return Object.freeze({type: 'position', x, y});
}

export function list(values: readonly StyleValue[], separator: ListSeparator): ListValue {
  return Object.freeze({type: 'list', values: Object.freeze(values.slice()), separator});
}

export function shorthand(
  property: PropertyId,
  longhands: readonly PropertyId[],
  values: readonly StyleValue[]
): ShorthandValue {
  if (longhands.length !== values.length) {
    throw new Error(
      `Assertion failed: ${property} has ${longhands.length} longhands ` +
      `but ${values.length} values`
    );
  }

  return Object.freeze({
    type: 'shorthand',
    property,
    longhands: Object.freeze(longhands.slice()),
    values: Object.freeze(values.slice())
  });
}

export function transformation(
  fn: TransformFunction,
  parameters: readonly StyleValue[]
): TransformationValue {
  return Object.freeze({type: 'transformation', fn, parameters: Object.freeze(parameters.slice())});
}

function listsEqual(a: readonly StyleValue[], b: readonly StyleValue[]) {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (!styleValuesEqual(a[i], b[i])) return false;
  }
  return true;
}

/**
 * Structural equality. Two values are equal when they are the same variant
 * and carry equal payloads, regardless of identity.
 */
export function styleValuesEqual(a: StyleValue, b: StyleValue): boolean {
  if (a === b) return true;

  switch (a.type) {
    case 'color':
      return b.type === 'color'
        && a.color.r === b.color.r
        && a.color.g === b.color.g
        && a.color.b === b.color.b
        && a.color.a === b.color.a;
    case 'length':
      return b.type === 'length' && a.value === b.value;
    case 'angle':
      return b.type === 'angle' && a.value === b.value;
    case 'percentage':
      return b.type === 'percentage' && a.value === b.value;
    case 'number':
      return b.type === 'number' && a.value === b.value;
    case 'integer':
      return b.type === 'integer' && a.value === b.value;
    case 'identifier':
      return b.type === 'identifier' && a.keyword === b.keyword;
    case 'string':
      return b.type === 'string' && a.value === b.value;
    case 'url':
      return b.type === 'url' && a.url === b.url;
    case 'calculated':
      return b.type === 'calculated' && a.expression === b.expression;
    case 'edge':
      return b.type === 'edge' && a.edge === b.edge && styleValuesEqual(a.offset, b.offset);
    case 'position':
      return b.type === 'position' && styleValuesEqual(a.x, b.x) && styleValuesEqual(a.y, b.y);
    case 'list':
      return b.type === 'list' && a.separator === b.separator && listsEqual(a.values, b.values);
    case 'shorthand':
      return b.type === 'shorthand'
        && a.property === b.property
        && a.longhands.length === b.longhands.length
        && a.longhands.every((id, i) => id === b.longhands[i])
        && listsEqual(a.values, b.values);
    case 'transformation':
      return b.type === 'transformation' && a.fn === b.fn && listsEqual(a.parameters, b.parameters);
  }
}

export function serializeNumber(n: number): string {
  const rounded = Math.round(n * 1e6) / 1e6;
  return String(Object.is(rounded, -0) ? 0 : rounded);
}

function serializeString(s: string) {
  return '"' + s.replace(/["\\]/g, '\\$&') + '"';
}

export function serializeStyleValue(value: StyleValue): string {
  switch (value.type) {
    case 'color': {
      const {r, g, b, a} = value.color;
      if (a === 1) return `rgb(${r}, ${g}, ${b})`;
      return `rgba(${r}, ${g}, ${b}, ${serializeNumber(a)})`;
    }
    case 'length':
    case 'angle':
      return serializeNumber(value.value) + value.unit;
    case 'percentage':
      return serializeNumber(value.value) + '%';
    case 'identifier':
      return value.keyword;
    case 'number':
      return serializeNumber(value.value);
    case 'integer':
      return String(value.value);
    case 'string':
      return serializeString(value.value);
    case 'url':
      return `url(${serializeString(value.url)})`;
    case 'calculated':
      return `calc(${value.expression})`;
    case 'edge':
      return `${value.edge} ${serializeStyleValue(value.offset)}`;
    case 'position':
      return `${serializeStyleValue(value.x)} ${serializeStyleValue(value.y)}`;
    case 'list':
      return value.values.map(serializeStyleValue).join(value.separator === 'comma' ? ', ' : ' ');
    case 'shorthand':
      return value.values.map(serializeStyleValue).join(' ');
    case 'transformation':
      return `${value.fn}(${value.parameters.map(serializeStyleValue).join(', ')})`;
  }
}

// Conversions from computed values. These are shared by the resolver and by
// the computed style record, which is why they live beside the value types.

export function lengthPercentageValue(
  value: LengthPercentage
): PercentageValue | LengthValue | CalculatedValue;
export function lengthPercentageValue(
  value: LengthPercentage | 'auto'
): IdentifierValue | PercentageValue | LengthValue | CalculatedValue;
export function lengthPercentageValue(
  value: LengthPercentage | 'auto'
): IdentifierValue | PercentageValue | LengthValue | CalculatedValue {
  if (value === 'auto') return identifier('auto');
  if (typeof value === 'object' && 'unit' in value) return percentage(value.value);
  if (typeof value === 'number') return length(value);
  return value;
}

export function sizeValue(size: Size): StyleValue {
  if (size === 'none') return identifier('none');
  if (typeof size === 'object' && 'unit' in size) return percentage(size.value);
  if (typeof size === 'number') return length(size);
  if (size === 'auto') return identifier('auto');
  if (typeof size === 'object' && 'expression' in size) return size;
  if (size === 'min-content') return identifier('min-content');
  if (size === 'max-content') return identifier('max-content');
  if (size === 'fit-content') return identifier('fit-content');
  throw new Error('Unimplemented: resolved value of fit-content(<length-percentage>)');
}

export function colorValue(c: Color): ColorValue {
  return color(c);
}
