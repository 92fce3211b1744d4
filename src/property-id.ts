export const longhands = [
  'background-clip',
  'background-color',
  'background-image',
  'background-position-x',
  'background-position-y',
  'border-bottom-color',
  'border-bottom-style',
  'border-bottom-width',
  'border-left-color',
  'border-left-style',
  'border-left-width',
  'border-right-color',
  'border-right-style',
  'border-right-width',
  'border-top-color',
  'border-top-style',
  'border-top-width',
  'bottom',
  'box-sizing',
  'clear',
  'color',
  'direction',
  'display',
  'float',
  'font-family',
  'font-size',
  'font-stretch',
  'font-style',
  'font-variant',
  'font-weight',
  'height',
  'left',
  'line-height',
  'margin-bottom',
  'margin-left',
  'margin-right',
  'margin-top',
  'opacity',
  'outline-color',
  'outline-style',
  'outline-width',
  'overflow',
  'overflow-wrap',
  'padding-bottom',
  'padding-left',
  'padding-right',
  'padding-top',
  'position',
  'right',
  'tab-size',
  'text-align',
  'text-decoration-color',
  'text-decoration-line',
  'top',
  'transform',
  'vertical-align',
  'white-space',
  'width',
  'word-break',
  'writing-mode',
  'z-index'
] as const;

export type LonghandId = typeof longhands[number];

export type ShorthandId = 'background-position'
  | 'border'
  | 'border-bottom'
  | 'border-color'
  | 'border-left'
  | 'border-right'
  | 'border-style'
  | 'border-top'
  | 'border-width'
  | 'font'
  | 'inset'
  | 'margin'
  | 'outline'
  | 'padding'
  | 'text-decoration';

export type PropertyId = LonghandId | ShorthandId | 'invalid' | 'custom';

// Sided longhands are always listed top, right, bottom, left
const shorthandLonghands: {[K in ShorthandId]: readonly LonghandId[]} = Object.freeze({
  'background-position': ['background-position-x', 'background-position-y'],
  'border': [
    'border-top-width', 'border-right-width', 'border-bottom-width', 'border-left-width',
    'border-top-style', 'border-right-style', 'border-bottom-style', 'border-left-style',
    'border-top-color', 'border-right-color', 'border-bottom-color', 'border-left-color'
  ],
  'border-bottom': ['border-bottom-width', 'border-bottom-style', 'border-bottom-color'],
  'border-color': ['border-top-color', 'border-right-color', 'border-bottom-color', 'border-left-color'],
  'border-left': ['border-left-width', 'border-left-style', 'border-left-color'],
  'border-right': ['border-right-width', 'border-right-style', 'border-right-color'],
  'border-style': ['border-top-style', 'border-right-style', 'border-bottom-style', 'border-left-style'],
  'border-top': ['border-top-width', 'border-top-style', 'border-top-color'],
  'border-width': ['border-top-width', 'border-right-width', 'border-bottom-width', 'border-left-width'],
  'font': [
    'font-style', 'font-variant', 'font-weight', 'font-stretch', 'font-size',
    'line-height', 'font-family'
  ],
  'inset': ['top', 'right', 'bottom', 'left'],
  'margin': ['margin-top', 'margin-right', 'margin-bottom', 'margin-left'],
  'outline': ['outline-color', 'outline-style', 'outline-width'],
  'padding': ['padding-top', 'padding-right', 'padding-bottom', 'padding-left'],
  'text-decoration': ['text-decoration-line', 'text-decoration-color']
});

// Whether a change to the longhand can change box geometry. Querying one of
// these forces a layout pass instead of a style pass.
const affectsLayout: {[K in LonghandId]: boolean} = Object.freeze({
  'background-clip': false,
  'background-color': false,
  'background-image': false,
  'background-position-x': false,
  'background-position-y': false,
  'border-bottom-color': false,
  'border-bottom-style': true,
  'border-bottom-width': true,
  'border-left-color': false,
  'border-left-style': true,
  'border-left-width': true,
  'border-right-color': false,
  'border-right-style': true,
  'border-right-width': true,
  'border-top-color': false,
  'border-top-style': true,
  'border-top-width': true,
  'bottom': true,
  'box-sizing': true,
  'clear': true,
  'color': false,
  'direction': true,
  'display': true,
  'float': true,
  'font-family': true,
  'font-size': true,
  'font-stretch': true,
  'font-style': true,
  'font-variant': true,
  'font-weight': true,
  'height': true,
  'left': true,
  'line-height': true,
  'margin-bottom': true,
  'margin-left': true,
  'margin-right': true,
  'margin-top': true,
  'opacity': false,
  'outline-color': false,
  'outline-style': false,
  'outline-width': false,
  'overflow': true,
  'overflow-wrap': true,
  'padding-bottom': true,
  'padding-left': true,
  'padding-right': true,
  'padding-top': true,
  'position': true,
  'right': true,
  'tab-size': true,
  'text-align': true,
  'text-decoration-color': false,
  'text-decoration-line': false,
  'top': true,
  'transform': true,
  'vertical-align': true,
  'white-space': true,
  'width': true,
  'word-break': true,
  'writing-mode': true,
  'z-index': false
});

const longhandSet: ReadonlySet<string> = new Set(longhands);

export function isLonghand(id: string): id is LonghandId {
  return longhandSet.has(id);
}

export function isShorthand(id: string): id is ShorthandId {
  return Object.prototype.hasOwnProperty.call(shorthandLonghands, id);
}

export function longhandsForShorthand(id: ShorthandId): readonly LonghandId[] {
  return shorthandLonghands[id];
}

export function propertyAffectsLayout(id: PropertyId): boolean {
  if (id === 'invalid' || id === 'custom') return false;
  if (isShorthand(id)) return shorthandLonghands[id].some(l => affectsLayout[l]);
  return affectsLayout[id];
}

/**
 * Maps a CSS property name to its id. Custom properties (`--*`) keep their
 * case and all map to `custom`; anything unrecognized is `invalid`.
 */
export function propertyIdFromString(name: string): PropertyId {
  if (name.startsWith('--')) return 'custom';
  const lower = name.toLowerCase();
  if (isLonghand(lower) || isShorthand(lower)) return lower;
  return 'invalid';
}
