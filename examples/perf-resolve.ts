import * as css from '../src/api.js';
import {bench, run} from 'mitata';

const style = css.style({
  marginTop: 4,
  marginRight: 8,
  marginBottom: 4,
  marginLeft: 8,
  transform: [{fn: 'scale', args: [2]}]
});

const leaves: css.HTMLElement[] = [];
const rows: css.HTMLElement[] = [];

for (let i = 0; i < 100; i++) {
  const leaf = css.h('span', {style});
  leaves.push(leaf);
  rows.push(css.h('div', [leaf]));
}

const document = css.dom(rows);

bench('color of 100 elements (style pass only)', () => {
  for (const leaf of leaves) css.getComputedStyle(leaf).property('color');
});

bench('margin of 100 elements', () => {
  for (const leaf of leaves) css.getComputedStyle(leaf).property('margin');
});

bench('transform of 100 elements', () => {
  for (const leaf of leaves) css.getComputedStyle(leaf).property('transform');
});

bench('relayout then query', () => {
  document.invalidateStyle();
  css.getComputedStyle(leaves[0]).getPropertyValue('line-height');
});

await run();
