import * as css from '../src/api.js';

// Always create styles at the top-level of your module if you can.
const cardStyle = css.style({
  backgroundColor: {r: 28, g: 10, b: 0, a: 1},
  color: {r: 179, g: 200, b: 144, a: 1},
  paddingTop: 8,
  paddingRight: 16,
  paddingBottom: 8,
  paddingLeft: 16,
  transform: [{fn: 'rotate', args: [10]}, {fn: 'translateX', args: [4]}]
});

const badgeStyle = css.style({
  color: {r: 115, g: 169, b: 173, a: 1},
  fontWeight: 'bolder',
  lineHeight: {value: 1.5, unit: null}
});

// Create a DOM. The tree is laid out the first time a query needs it.
const badge = css.h('span', {style: badgeStyle});
const card = css.h('div', {style: cardStyle}, [badge]);
css.dom(card);

const cardComputed = css.getComputedStyle(card);
const badgeComputed = css.getComputedStyle(badge);

for (const name of ['padding', 'color', 'transform', 'border', 'background-position']) {
  console.log(`div ${name}: ${cardComputed.getPropertyValue(name) || '(none)'}`);
}

for (const name of ['font-weight', 'line-height', 'font']) {
  console.log(`span ${name}: ${badgeComputed.getPropertyValue(name)}`);
}
