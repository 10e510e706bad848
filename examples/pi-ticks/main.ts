import { fractionTicks } from '../../src';

// Angle axis from -3π to 3π, labelled in multiples of π/2.
const { positions, labels } = fractionTicks(-3 * Math.PI, 3 * Math.PI, {
  count: 13,
  divisor: Math.PI,
  divisorSymbol: '\\pi',
});

positions.forEach((x, i) => {
  console.log(`${x.toFixed(4).padStart(8)}  ${labels[i]}`);
});

// Plain fractions for a unit interval.
console.log(fractionTicks(0, 1, { count: 5 }).labels.join(' '));
