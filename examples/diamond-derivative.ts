/**
 * Diamond-shaped graph: every node reuses all earlier ones.
 *
 * Run with: npx tsx examples/diamond-derivative.ts
 */

import { Graph, GradientChecker, countPathsTo, formatGradCheckResult } from '../src/index.js';

const graph = new Graph();
const x = graph.variable('x');
const y = graph.variable('y');

// f = x * y + x, then three layers that each add everything before them
let layers = [x, graph.sum(graph.product(x, y), x)];
for (let i = 0; i < 3; i++) {
  layers = [...layers, graph.sum(...layers)];
}
const f = layers[layers.length - 1];

const bindings = new Map([[x, 3], [y, 2]]);
console.log(graph.dump());
console.log(`f(3, 2) = ${graph.evaluate(bindings).get(f)}`);
console.log(`paths to f: ${countPathsTo(graph, f)}`);

const { derivative } = graph.differentiate(f, [x]);
console.log(`df/dx(3, 2) = ${graph.evaluate(bindings).get(derivative)}`);

const result = new GradientChecker().checkEach(graph, f, [x, y], bindings);
console.log(formatGradCheckResult(result, 'f'));
