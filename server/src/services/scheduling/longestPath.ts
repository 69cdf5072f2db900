/**
 * Longest-path solver for the Critical Path Method.
 *
 * Earliest and latest event times are computed by label correction: every edge is
 * scanned repeatedly and labels are improved until a full pass changes nothing. The
 * result does not depend on the order in which nodes were numbered.
 */

import { SOURCE_NODE, reverseAdjacency } from './dependencyGraph.js';
import type { DependencyGraph } from './dependencyGraph.js';

/** Relaxation passes allowed per node before the solver gives up. */
export const PASSES_PER_NODE = 10;

/**
 * Raised when relaxation does not settle within the pass cap. On an acyclic graph
 * this cannot happen, so it signals a fault in the caller (e.g. the cycle check
 * was skipped), not a property of the input.
 */
export class RelaxationLimitError extends Error {
  readonly passes: number;

  constructor(direction: 'earliest' | 'latest', passes: number) {
    super(`Relaxation of ${direction} times did not settle after ${passes} passes`);
    this.name = 'RelaxationLimitError';
    this.passes = passes;
  }
}

export interface LongestPathSolution {
  earliest: number[];
  latest: number[];
  /** latest - earliest per node. */
  slack: number[];
  /** Interior (task) nodes with zero slack, ascending by node number. */
  criticalNodes: number[];
  /** Task IDs of the critical nodes, same order. */
  criticalTaskIds: string[];
}

/**
 * Earliest event times: label[v] = max(label[v], label[u] + w) over every edge.
 * @throws RelaxationLimitError if the labels do not settle within the pass cap
 */
export function computeEarliestTimes(graph: DependencyGraph): number[] {
  const labels = new Array<number>(graph.nodeCount).fill(0);
  const maxPasses = PASSES_PER_NODE * graph.nodeCount;

  let changed = true;
  let passes = 0;
  while (changed) {
    if (passes >= maxPasses) {
      throw new RelaxationLimitError('earliest', passes);
    }
    changed = false;
    passes++;

    for (let node = 0; node < graph.nodeCount; node++) {
      for (const { to, weight } of graph.adjacency.get(node) ?? []) {
        if (labels[node] + weight > labels[to]) {
          labels[to] = labels[node] + weight;
          changed = true;
        }
      }
    }
  }

  return labels;
}

/**
 * Latest event times: starting from the project's earliest completion at every node,
 * label[u] = min(label[u], label[v] - w) over every edge (u, v, w).
 * @throws RelaxationLimitError if the labels do not settle within the pass cap
 */
export function computeLatestTimes(graph: DependencyGraph, earliest: readonly number[]): number[] {
  const completion = earliest[graph.sink] ?? 0;
  const labels = new Array<number>(graph.nodeCount).fill(completion);
  const incoming = reverseAdjacency(graph);
  const maxPasses = PASSES_PER_NODE * graph.nodeCount;

  let changed = true;
  let passes = 0;
  while (changed) {
    if (passes >= maxPasses) {
      throw new RelaxationLimitError('latest', passes);
    }
    changed = false;
    passes++;

    for (let node = graph.nodeCount - 1; node >= 0; node--) {
      for (const { to: from, weight } of incoming.get(node) ?? []) {
        if (labels[node] - weight < labels[from]) {
          labels[from] = labels[node] - weight;
          changed = true;
        }
      }
    }
  }

  return labels;
}

/**
 * Solve earliest/latest times, slack and the critical node set.
 * The graph must already have passed the cycle check.
 */
export function solveLongestPath(graph: DependencyGraph): LongestPathSolution {
  const earliest = computeEarliestTimes(graph);
  const latest = computeLatestTimes(graph, earliest);
  const slack = earliest.map((early, node) => latest[node] - early);

  const criticalNodes: number[] = [];
  const criticalTaskIds: string[] = [];
  for (let node = SOURCE_NODE + 1; node < graph.sink; node++) {
    if (slack[node] !== 0) continue;
    const taskId = graph.taskOfNode.get(node);
    if (taskId === undefined) continue;
    criticalNodes.push(node);
    criticalTaskIds.push(taskId);
  }

  return { earliest, latest, slack, criticalNodes, criticalTaskIds };
}
