import { describe, it, expect } from '@jest/globals';
import pino from 'pino';
import { buildDependencyGraph } from './dependencyGraph.js';
import type { DependencyGraph } from './dependencyGraph.js';
import {
  PASSES_PER_NODE,
  RelaxationLimitError,
  computeEarliestTimes,
  solveLongestPath,
} from './longestPath.js';
import { ScheduleDiagnostics } from './types.js';
import type { SchedulingTask } from './types.js';

function makeTask(id: string, duration: number, predecessors: string[] = []): SchedulingTask {
  return {
    id,
    name: id,
    duration,
    workingDuration: duration,
    isGroup: false,
    parallel: false,
    parentId: null,
    employeeId: null,
    position: null,
    predecessors,
    startDate: null,
    endDate: null,
  };
}

function build(tasks: SchedulingTask[]): DependencyGraph {
  const graph = buildDependencyGraph(tasks, new ScheduleDiagnostics(pino({ level: 'silent' })));
  if (!graph) throw new Error('expected a graph');
  return graph;
}

function earliestByTask(graph: DependencyGraph, earliest: number[]): Record<string, number> {
  const byTask: Record<string, number> = {};
  for (const [taskId, node] of graph.nodeOfTask) {
    byTask[taskId] = earliest[node];
  }
  return byTask;
}

describe('solveLongestPath', () => {
  it('solves the fan-out example', () => {
    // A(3) -> B(2), A(3) -> C(1)
    const graph = build([makeTask('A', 3), makeTask('B', 2, ['A']), makeTask('C', 1, ['A'])]);
    const solution = solveLongestPath(graph);

    expect(solution.earliest).toEqual([0, 0, 3, 3, 5]);
    expect(solution.latest).toEqual([0, 0, 3, 4, 5]);
    expect(solution.slack).toEqual([0, 0, 0, 1, 0]);
    expect(solution.criticalNodes).toEqual([1, 2]);
    expect(solution.criticalTaskIds).toEqual(['A', 'B']);
  });

  it('solves a diamond', () => {
    // A(2) -> B(4) -> D(3), A(2) -> C(1) -> D(3)
    const graph = build([
      makeTask('A', 2),
      makeTask('B', 4, ['A']),
      makeTask('C', 1, ['A']),
      makeTask('D', 3, ['B', 'C']),
    ]);
    const solution = solveLongestPath(graph);

    expect(earliestByTask(graph, solution.earliest)).toEqual({ A: 0, B: 2, C: 2, D: 6 });
    expect(solution.earliest[graph.sink]).toBe(9);
    expect(solution.slack[graph.nodeOfTask.get('C') ?? -1]).toBe(3);
    expect(solution.criticalTaskIds).toEqual(['A', 'B', 'D']);
  });

  it('gives every task without predecessors an earliest time of 0', () => {
    const graph = build([makeTask('X', 5), makeTask('Y', 2), makeTask('Z', 1, ['Y'])]);
    const solution = solveLongestPath(graph);

    expect(earliestByTask(graph, solution.earliest)).toEqual({ X: 0, Y: 0, Z: 2 });
    expect(solution.criticalTaskIds).toEqual(['X']);
  });

  it('does not depend on input order', () => {
    const forward = build([makeTask('A', 3), makeTask('B', 2, ['A']), makeTask('C', 1, ['B'])]);
    const backward = build([makeTask('C', 1, ['B']), makeTask('B', 2, ['A']), makeTask('A', 3)]);

    const a = solveLongestPath(forward);
    const b = solveLongestPath(backward);
    expect(earliestByTask(backward, b.earliest)).toEqual(earliestByTask(forward, a.earliest));
    expect(b.earliest[backward.sink]).toBe(6);
    expect([...b.criticalTaskIds].sort()).toEqual(['A', 'B', 'C']);
  });

  it('keeps earliest and latest sink times equal', () => {
    const graph = build([
      makeTask('A', 4),
      makeTask('B', 1),
      makeTask('C', 2, ['A', 'B']),
      makeTask('D', 7, ['B']),
    ]);
    const { earliest, latest, slack, criticalNodes } = solveLongestPath(graph);

    expect(earliest[graph.sink]).toBe(latest[graph.sink]);
    const zeroSlackInterior = slack
      .map((value, node) => ({ value, node }))
      .filter(({ value, node }) => value === 0 && node !== 0 && node !== graph.sink)
      .map(({ node }) => node);
    expect(criticalNodes).toEqual(zeroSlackInterior);
  });
});

describe('computeEarliestTimes', () => {
  it('gives up on a positive cycle after the pass cap', () => {
    // Built by hand: the builder's callers always run the cycle check first
    const graph: DependencyGraph = {
      adjacency: new Map([
        [0, [{ to: 1, weight: 1 }]],
        [1, [{ to: 2, weight: 1 }]],
        [2, [{ to: 1, weight: 1 }]],
      ]),
      nodeOfTask: new Map(),
      taskOfNode: new Map(),
      sink: 2,
      nodeCount: 3,
      dependencies: new Map(),
    };

    let thrown: unknown;
    try {
      computeEarliestTimes(graph);
    } catch (err) {
      thrown = err;
    }
    expect(thrown).toBeInstanceOf(RelaxationLimitError);
    if (thrown instanceof RelaxationLimitError) {
      expect(thrown.passes).toBe(PASSES_PER_NODE * 3);
    }
  });
});
