import { describe, it, expect } from '@jest/globals';
import pino from 'pino';
import { buildDependencyGraph, findCycle, reverseAdjacency } from './dependencyGraph.js';
import type { DependencyGraph } from './dependencyGraph.js';
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

function build(
  tasks: SchedulingTask[],
  diagnostics = new ScheduleDiagnostics(pino({ level: 'silent' })),
): DependencyGraph {
  const graph = buildDependencyGraph(tasks, diagnostics);
  if (!graph) throw new Error('expected a graph');
  return graph;
}

describe('buildDependencyGraph', () => {
  it('returns null for an empty task list', () => {
    expect(buildDependencyGraph([], new ScheduleDiagnostics(pino({ level: 'silent' })))).toBeNull();
  });

  it('numbers tasks in input order between source and sink', () => {
    const graph = build([makeTask('A', 3), makeTask('B', 2, ['A']), makeTask('C', 1, ['A'])]);

    expect(graph.sink).toBe(4);
    expect(graph.nodeCount).toBe(5);
    expect([...graph.nodeOfTask]).toEqual([
      ['A', 1],
      ['B', 2],
      ['C', 3],
    ]);
    expect(graph.taskOfNode.get(2)).toBe('B');
  });

  it('weights every edge leaving a task with that task duration', () => {
    const graph = build([makeTask('A', 3), makeTask('B', 2, ['A']), makeTask('C', 1, ['A'])]);

    expect(graph.adjacency.get(0)).toEqual([{ to: 1, weight: 0 }]);
    expect(graph.adjacency.get(1)).toEqual([
      { to: 2, weight: 3 },
      { to: 3, weight: 3 },
    ]);
    expect(graph.adjacency.get(2)).toEqual([{ to: 4, weight: 2 }]);
    expect(graph.adjacency.get(3)).toEqual([{ to: 4, weight: 1 }]);
    expect(graph.adjacency.get(4)).toEqual([]);
  });

  it('drops unknown predecessors with a warning', () => {
    const diagnostics = new ScheduleDiagnostics(pino({ level: 'silent' }));
    const graph = build([makeTask('A', 1, ['ghost'])], diagnostics);

    expect(graph.dependencies.get('A')).toEqual([]);
    expect(graph.adjacency.get(0)).toEqual([{ to: 1, weight: 0 }]);
    expect(diagnostics.warnings).toEqual([
      {
        taskId: 'A',
        type: 'unknown_predecessor',
        message: 'Predecessor ghost is not a scheduled task; dependency ignored',
      },
    ]);
  });

  it('does not mutate the input tasks', () => {
    const tasks = [makeTask('A', 1), makeTask('B', 1, ['A', 'ghost'])];
    build(tasks);
    expect(tasks[1].predecessors).toEqual(['A', 'ghost']);
  });
});

describe('reverseAdjacency', () => {
  it('lists incoming edges per node', () => {
    const graph = build([makeTask('A', 3), makeTask('B', 2, ['A']), makeTask('C', 1, ['A'])]);
    const incoming = reverseAdjacency(graph);

    expect(incoming.get(0)).toEqual([]);
    expect(incoming.get(1)).toEqual([{ to: 0, weight: 0 }]);
    expect(incoming.get(4)).toEqual([
      { to: 2, weight: 2 },
      { to: 3, weight: 1 },
    ]);
  });
});

describe('findCycle', () => {
  it('returns null for an acyclic graph', () => {
    const graph = build([makeTask('A', 1), makeTask('B', 1, ['A']), makeTask('C', 1, ['A', 'B'])]);
    expect(findCycle(graph)).toBeNull();
  });

  it('reports a two-task cycle', () => {
    const graph = build([makeTask('A', 1, ['B']), makeTask('B', 1, ['A'])]);
    expect(findCycle(graph)).toEqual(['A', 'B']);
  });

  it('reports a self-dependency', () => {
    const graph = build([makeTask('A', 1, ['A'])]);
    expect(findCycle(graph)).toEqual(['A']);
  });

  it('finds a cycle downstream of acyclic tasks', () => {
    const graph = build([
      makeTask('A', 1),
      makeTask('B', 1, ['A', 'D']),
      makeTask('C', 1, ['B']),
      makeTask('D', 1, ['C']),
    ]);
    expect(findCycle(graph)).toEqual(['B', 'C', 'D']);
  });

  it('handles a long chain without exhausting the call stack', () => {
    const tasks = [makeTask('T0', 1)];
    for (let i = 1; i < 20000; i++) {
      tasks.push(makeTask(`T${i}`, 1, [`T${i - 1}`]));
    }
    expect(findCycle(build(tasks))).toBeNull();
  });
});
