/**
 * Dependency graph construction and cycle detection.
 *
 * Tasks become nodes 1..N in input order. Node 0 is a synthetic source and node N+1
 * a synthetic sink. Every edge leaving a task node carries that task's duration, so
 * a node's longest distance from the source is the earliest start offset of its task
 * and the sink's distance is the project length.
 */

import type { ScheduleDiagnostics, SchedulingTask } from './types.js';

export const SOURCE_NODE = 0;

export interface WeightedEdge {
  to: number;
  weight: number;
}

export interface DependencyGraph {
  /** node -> outgoing edges. Every node 0..sink has an entry. */
  adjacency: Map<number, WeightedEdge[]>;
  nodeOfTask: Map<string, number>;
  taskOfNode: Map<number, string>;
  sink: number;
  /** Number of nodes including source and sink. */
  nodeCount: number;
  /** Predecessor IDs actually wired into the graph, per task. */
  dependencies: Map<string, string[]>;
}

/**
 * Build the graph for a list of normalized tasks.
 * Predecessor references to tasks outside the list are dropped with a warning.
 * Returns null for an empty task list.
 */
export function buildDependencyGraph(
  tasks: readonly SchedulingTask[],
  diagnostics: ScheduleDiagnostics,
): DependencyGraph | null {
  if (tasks.length === 0) {
    return null;
  }

  const nodeOfTask = new Map<string, number>();
  const taskOfNode = new Map<number, string>();
  tasks.forEach((task, index) => {
    nodeOfTask.set(task.id, index + 1);
    taskOfNode.set(index + 1, task.id);
  });

  const sink = tasks.length + 1;
  const adjacency = new Map<number, WeightedEdge[]>();
  for (let node = SOURCE_NODE; node <= sink; node++) {
    adjacency.set(node, []);
  }

  const addEdge = (from: number, to: number, weight: number) => {
    adjacency.get(from)?.push({ to, weight });
  };

  // Resolve predecessor references first so dependents are known before sink edges
  const dependencies = new Map<string, string[]>();
  const hasDependents = new Set<string>();
  for (const task of tasks) {
    const resolved: string[] = [];
    for (const predId of task.predecessors) {
      if (nodeOfTask.has(predId)) {
        resolved.push(predId);
        hasDependents.add(predId);
      } else {
        diagnostics.warn(
          'unknown_predecessor',
          task.id,
          `Predecessor ${predId} is not a scheduled task; dependency ignored`,
          { predecessorId: predId },
        );
      }
    }
    dependencies.set(task.id, resolved);
  }

  const durationOf = new Map(tasks.map((task) => [task.id, task.duration]));

  for (const task of tasks) {
    const node = nodeOfTask.get(task.id) ?? SOURCE_NODE;
    const preds = dependencies.get(task.id) ?? [];

    if (preds.length === 0) {
      addEdge(SOURCE_NODE, node, 0);
    } else {
      for (const predId of preds) {
        addEdge(nodeOfTask.get(predId) ?? SOURCE_NODE, node, durationOf.get(predId) ?? 0);
      }
    }

    if (!hasDependents.has(task.id)) {
      addEdge(node, sink, task.duration);
    }
  }

  return {
    adjacency,
    nodeOfTask,
    taskOfNode,
    sink,
    nodeCount: sink + 1,
    dependencies,
  };
}

/**
 * Reverse adjacency: node -> incoming edges, with `to` naming the edge's origin.
 */
export function reverseAdjacency(graph: DependencyGraph): Map<number, WeightedEdge[]> {
  const reversed = new Map<number, WeightedEdge[]>();
  for (let node = 0; node < graph.nodeCount; node++) {
    reversed.set(node, []);
  }
  for (const [from, edges] of graph.adjacency) {
    for (const { to, weight } of edges) {
      reversed.get(to)?.push({ to: from, weight });
    }
  }
  return reversed;
}

const WHITE = 0; // unvisited
const GREY = 1; // on the current DFS path
const BLACK = 2; // fully explored

/**
 * Depth-first search for a back edge. Uses an explicit stack, so arbitrarily deep
 * graphs cannot overflow the call stack.
 *
 * @returns The task IDs on the first cycle found, or null when the graph is acyclic.
 */
export function findCycle(graph: DependencyGraph): string[] | null {
  const color = new Array<number>(graph.nodeCount).fill(WHITE);
  const parent = new Array<number>(graph.nodeCount).fill(-1);

  for (let root = 0; root < graph.nodeCount; root++) {
    if (color[root] !== WHITE) continue;

    // Each frame: [node, index of the next outgoing edge to inspect]
    const stack: Array<[number, number]> = [[root, 0]];
    color[root] = GREY;

    while (stack.length > 0) {
      const frame = stack[stack.length - 1];
      const [node, edgeIndex] = frame;
      const edges = graph.adjacency.get(node) ?? [];

      if (edgeIndex >= edges.length) {
        color[node] = BLACK;
        stack.pop();
        continue;
      }

      frame[1] = edgeIndex + 1;
      const next = edges[edgeIndex].to;

      if (color[next] === GREY) {
        return collectCycle(graph, parent, node, next);
      }
      if (color[next] === WHITE) {
        color[next] = GREY;
        parent[next] = node;
        stack.push([next, 0]);
      }
    }
  }

  return null;
}

function collectCycle(
  graph: DependencyGraph,
  parent: number[],
  from: number,
  backTo: number,
): string[] {
  const nodes: number[] = [];
  for (let node = from; node !== backTo && node !== -1; node = parent[node]) {
    nodes.push(node);
  }
  nodes.push(backTo);
  nodes.reverse();

  const ids: string[] = [];
  for (const node of nodes) {
    const taskId = graph.taskOfNode.get(node);
    if (taskId !== undefined) ids.push(taskId);
  }
  return ids;
}
