import { describe, it, expect } from '@jest/globals';
import pino from 'pino';
import type { DateRange } from '@crewplan/shared';
import { CalendarDayPolicy, WorkingDayPolicy } from './dateMapping.js';
import type { DateMappingPolicy } from './dateMapping.js';
import {
  cascadeFrom,
  correctDependencies,
  createCorrectionContext,
  orderByPredecessors,
} from './dependencyCorrector.js';
import type { CorrectionContext } from './dependencyCorrector.js';
import { ScheduleDiagnostics } from './types.js';
import type { SchedulingPerson, SchedulingTask } from './types.js';

// ─── Test helpers ─────────────────────────────────────────────────────────────

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

function makeContext(
  tasks: SchedulingTask[],
  policy: DateMappingPolicy = new CalendarDayPolicy(),
): CorrectionContext {
  const dependencies = new Map(tasks.map((task) => [task.id, task.predecessors]));
  return createCorrectionContext(
    tasks,
    dependencies,
    policy,
    new ScheduleDiagnostics(pino({ level: 'silent' })),
  );
}

function range(start: string, end: string): DateRange {
  return { start, end };
}

function violations(ctx: CorrectionContext, dates: ReadonlyMap<string, DateRange>): string[] {
  const found: string[] = [];
  for (const [taskId, preds] of ctx.dependencies) {
    const own = dates.get(taskId);
    for (const predId of preds) {
      const pred = dates.get(predId);
      if (own && pred && own.start <= pred.end) found.push(`${predId}->${taskId}`);
    }
  }
  return found;
}

// ─── orderByPredecessors ──────────────────────────────────────────────────────

describe('orderByPredecessors', () => {
  it('puts every task after its predecessors', () => {
    const deps = new Map([
      ['C', ['B']],
      ['B', ['A']],
      ['A', []],
    ]);
    expect(orderByPredecessors(['C', 'B', 'A'], deps)).toEqual(['A', 'B', 'C']);
  });

  it('takes ready tasks in input order', () => {
    const deps = new Map([
      ['X', []],
      ['Y', ['X']],
      ['Z', []],
    ]);
    expect(orderByPredecessors(['X', 'Y', 'Z'], deps)).toEqual(['X', 'Z', 'Y']);
  });

  it('appends tasks on a cycle instead of dropping them', () => {
    const deps = new Map([
      ['X', ['Y']],
      ['Y', ['X']],
      ['Z', []],
    ]);
    expect(orderByPredecessors(['X', 'Y', 'Z'], deps)).toEqual(['Z', 'X', 'Y']);
  });
});

// ─── correctDependencies ──────────────────────────────────────────────────────

describe('correctDependencies', () => {
  it('moves an overlapping successor to the day after its predecessor ends', () => {
    const ctx = makeContext([makeTask('A', 3), makeTask('B', 2, ['A'])]);
    const input = new Map([
      ['A', range('2025-01-06', '2025-01-08')],
      ['B', range('2025-01-08', '2025-01-09')],
    ]);

    const corrected = correctDependencies(ctx, input);

    expect(corrected.get('B')).toEqual(range('2025-01-09', '2025-01-10'));
    expect(input.get('B')).toEqual(range('2025-01-08', '2025-01-09'));
  });

  it('waits for the latest of several predecessors', () => {
    const ctx = makeContext([makeTask('A', 1), makeTask('B', 4), makeTask('C', 1, ['A', 'B'])]);
    const corrected = correctDependencies(
      ctx,
      new Map([
        ['A', range('2025-01-06', '2025-01-06')],
        ['B', range('2025-01-06', '2025-01-09')],
        ['C', range('2025-01-07', '2025-01-07')],
      ]),
    );
    expect(corrected.get('C')).toEqual(range('2025-01-10', '2025-01-10'));
  });

  it('leaves a consistent map unchanged, also when applied twice', () => {
    const ctx = makeContext([makeTask('A', 2), makeTask('B', 2, ['A']), makeTask('C', 1, ['A'])]);
    const consistent = new Map([
      ['A', range('2025-01-06', '2025-01-07')],
      ['B', range('2025-01-08', '2025-01-09')],
      ['C', range('2025-01-10', '2025-01-10')],
    ]);

    const once = correctDependencies(ctx, consistent);
    const twice = correctDependencies(ctx, once);

    expect(once).toEqual(consistent);
    expect(twice).toEqual(consistent);
  });

  it('lays a shifted task out again on working days', () => {
    const policy = new WorkingDayPolicy({ listByRole: () => [], getPerson: () => undefined });
    const ctx = makeContext([makeTask('A', 5), makeTask('B', 2, ['A'])], policy);

    const corrected = correctDependencies(
      ctx,
      new Map([
        ['A', range('2025-01-06', '2025-01-10')],
        ['B', range('2025-01-10', '2025-01-13')],
      ]),
    );

    expect(corrected.get('B')).toEqual(range('2025-01-13', '2025-01-14'));
  });

  it('drops the dates of a task that cannot be laid out after its predecessors', () => {
    const never: SchedulingPerson = {
      id: 'never',
      name: 'Never',
      position: 'Builder',
      daysOff: [1, 2, 3, 4, 5, 6, 7],
    };
    const policy = new WorkingDayPolicy({
      listByRole: () => [],
      getPerson: (id) => (id === never.id ? never : undefined),
    });
    const ctx = makeContext(
      [makeTask('A', 2), { ...makeTask('B', 2, ['A']), employeeId: 'never' }],
      policy,
    );

    const corrected = correctDependencies(
      ctx,
      new Map([
        ['A', range('2025-01-06', '2025-01-07')],
        ['B', range('2025-01-07', '2025-01-08')],
      ]),
    );

    expect(corrected.get('A')).toEqual(range('2025-01-06', '2025-01-07'));
    expect(corrected.has('B')).toBe(false);
    expect(ctx.diagnostics.warnings.map((w) => [w.taskId, w.type])).toEqual([
      ['B', 'unschedulable_dates'],
    ]);
  });

  it('ignores predecessors without dates', () => {
    const ctx = makeContext([makeTask('A', 1), makeTask('B', 1, ['A'])]);
    const corrected = correctDependencies(ctx, new Map([['B', range('2025-01-06', '2025-01-06')]]));
    expect(corrected.get('B')).toEqual(range('2025-01-06', '2025-01-06'));
  });
});

// ─── cascadeFrom ──────────────────────────────────────────────────────────────

describe('cascadeFrom', () => {
  it('pushes every transitive successor past a delayed task', () => {
    const ctx = makeContext([makeTask('A', 2), makeTask('B', 2, ['A']), makeTask('C', 1, ['B'])]);
    const dates = new Map([
      ['A', range('2025-01-06', '2025-01-07')],
      ['B', range('2025-01-08', '2025-01-09')],
      ['C', range('2025-01-10', '2025-01-10')],
    ]);

    dates.set('A', range('2025-01-06', '2025-01-09'));
    const shifts = cascadeFrom(ctx, 'A', dates);

    expect(shifts).toBe(2);
    expect(dates.get('B')).toEqual(range('2025-01-10', '2025-01-11'));
    expect(dates.get('C')).toEqual(range('2025-01-12', '2025-01-12'));
    expect(violations(ctx, dates)).toEqual([]);
  });

  it('stops at successors that still fit', () => {
    const ctx = makeContext([makeTask('A', 1), makeTask('B', 1, ['A']), makeTask('C', 1, ['A'])]);
    const dates = new Map([
      ['A', range('2025-01-06', '2025-01-06')],
      ['B', range('2025-01-07', '2025-01-07')],
      ['C', range('2025-01-20', '2025-01-20')],
    ]);

    dates.set('A', range('2025-01-06', '2025-01-08'));
    expect(cascadeFrom(ctx, 'A', dates)).toBe(1);
    expect(dates.get('B')).toEqual(range('2025-01-09', '2025-01-09'));
    expect(dates.get('C')).toEqual(range('2025-01-20', '2025-01-20'));
  });

  it('settles a diamond against the later branch', () => {
    const ctx = makeContext([
      makeTask('A', 1),
      makeTask('B', 1, ['A']),
      makeTask('C', 3, ['A']),
      makeTask('D', 1, ['B', 'C']),
    ]);
    const dates = new Map([
      ['A', range('2025-01-06', '2025-01-06')],
      ['B', range('2025-01-07', '2025-01-07')],
      ['C', range('2025-01-07', '2025-01-09')],
      ['D', range('2025-01-10', '2025-01-10')],
    ]);

    dates.set('A', range('2025-01-06', '2025-01-07'));
    cascadeFrom(ctx, 'A', dates);

    expect(dates.get('C')).toEqual(range('2025-01-08', '2025-01-10'));
    expect(dates.get('D')).toEqual(range('2025-01-11', '2025-01-11'));
    expect(violations(ctx, dates)).toEqual([]);
  });
});
