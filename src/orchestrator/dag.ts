/**
 * Dependency graph checks and batch planning.
 *
 * Batches are dependency levels: a task sits in the first batch after all
 * of its dependencies. Members keep submission order, so the plan depends
 * only on the graph.
 */

import { InvalidDependencyGraphError } from '../core/errors.js';
import type { TaskSpec } from './types.js';

export interface TaskGraph {
  tasks: Map<string, TaskSpec>;
  /** Submission order */
  order: string[];
  dependencies: Map<string, string[]>;
  dependents: Map<string, string[]>;
}

export function buildGraph(tasks: readonly TaskSpec[]): TaskGraph {
  const graph: TaskGraph = {
    tasks: new Map(),
    order: [],
    dependencies: new Map(),
    dependents: new Map(),
  };

  for (const task of tasks) {
    if (!task.name) {
      throw new InvalidDependencyGraphError('Task names must be non-empty', []);
    }
    if (graph.tasks.has(task.name)) {
      throw new InvalidDependencyGraphError(`Duplicate task name "${task.name}"`, [task.name]);
    }
    graph.tasks.set(task.name, task);
    graph.order.push(task.name);
    graph.dependents.set(task.name, []);
  }

  for (const name of graph.order) {
    const deps = [...new Set(graph.tasks.get(name)?.dependsOn ?? [])];
    for (const dep of deps) {
      if (dep === name) {
        throw new InvalidDependencyGraphError(`Task "${name}" depends on itself`, [name]);
      }
      const dependents = graph.dependents.get(dep);
      if (!dependents) {
        throw new InvalidDependencyGraphError(`Task "${name}" depends on unknown task "${dep}"`, [name, dep]);
      }
      dependents.push(name);
    }
    graph.dependencies.set(name, deps);
  }

  const cycle = findCycle(graph);
  if (cycle) {
    throw new InvalidDependencyGraphError(`Dependency cycle: ${cycle.join(' -> ')}`, cycle);
  }

  return graph;
}

/**
 * Returns one cycle as a closed path (first name repeated at the end), or null.
 */
export function findCycle(graph: TaskGraph): string[] | null {
  const WHITE = 0, GREY = 1, BLACK = 2;
  const colour = new Map<string, number>(graph.order.map(name => [name, WHITE]));
  const stack: string[] = [];

  const visit = (name: string): string[] | null => {
    colour.set(name, GREY);
    stack.push(name);
    for (const dep of graph.dependencies.get(name) ?? []) {
      const state = colour.get(dep);
      if (state === GREY) {
        const path = stack.slice(stack.indexOf(dep));
        // Report in execution direction: dependency before dependent
        return [...path, dep].reverse();
      }
      if (state === WHITE) {
        const found = visit(dep);
        if (found) return found;
      }
    }
    stack.pop();
    colour.set(name, BLACK);
    return null;
  };

  for (const name of graph.order) {
    if (colour.get(name) === WHITE) {
      const found = visit(name);
      if (found) return found;
    }
  }
  return null;
}

/**
 * Dependency level of every task: 0 for roots, else one past the deepest dependency.
 */
export function levels(graph: TaskGraph): string[][] {
  const level = new Map<string, number>();

  const levelOf = (name: string): number => {
    const known = level.get(name);
    if (known !== undefined) return known;
    let value = 0;
    for (const dep of graph.dependencies.get(name) ?? []) {
      value = Math.max(value, levelOf(dep) + 1);
    }
    level.set(name, value);
    return value;
  };

  const batches: string[][] = [];
  for (const name of graph.order) {
    const index = levelOf(name);
    while (batches.length <= index) batches.push([]);
    batches[index].push(name);
  }
  return batches;
}

/**
 * Static batch plan for a set of tasks (validates the graph).
 */
export function planBatches(tasks: readonly TaskSpec[]): string[][] {
  return levels(buildGraph(tasks));
}

/**
 * Every task that transitively depends on `name`, in submission order.
 */
export function transitiveDependents(graph: TaskGraph, name: string): string[] {
  const seen = new Set<string>();
  const queue = [...(graph.dependents.get(name) ?? [])];
  while (queue.length > 0) {
    const next = queue.shift();
    if (next === undefined || seen.has(next)) continue;
    seen.add(next);
    queue.push(...(graph.dependents.get(next) ?? []));
  }
  return graph.order.filter(task => seen.has(task));
}
