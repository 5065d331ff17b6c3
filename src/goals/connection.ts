import type { Goal } from './goal';
import type { FieldValues, TriggerSpec } from '../types';

/**
 * A named predicate over collected data. The name appears in logs and
 * snapshots; the test decides whether the gated connection fires.
 */
export interface ActionCondition {
  name: string;
  test: (data: FieldValues) => boolean;
}

export interface ConnectionOptions {
  handOver?: boolean;
  keepMessages?: boolean;
  actionCondition?: ActionCondition;
  carryData?: boolean;
}

export interface Connection {
  source: Goal;
  target: Goal;
  userGoal: string;
  handOver: boolean;
  keepMessages: boolean;
  actionCondition?: ActionCondition;
  carryData: boolean;
}

export function createConnection(
  source: Goal,
  target: Goal,
  userGoal: string,
  options: ConnectionOptions = {}
): Connection {
  return {
    source,
    target,
    userGoal,
    handOver: options.handOver ?? false,
    keepMessages: options.keepMessages ?? false,
    actionCondition: options.actionCondition,
    carryData: options.carryData ?? false,
  };
}

export function isDuplicate(existing: Connection[], candidate: Connection): boolean {
  return existing.some(
    (connection) =>
      connection.target === candidate.target &&
      connection.userGoal === candidate.userGoal &&
      connection.actionCondition?.name === candidate.actionCondition?.name
  );
}

/**
 * Connections the model may pick from: ungated, one per trigger text,
 * first-declared wins.
 */
export function intentConnections(connections: Connection[]): Connection[] {
  const seen = new Set<string>();
  const result: Connection[] = [];

  for (const connection of connections) {
    if (connection.actionCondition) continue;
    const key = connection.userGoal.trim().toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    result.push(connection);
  }

  return result;
}

export function conditionalConnections(connections: Connection[]): Connection[] {
  return connections.filter((connection) => connection.actionCondition !== undefined);
}

export function toTriggerSpecs(connections: Connection[]): TriggerSpec[] {
  return intentConnections(connections).map((connection) => ({
    label: connection.target.label,
    userGoal: connection.userGoal,
  }));
}

/**
 * Resolve a route label proposed by the model. Matching ignores case and
 * surrounding angle brackets; null when no intent connection targets it.
 */
export function resolveRoute(connections: Connection[], route: string): Connection | null {
  const wanted = route.trim().replace(/^<|>$/g, '').toLowerCase();
  return (
    intentConnections(connections).find(
      (connection) => connection.target.label.toLowerCase() === wanted
    ) ?? null
  );
}

/**
 * The first gated connection whose condition holds for the data.
 */
export function firstSatisfiedCondition(connections: Connection[], data: FieldValues): Connection | null {
  for (const connection of conditionalConnections(connections)) {
    if (connection.actionCondition?.test(data)) return connection;
  }
  return null;
}

/**
 * Every goal reachable from `start`, in breadth-first order.
 */
export function reachableGoals(start: Goal): Goal[] {
  const visited = new Set<Goal>([start]);
  const queue: Goal[] = [start];

  for (let i = 0; i < queue.length; i++) {
    for (const connection of queue[i].connections) {
      if (!visited.has(connection.target)) {
        visited.add(connection.target);
        queue.push(connection.target);
      }
    }
  }

  return queue;
}
