import { GoalChainError, InvalidSnapshotError } from '../core/errors';
import type { Field } from '../goals/field';
import type { Goal } from '../goals/goal';
import type { ConversationPhase, FieldValues } from '../types';
import type { ChainSnapshot, ConversationEntry } from '../types/graph';

// Transitions inside one data-collection episode. Leaving `done` or returning
// to `awaiting_input` only happens by starting a new episode.
const VALID_TRANSITIONS: Record<ConversationPhase, ConversationPhase[]> = {
  awaiting_input: ['awaiting_input', 'collecting', 'confirming', 'done'],
  collecting: ['collecting', 'confirming', 'done'],
  confirming: ['confirming', 'collecting', 'done'],
  done: [], // terminal
};

export function validateTransition(current: ConversationPhase, next: ConversationPhase): boolean {
  return VALID_TRANSITIONS[current].includes(next);
}

function findField(goals: Goal[], name: string): Field | undefined {
  for (const goal of goals) {
    const field = goal.getField(name);
    if (field) return field;
  }
  return undefined;
}

export interface SwitchOptions {
  keepMessages: boolean;
  carryData: boolean;
}

/**
 * Everything one conversation owns. The chain clones it at the start of a turn
 * and commits the clone only when the turn succeeds.
 */
export class ConversationState {
  private constructor(
    public activeGoal: Goal,
    public phase: ConversationPhase,
    public collectedData: FieldValues,
    private readonly histories: Map<string, ConversationEntry[]>,
    private readonly memories: Map<string, FieldValues> = new Map()
  ) {}

  static initial(goal: Goal): ConversationState {
    return new ConversationState(goal, 'awaiting_input', {}, new Map([[goal.label, []]]));
  }

  /**
   * Rebuild state from a snapshot taken on the same graph. Collected values
   * go through their field validators again; a value no goal declares, a
   * rejected value, or a confirming/done phase with required fields missing
   * fails with InvalidSnapshotError.
   */
  static fromSnapshot(snapshot: ChainSnapshot, goals: Goal[]): ConversationState {
    const activeGoal = goals.find((goal) => goal.label === snapshot.activeGoal);
    if (!activeGoal) {
      throw new InvalidSnapshotError(`Snapshot refers to unknown goal "${snapshot.activeGoal}"`, {
        goal: snapshot.activeGoal,
      });
    }

    const collectedData: FieldValues = {};
    for (const [name, value] of Object.entries(snapshot.collectedData)) {
      // Carried data may belong to the goal that handed over
      const field = activeGoal.getField(name) ?? findField(goals, name);
      if (!field) {
        throw new InvalidSnapshotError(`Snapshot holds undeclared field "${name}"`, { field: name });
      }

      const result = field.validate(value);
      if (!result.ok) {
        throw new InvalidSnapshotError(`Snapshot value for "${name}" is invalid: ${result.message}`, {
          field: name,
        });
      }
      collectedData[name] = result.value;
    }

    if (
      (snapshot.phase === 'confirming' || snapshot.phase === 'done') &&
      !activeGoal.requiredFieldsSatisfied(collectedData)
    ) {
      throw new InvalidSnapshotError(`Snapshot phase "${snapshot.phase}" requires all fields of "${activeGoal.label}"`, {
        goal: activeGoal.label,
        missing: activeGoal.missingFields(collectedData).map((field) => field.name),
      });
    }

    const histories = new Map<string, ConversationEntry[]>();
    Object.entries(snapshot.histories).forEach(([label, entries]) => {
      histories.set(label, entries.map((entry) => ({ ...entry })));
    });

    const memories = new Map<string, FieldValues>();
    Object.entries(snapshot.memory ?? {}).forEach(([label, memory]) => memories.set(label, { ...memory }));

    return new ConversationState(activeGoal, snapshot.phase, collectedData, histories, memories);
  }

  clone(): ConversationState {
    const histories = new Map<string, ConversationEntry[]>();
    this.histories.forEach((entries, label) => histories.set(label, [...entries]));
    const memories = new Map<string, FieldValues>();
    this.memories.forEach((memory, label) => memories.set(label, { ...memory }));
    return new ConversationState(this.activeGoal, this.phase, { ...this.collectedData }, histories, memories);
  }

  /**
   * The active goal's hook memory, created on first use.
   */
  memory(label: string = this.activeGoal.label): FieldValues {
    const memory = this.memories.get(label);
    if (memory) return memory;

    const created: FieldValues = {};
    this.memories.set(label, created);
    return created;
  }

  history(label: string = this.activeGoal.label): ConversationEntry[] {
    const entries = this.histories.get(label);
    if (entries) return entries;

    const created: ConversationEntry[] = [];
    this.histories.set(label, created);
    return created;
  }

  record(entry: ConversationEntry): void {
    this.history().push(entry);
  }

  transition(next: ConversationPhase): void {
    if (!validateTransition(this.phase, next)) {
      throw new GoalChainError(
        `Invalid phase transition on goal "${this.activeGoal.label}": ${this.phase} → ${next}. ` +
          `Allowed from ${this.phase}: [${VALID_TRANSITIONS[this.phase].join(', ')}]`,
        'INVALID_TRANSITION',
        500,
        { goal: this.activeGoal.label, from: this.phase, to: next }
      );
    }
    this.phase = next;
  }

  /**
   * Starts a fresh episode on the same goal; history is kept.
   */
  startEpisode(): void {
    this.phase = 'awaiting_input';
    this.collectedData = {};
  }

  switchGoal(target: Goal, options: SwitchOptions): void {
    const inherited = options.keepMessages ? [...this.history()] : [];
    const carried = options.carryData ? { ...this.collectedData } : {};

    this.histories.set(target.label, inherited);
    this.memories.set(target.label, {});
    this.activeGoal = target;
    this.phase = 'awaiting_input';
    this.collectedData = carried;
  }

  snapshot(): ChainSnapshot {
    const histories: Record<string, ConversationEntry[]> = {};
    this.histories.forEach((entries, label) => {
      histories[label] = entries.map((entry) => ({ ...entry }));
    });

    const snapshot: ChainSnapshot = {
      activeGoal: this.activeGoal.label,
      phase: this.phase,
      collectedData: { ...this.collectedData },
      histories,
    };
    const memory: Record<string, FieldValues> = {};
    this.memories.forEach((values, label) => {
      if (Object.keys(values).length > 0) memory[label] = { ...values };
    });
    if (Object.keys(memory).length > 0) {
      snapshot.memory = memory;
    }
    return snapshot;
  }
}
