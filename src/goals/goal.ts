import { config } from '../core/config';
import { GraphDefinitionError } from '../core/errors';
import { logger } from '../core/logger';
import type { FieldValues, GoalPromptContext } from '../types';
import type { PromptTemplates } from '../prompts/templates';
import { resolvePrompts } from '../prompts/templates';
import type { GoalAction } from './action';
import { Connection, ConnectionOptions, createConnection, isDuplicate, toTriggerSpecs } from './connection';
import { Field, FieldOptions, isBlank, ValidationResult } from './field';

/**
 * What a lifecycle hook sees. `data` is a copy of the collected values;
 * `memory` is this goal's scratch space in the current conversation and may
 * be written to (it is kept in snapshots).
 */
export interface GoalHookContext {
  data: FieldValues;
  memory: FieldValues;
}

export interface GoalHooks {
  /** Runs each time the goal takes over the conversation. */
  onStart?: (context: GoalHookContext) => void | Promise<void>;
  /**
   * Runs once the required fields are in, before confirmation (or before
   * finalizing when `confirm` is off). `invalid(message)` keeps the goal
   * collecting and sends `message`; `valid(data)` may amend the data.
   */
  onComplete?: (context: GoalHookContext) => ValidationResult<FieldValues> | Promise<ValidationResult<FieldValues>>;
}

export interface GoalOptions {
  label: string;
  goal: string;
  opener: string;
  outOfScope?: string;
  confirm?: boolean;
  model?: string;
  jsonModel?: string;
  prompts?: Partial<PromptTemplates>;
  params?: Record<string, unknown>;
  hooks?: GoalHooks;
}

/**
 * A node of the conversation graph. Definitions are static and may be shared
 * by many chains; per-conversation state (history, collected values) lives in
 * the chain.
 */
export class Goal {
  readonly label: string;
  readonly goal: string;
  readonly opener: string;
  readonly outOfScope?: string;
  readonly confirm: boolean;
  readonly model: string;
  readonly jsonModel: string;
  readonly prompts: PromptTemplates;
  readonly params: Record<string, unknown>;
  readonly hooks: GoalHooks;

  private readonly fieldMap = new Map<string, Field>();
  private readonly outgoing: Connection[] = [];
  private completionAction: GoalAction | null = null;
  private sealed = false;

  constructor(options: GoalOptions, fields: Field[] = []) {
    this.label = options.label;
    this.goal = options.goal;
    this.opener = options.opener;
    this.outOfScope = options.outOfScope;
    this.confirm = options.confirm ?? true;
    this.model = options.model ?? config.models.chat;
    this.jsonModel = options.jsonModel ?? config.models.json;
    this.prompts = resolvePrompts(options.prompts);
    this.params = { ...options.params };
    this.hooks = { ...options.hooks };

    fields.forEach((field) => this.addField(field));
  }

  get fields(): Field[] {
    return [...this.fieldMap.values()];
  }

  get connections(): Connection[] {
    return [...this.outgoing];
  }

  get action(): GoalAction | null {
    return this.completionAction;
  }

  get isRoutingHub(): boolean {
    return this.fieldMap.size === 0;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  getField(name: string): Field | undefined {
    return this.fieldMap.get(name);
  }

  addField(field: Field): this {
    this.assertMutable('add a field');
    if (this.fieldMap.has(field.name)) {
      throw new GraphDefinitionError(`Goal "${this.label}" already has a field named "${field.name}"`, {
        goal: this.label,
        field: field.name,
      });
    }
    this.fieldMap.set(field.name, field);
    return this;
  }

  connect(target: Goal, userGoal: string, options: ConnectionOptions = {}): this {
    this.assertMutable('add a connection');
    const connection = createConnection(this, target, userGoal, options);

    if (isDuplicate(this.outgoing, connection)) {
      logger.debug('Duplicate connection ignored', { source: this.label, target: target.label, userGoal });
      return this;
    }

    this.outgoing.push(connection);
    return this;
  }

  then(action: GoalAction): this {
    this.assertMutable('attach an action');
    this.completionAction = action;
    return this;
  }

  /**
   * Freezes the structure. Called when a chain starts so shared definitions
   * cannot change under a live conversation.
   */
  seal(): void {
    this.sealed = true;
  }

  hasRequiredFields(): boolean {
    return this.fields.some((field) => !field.optional);
  }

  missingFields(data: FieldValues): Field[] {
    return this.fields.filter((field) => !field.optional && isBlank(data[field.name]));
  }

  requiredFieldsSatisfied(data: FieldValues): boolean {
    return this.missingFields(data).length === 0;
  }

  renderPromptContext(): GoalPromptContext {
    return {
      label: this.label,
      goal: this.goal,
      opener: this.opener,
      outOfScope: this.outOfScope,
      confirm: this.confirm,
      fields: this.fields.map((field) => field.toSpec()),
      triggers: toTriggerSpecs(this.outgoing),
    };
  }

  private assertMutable(operation: string): void {
    if (this.sealed) {
      throw new GraphDefinitionError(`Cannot ${operation} on goal "${this.label}" after a conversation has started`, {
        goal: this.label,
      });
    }
  }
}

export type FieldDeclarations = Record<string, FieldOptions & { description: string }>;

/**
 * A reusable goal shape: ordered field declarations instantiated into
 * concrete goals with their own label, statement and opener.
 *
 * @example
 * const OrderGoal = GoalType.define({
 *   quantity: { description: 'quantity of product', formatHint: 'an integer' },
 * });
 * const order = OrderGoal.create({ label: 'order', goal: '...', opener: '...' });
 */
export class GoalType {
  private constructor(private readonly declarations: FieldDeclarations) {}

  static define(declarations: FieldDeclarations): GoalType {
    return new GoalType(declarations);
  }

  get fieldNames(): string[] {
    return Object.keys(this.declarations);
  }

  create(options: GoalOptions): Goal {
    const fields = Object.entries(this.declarations).map(
      ([name, { description, ...fieldOptions }]) => new Field(name, description, fieldOptions)
    );
    return new Goal(options, fields);
  }
}
