import { config } from '../core/config';
import { RoutingLoopError, TurnInProgressError, UnknownConnectionError, CompletionParseError } from '../core/errors';
import { logger } from '../core/logger';
import { Connection, firstSatisfiedCondition, reachableGoals, resolveRoute } from '../goals/connection';
import { Field, isBlank, valid, ValidationResult } from '../goals/field';
import type { Goal } from '../goals/goal';
import type { CompletionService, ConversationPhase, FieldValues } from '../types';
import type { ChainResponse, ChainSnapshot, ConversationEntry, MessageResponse } from '../types/graph';
import { Decision, parseDecision } from './decision';
import { ConversationState } from './state';

export interface GoalChainOptions {
  completion: CompletionService;
  maxHandOvers?: number;
}

interface Rejection {
  field: Field;
  message: string;
}

const sameValue = (a: unknown, b: unknown): boolean =>
  Object.is(a, b) || (typeof a === 'object' && a !== null && JSON.stringify(a) === JSON.stringify(b));

/**
 * Drives one conversation over a goal graph. Each call to `getResponse`
 * processes a single user utterance end to end, including any hand-over to
 * other goals, and returns either a message or the finalized data.
 */
export class GoalChain {
  private state: ConversationState;
  private busy = false;
  private readonly completion: CompletionService;
  private readonly maxHandOvers: number;

  constructor(startGoal: Goal, options: GoalChainOptions, state?: ConversationState) {
    reachableGoals(startGoal).forEach((goal) => goal.seal());

    this.completion = options.completion;
    this.maxHandOvers = options.maxHandOvers ?? config.chain.maxHandOvers;
    this.state = state ?? ConversationState.initial(startGoal);
  }

  static restore(startGoal: Goal, snapshot: ChainSnapshot, options: GoalChainOptions): GoalChain {
    const state = ConversationState.fromSnapshot(snapshot, reachableGoals(startGoal));
    return new GoalChain(startGoal, options, state);
  }

  get goal(): Goal {
    return this.state.activeGoal;
  }

  get phase(): ConversationPhase {
    return this.state.phase;
  }

  get collectedData(): FieldValues {
    return { ...this.state.collectedData };
  }

  history(label: string = this.state.activeGoal.label): ConversationEntry[] {
    return this.state.snapshot().histories[label] ?? [];
  }

  snapshot(): ChainSnapshot {
    return this.state.snapshot();
  }

  async getResponse(userInput?: string): Promise<ChainResponse> {
    const input = userInput?.trim();

    return this.runTurn<ChainResponse>((draft) =>
      input ? this.respond(draft, input, [draft.activeGoal.label], false) : Promise.resolve(this.emitOpener(draft))
    );
  }

  /**
   * Speak as the assistant without user input. Recorded in the active goal's
   * history; routing and collected data are untouched.
   */
  async simulateResponse(content: string, rephrase = false): Promise<MessageResponse> {
    return this.runTurn<MessageResponse>(async (draft) => {
      const goal = draft.activeGoal;
      const text = rephrase ? await this.rephrase(goal, content, draft.history()) : content;
      draft.record({ role: 'assistant', content: text, origin: 'simulated' });
      return { type: 'message', content: text, goal };
    });
  }

  private async runTurn<R extends ChainResponse>(turn: (draft: ConversationState) => Promise<R>): Promise<R> {
    if (this.busy) {
      throw new TurnInProgressError(this.state.activeGoal.label);
    }

    this.busy = true;
    const draft = this.state.clone();

    try {
      const response = await turn(draft);
      this.state = draft;
      return response;
    } catch (error) {
      logger.error('Turn aborted, conversation state unchanged', {
        goal: this.state.activeGoal.label,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    } finally {
      this.busy = false;
    }
  }

  private async respond(
    draft: ConversationState,
    input: string,
    path: string[],
    alreadyRecorded: boolean
  ): Promise<ChainResponse> {
    const goal = draft.activeGoal;

    if (draft.phase === 'done') {
      logger.debug('Starting new episode', { goal: goal.label });
      draft.startEpisode();
    }
    if (!alreadyRecorded) {
      draft.record({ role: 'user', content: input });
    }

    const decision = await this.decide(draft);

    if (decision.route) {
      const connection = resolveRoute(goal.connections, decision.route);
      if (connection) {
        return this.follow(draft, connection, input, path);
      }

      const error = new UnknownConnectionError(goal.label, decision.route);
      logger.warn('Treating unknown route as out of scope', { ...error.details });
      return this.outOfScope(draft, decision);
    }

    if (decision.outOfScope) {
      return this.outOfScope(draft, decision);
    }

    return this.extract(draft, decision, input, path);
  }

  private async decide(draft: ConversationState): Promise<Decision> {
    const goal = draft.activeGoal;
    const messages = goal.prompts.DECISION({
      context: goal.renderPromptContext(),
      collectedData: { ...draft.collectedData },
      phase: draft.phase,
      messages: draft.history(),
    });

    const raw = await this.completion.complete({
      model: goal.jsonModel,
      messages,
      jsonMode: true,
      params: goal.params,
    });
    const decision = parseDecision(raw);

    logger.debug('Decision received', {
      goal: goal.label,
      phase: draft.phase,
      route: decision.route,
      outOfScope: decision.outOfScope,
      confirmed: decision.confirmed,
      fields: Object.keys(decision.extractedFields),
    });

    return decision;
  }

  private async follow(
    draft: ConversationState,
    connection: Connection,
    input: string,
    path: string[]
  ): Promise<ChainResponse> {
    const nextPath = [...path, connection.target.label];
    if (nextPath.length - 1 > this.maxHandOvers) {
      throw new RoutingLoopError(nextPath, this.maxHandOvers);
    }

    logger.info('Switching goal', {
      from: connection.source.label,
      to: connection.target.label,
      condition: connection.actionCondition?.name,
      handOver: connection.handOver,
      keepMessages: connection.keepMessages,
    });

    draft.switchGoal(connection.target, connection);
    await this.startGoal(draft);

    if (connection.handOver) {
      return this.respond(draft, input, nextPath, connection.keepMessages);
    }
    return this.emitOpener(draft);
  }

  private async extract(
    draft: ConversationState,
    decision: Decision,
    input: string,
    path: string[]
  ): Promise<ChainResponse> {
    const goal = draft.activeGoal;
    const proposed = decision.extractedFields;
    const rejections: Rejection[] = [];
    let changed = false;

    Object.keys(proposed)
      .filter((name) => !goal.getField(name))
      .forEach((name) => logger.debug('Ignoring undeclared field', { goal: goal.label, field: name }));

    for (const field of goal.fields) {
      if (!(field.name in proposed)) continue;

      const raw = proposed[field.name];
      if (isBlank(raw)) continue;

      const result = field.validate(raw);
      if (!result.ok) {
        rejections.push({ field, message: result.message });
        continue;
      }
      if (!sameValue(draft.collectedData[field.name], result.value)) {
        changed = true;
      }
      draft.collectedData[field.name] = result.value;
    }

    if (rejections.length > 0) {
      logger.info('Field values rejected', {
        goal: goal.label,
        fields: rejections.map((rejection) => rejection.field.name),
      });
      draft.transition('collecting');
      return this.reply(
        draft,
        goal.prompts.VALIDATION_FAILURE(
          rejections.map((rejection) => rejection.message),
          rejections[0].field.toSpec()
        )
      );
    }

    const confirming = draft.phase === 'confirming';
    if (confirming && !changed) {
      if (decision.confirmed === true) {
        return this.finalize(draft);
      }
      if (decision.confirmed === false) {
        draft.transition('collecting');
        return this.reply(draft, decision.message ?? goal.prompts.REVISE);
      }
    }

    const complete =
      !goal.isRoutingHub &&
      goal.requiredFieldsSatisfied(draft.collectedData) &&
      (goal.hasRequiredFields() || decision.done || confirming);

    if (!complete) {
      draft.transition('collecting');
      return this.reply(draft, decision.message ?? this.outstandingQuestion(draft) ?? goal.opener);
    }

    if (!confirming || changed) {
      const gated = firstSatisfiedCondition(goal.connections, draft.collectedData);
      if (gated) {
        return this.follow(draft, gated, input, path);
      }

      const verdict = await this.checkCompletion(draft);
      if (!verdict.ok) {
        draft.transition('collecting');
        return this.reply(draft, verdict.message);
      }
      draft.collectedData = { ...verdict.value };
    }

    if (!goal.confirm) {
      return this.finalize(draft);
    }

    draft.transition('confirming');
    const summary = this.confirmationPrompt(draft);
    return this.reply(draft, !confirming || changed ? summary : decision.message ?? summary);
  }

  private async finalize(draft: ConversationState): Promise<ChainResponse> {
    const goal = draft.activeGoal;
    const data = { ...draft.collectedData };
    draft.transition('done');

    logger.info('Goal completed', { goal: goal.label, fields: Object.keys(data) });

    const action = goal.action;
    if (!action) {
      return { type: 'data', content: data, goal };
    }

    const { result, text } = await action.execute(data);
    if (text === null) {
      return { type: 'data', content: result, goal };
    }

    // The handler has run; nothing after it may fail the turn
    const content = action.rephrase ? await this.rephraseOrKeep(goal, text, draft.history()) : text;
    draft.record({ role: 'assistant', content });

    const response: MessageResponse = { type: 'message', content, goal };
    if (action.end) response.end = true;
    return response;
  }

  private async startGoal(draft: ConversationState): Promise<void> {
    const { onStart } = draft.activeGoal.hooks;
    if (!onStart) return;

    logger.debug('Running goal start hook', { goal: draft.activeGoal.label });
    await onStart({ data: { ...draft.collectedData }, memory: draft.memory() });
  }

  private async checkCompletion(draft: ConversationState): Promise<ValidationResult<FieldValues>> {
    const goal = draft.activeGoal;
    const data = { ...draft.collectedData };
    if (!goal.hooks.onComplete) return valid(data);

    const verdict = await goal.hooks.onComplete({ data, memory: draft.memory() });
    if (!verdict.ok) {
      logger.info('Completion rejected by goal', { goal: goal.label, reason: verdict.message });
    }
    return verdict;
  }

  private outOfScope(draft: ConversationState, decision: Decision): MessageResponse {
    const goal = draft.activeGoal;
    const lead = goal.outOfScope ?? decision.message ?? goal.prompts.OUT_OF_SCOPE;
    const question = this.outstandingQuestion(draft);

    return this.reply(draft, question ? `${lead} ${question}` : lead);
  }

  /**
   * What the conversation is waiting on: the pending confirmation, else the
   * first unfilled field (required before optional).
   */
  private outstandingQuestion(draft: ConversationState): string | null {
    const goal = draft.activeGoal;
    if (draft.phase === 'confirming') {
      return this.confirmationPrompt(draft);
    }

    const [missing] = goal.missingFields(draft.collectedData);
    const next = missing ?? goal.fields.find((field) => !(field.name in draft.collectedData));
    return next ? goal.prompts.ASK_FOR_FIELD(next.toSpec()) : null;
  }

  private confirmationPrompt(draft: ConversationState): string {
    const goal = draft.activeGoal;
    return goal.prompts.CONFIRMATION(
      goal.fields.map((field) => field.toSpec()),
      draft.collectedData
    );
  }

  private emitOpener(draft: ConversationState): MessageResponse {
    return this.reply(draft, draft.activeGoal.opener);
  }

  private reply(draft: ConversationState, content: string): MessageResponse {
    draft.record({ role: 'assistant', content });
    return { type: 'message', content, goal: draft.activeGoal };
  }

  private async rephrase(goal: Goal, text: string, history: ConversationEntry[]): Promise<string> {
    const rephrased = await this.completion.complete({
      model: goal.model,
      messages: goal.prompts.REPHRASE({ response: text, goal: goal.goal, messages: history }),
      jsonMode: false,
      params: goal.params,
    });

    const trimmed = rephrased.trim();
    if (!trimmed) {
      throw new CompletionParseError('Rephrase returned no text', { goal: goal.label });
    }
    return trimmed;
  }

  private async rephraseOrKeep(goal: Goal, text: string, history: ConversationEntry[]): Promise<string> {
    try {
      return await this.rephrase(goal, text, history);
    } catch (error) {
      logger.warn('Rephrase failed, sending the template text', {
        goal: goal.label,
        error: error instanceof Error ? error.message : String(error),
      });
      return text;
    }
  }
}
