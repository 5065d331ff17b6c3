export { GoalChain } from './chain/goal-chain';
export type { GoalChainOptions } from './chain/goal-chain';
export { parseDecision } from './chain/decision';
export type { Decision } from './chain/decision';
export { ConversationState, validateTransition } from './chain/state';
export { Field, valid, invalid, isBlank } from './goals/field';
export type { Validator, ValidationResult, FieldOptions } from './goals/field';
export { Goal, GoalType } from './goals/goal';
export type { GoalOptions, GoalHooks, GoalHookContext, FieldDeclarations } from './goals/goal';
export { Action } from './goals/action';
export type { ActionOptions, ActionOutcome, GoalAction } from './goals/action';
export { reachableGoals } from './goals/connection';
export type { Connection, ConnectionOptions, ActionCondition } from './goals/connection';
export { PROMPT_TEMPLATES, resolvePrompts } from './prompts/templates';
export type { PromptTemplates, DecisionPromptInput, RephrasePromptInput } from './prompts/templates';
export { LLMService } from './services/llm.service';
export type { LLMServiceOptions } from './services/llm.service';
export { ConversationService } from './services/conversation.service';
export { createApp } from './server';
export * from './core/errors';
export * from './types';
export * from './types/graph';
