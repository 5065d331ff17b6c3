export type FieldValues = Record<string, unknown>;

export interface LLMMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface CompletionRequest {
  model: string;
  messages: LLMMessage[];
  jsonMode: boolean;
  // Extra model parameters (temperature, top_p, ...) passed through as-is
  params?: Record<string, unknown>;
}

/**
 * The language-model collaborator. Receives rendered messages and returns the
 * raw completion text; parsing and validation of that text is the caller's job.
 */
export interface CompletionService {
  complete(request: CompletionRequest): Promise<string>;
}

export type ConversationPhase = 'awaiting_input' | 'collecting' | 'confirming' | 'done';

export interface FieldSpec {
  name: string;
  description: string;
  formatHint?: string;
  optional: boolean;
}

export interface TriggerSpec {
  label: string;
  userGoal: string;
}

export interface GoalPromptContext {
  label: string;
  goal: string;
  opener: string;
  outOfScope?: string;
  confirm: boolean;
  fields: FieldSpec[];
  triggers: TriggerSpec[];
}
