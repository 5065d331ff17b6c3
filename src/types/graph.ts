import type { Goal } from '../goals/goal';
import type { ConversationPhase, FieldValues } from '.';

export interface ConversationEntry {
  role: 'user' | 'assistant';
  content: string;
  // 'simulated' marks assistant turns injected by the host rather than generated
  origin?: 'simulated';
}

export interface MessageResponse {
  type: 'message';
  content: string;
  goal: Goal;
  end?: boolean;
}

export interface DataResponse {
  type: 'data';
  content: FieldValues;
  goal: Goal;
}

export type ChainResponse = MessageResponse | DataResponse;

export interface ChainSnapshot {
  activeGoal: string;
  phase: ConversationPhase;
  collectedData: FieldValues;
  histories: Record<string, ConversationEntry[]>;
  // Per-goal scratch values written by lifecycle hooks
  memory?: Record<string, FieldValues>;
}
