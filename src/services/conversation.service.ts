import { randomUUID } from 'crypto';
import { GoalChain, GoalChainOptions } from '../chain/goal-chain';
import { ConversationNotFoundError } from '../core/errors';
import { logger } from '../core/logger';
import type { Goal } from '../goals/goal';
import type { ChainResponse, ChainSnapshot } from '../types/graph';

export interface ConversationHandle {
  conversationId: string;
  response: ChainResponse;
}

/**
 * In-memory registry of live conversations over one shared goal graph.
 * Nothing is persisted; a restart forgets every conversation.
 */
export class ConversationService {
  private conversations = new Map<string, GoalChain>();

  constructor(
    private readonly startGoal: Goal,
    private readonly chainOptions: GoalChainOptions
  ) {}

  get size(): number {
    return this.conversations.size;
  }

  async start(): Promise<ConversationHandle> {
    const conversationId = randomUUID();
    const chain = new GoalChain(this.startGoal, this.chainOptions);
    const response = await chain.getResponse();

    this.conversations.set(conversationId, chain);
    logger.info('Conversation started', { conversationId, goal: chain.goal.label });

    return { conversationId, response };
  }

  resume(snapshot: ChainSnapshot): string {
    const conversationId = randomUUID();
    this.conversations.set(conversationId, GoalChain.restore(this.startGoal, snapshot, this.chainOptions));
    logger.info('Conversation restored', { conversationId, goal: snapshot.activeGoal });
    return conversationId;
  }

  async send(conversationId: string, message: string): Promise<ChainResponse> {
    return this.get(conversationId).getResponse(message);
  }

  async simulate(conversationId: string, content: string, rephrase = false): Promise<ChainResponse> {
    return this.get(conversationId).simulateResponse(content, rephrase);
  }

  snapshot(conversationId: string): ChainSnapshot {
    return this.get(conversationId).snapshot();
  }

  end(conversationId: string): void {
    if (!this.conversations.delete(conversationId)) {
      throw new ConversationNotFoundError(conversationId);
    }
    logger.info('Conversation ended', { conversationId });
  }

  private get(conversationId: string): GoalChain {
    const chain = this.conversations.get(conversationId);
    if (!chain) {
      throw new ConversationNotFoundError(conversationId);
    }
    return chain;
  }
}
