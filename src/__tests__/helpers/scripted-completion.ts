import type { CompletionRequest, CompletionService } from '../../types';

export interface DecisionReply {
  route?: string | null;
  extracted_fields?: Record<string, unknown> | null;
  out_of_scope?: boolean;
  confirmed?: boolean | null;
  done?: boolean;
  message?: string | null;
}

export const decision = (reply: DecisionReply = {}): string =>
  JSON.stringify({
    route: null,
    extracted_fields: null,
    out_of_scope: false,
    confirmed: null,
    ...reply,
  });

/**
 * Completion stand-in that replays queued replies in order and records every
 * request it receives.
 */
export class ScriptedCompletion implements CompletionService {
  readonly requests: CompletionRequest[] = [];
  private queue: Array<string | Error>;

  constructor(replies: Array<string | Error> = []) {
    this.queue = [...replies];
  }

  push(...replies: Array<string | Error>): this {
    this.queue.push(...replies);
    return this;
  }

  get remaining(): number {
    return this.queue.length;
  }

  async complete(request: CompletionRequest): Promise<string> {
    this.requests.push(request);
    const next = this.queue.shift();
    if (next === undefined) {
      throw new Error('No scripted completion left');
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  }
}
