export class GoalChainError extends Error {
    constructor(
      message: string,
      public code: string,
      public statusCode: number = 500,
      public details?: Record<string, unknown>
    ) {
      super(message);
      this.name = 'GoalChainError';
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * A field value was rejected. Validators throw this (or return a failed
   * result); the message is shown to the user in the follow-up prompt.
   */
  export class ValidationError extends GoalChainError {
    constructor(message: string = 'Validation failed', details?: Record<string, unknown>) {
      super(message, 'VALIDATION_ERROR', 422, details);
      this.name = 'ValidationError';
    }
  }

  /**
   * A validator crashed with something other than a ValidationError.
   * Never fed back to the user; aborts the turn.
   */
  export class ValidatorFailureError extends ValidationError {
    constructor(field: string, cause: unknown) {
      super(
        `Validator for field "${field}" failed: ${cause instanceof Error ? cause.message : String(cause)}`,
        { field, cause }
      );
      this.code = 'VALIDATOR_FAILURE';
      this.statusCode = 500;
      this.name = 'ValidatorFailureError';
    }
  }

  export class CompletionParseError extends GoalChainError {
    constructor(message: string = 'Completion output could not be parsed', details?: Record<string, unknown>) {
      super(message, 'COMPLETION_PARSE_ERROR', 502, details);
      this.name = 'CompletionParseError';
    }
  }

  export class CompletionServiceError extends GoalChainError {
    constructor(message: string = 'Completion request failed', details?: Record<string, unknown>) {
      super(message, 'COMPLETION_SERVICE_ERROR', 502, details);
      this.name = 'CompletionServiceError';
    }
  }

  export class RoutingLoopError extends GoalChainError {
    constructor(path: string[], limit: number) {
      super(
        `Hand-over limit of ${limit} exceeded: ${path.join(' -> ')}`,
        'ROUTING_LOOP',
        500,
        { path, limit }
      );
      this.name = 'RoutingLoopError';
    }
  }

  export class UnknownConnectionError extends GoalChainError {
    constructor(source: string, route: string) {
      super(`Goal "${source}" has no connection to "${route}"`, 'UNKNOWN_CONNECTION', 500, { source, route });
      this.name = 'UnknownConnectionError';
    }
  }

  export class GraphDefinitionError extends GoalChainError {
    constructor(message: string, details?: Record<string, unknown>) {
      super(message, 'GRAPH_DEFINITION_ERROR', 500, details);
      this.name = 'GraphDefinitionError';
    }
  }

  /**
   * A snapshot handed to `restore` does not fit the goal graph: unknown goal
   * or field, a value its validator rejects, or a phase the data cannot be in.
   */
  export class InvalidSnapshotError extends GoalChainError {
    constructor(message: string, details?: Record<string, unknown>) {
      super(message, 'INVALID_SNAPSHOT', 400, details);
      this.name = 'InvalidSnapshotError';
    }
  }

  export class TurnInProgressError extends GoalChainError {
    constructor(goal: string) {
      super(`A turn is already in progress on goal "${goal}"`, 'TURN_IN_PROGRESS', 409, { goal });
      this.name = 'TurnInProgressError';
    }
  }

  export class ConversationNotFoundError extends GoalChainError {
    constructor(conversationId: string) {
      super(`Conversation "${conversationId}" not found`, 'CONVERSATION_NOT_FOUND', 404, { conversationId });
      this.name = 'ConversationNotFoundError';
    }
  }
