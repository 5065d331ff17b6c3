import type { FieldValues } from '../types';

export interface ActionOptions<R extends FieldValues> {
  handler: (data: FieldValues) => R | Promise<R>;
  responseTemplate?: (result: R) => string;
  rephrase?: boolean;
  end?: boolean;
}

export interface ActionOutcome {
  result: FieldValues;
  text: string | null;
}

export interface GoalAction {
  readonly rephrase: boolean;
  readonly end: boolean;
  execute(data: FieldValues): Promise<ActionOutcome>;
}

/**
 * Terminal step run when a goal finalizes. With a response template the
 * rendered text becomes the reply; without one the handler result is
 * returned as data.
 */
export class Action<R extends FieldValues = FieldValues> implements GoalAction {
  readonly rephrase: boolean;
  readonly end: boolean;

  constructor(private readonly options: ActionOptions<R>) {
    this.rephrase = options.rephrase ?? false;
    this.end = options.end ?? false;
  }

  async execute(data: FieldValues): Promise<ActionOutcome> {
    const result = await this.options.handler({ ...data });
    const text = this.options.responseTemplate ? this.options.responseTemplate(result) : null;
    return { result, text };
  }
}
