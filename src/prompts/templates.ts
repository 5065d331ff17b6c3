import type { ConversationPhase, FieldSpec, FieldValues, GoalPromptContext, LLMMessage } from '../types';
import type { ConversationEntry } from '../types/graph';

export interface DecisionPromptInput {
  context: GoalPromptContext;
  collectedData: FieldValues;
  phase: ConversationPhase;
  messages: ConversationEntry[];
}

export interface RephrasePromptInput {
  response: string;
  goal: string;
  messages: ConversationEntry[];
}

export interface PromptTemplates {
  DECISION: (input: DecisionPromptInput) => LLMMessage[];
  REPHRASE: (input: RephrasePromptInput) => LLMMessage[];
  ASK_FOR_FIELD: (field: FieldSpec) => string;
  CONFIRMATION: (fields: FieldSpec[], data: FieldValues) => string;
  VALIDATION_FAILURE: (errors: string[], field: FieldSpec) => string;
  REVISE: string;
  OUT_OF_SCOPE: string;
}

export const formatValue = (value: unknown): string =>
  typeof value === 'string' ? value : JSON.stringify(value);

const toChatMessages = (messages: ConversationEntry[]): LLMMessage[] =>
  messages.map((message) => ({ role: message.role, content: message.content }));

const transcript = (messages: ConversationEntry[]): string =>
  messages
    .map((message) => `${message.role === 'user' ? 'User' : 'Assistant'}: ${message.content}`)
    .join('\n');

export const PROMPT_TEMPLATES: PromptTemplates = {
  DECISION: ({ context, collectedData, phase, messages }) => {
    let system = `You are the assistant in a goal-oriented conversation.\n`;
    system += `Goal: ${context.goal}\n\n`;

    if (context.fields.length > 0) {
      system += `Information to gather (use these keys verbatim):\n`;
      context.fields.forEach((field) => {
        system += `- ${field.name}: ${field.description}`;
        if (field.formatHint) system += ` (${field.formatHint})`;
        if (field.optional) system += ` [optional]`;
        system += '\n';
      });
      system += `Do not ask for anything else.\n\n`;
    }

    const known = Object.entries(collectedData);
    if (known.length > 0) {
      system += `Already collected:\n`;
      known.forEach(([name, value]) => {
        system += `- ${name}: ${formatValue(value)}\n`;
      });
      system += '\n';
    }

    if (context.triggers.length > 0) {
      system += `Other goals the user may switch to:\n`;
      context.triggers.forEach((trigger) => {
        system += `- If the user wants ${trigger.userGoal}, set "route" to "${trigger.label}"\n`;
      });
      system += '\n';
    }

    if (phase === 'confirming') {
      system += `The user was asked to confirm the collected information. `;
      system += `Set "confirmed" to true if they agree, false if they do not.\n\n`;
    }

    if (context.outOfScope) {
      system += `For anything outside the scope of the goal: ${context.outOfScope}\n\n`;
    }

    system += `Reply with a JSON object with exactly these keys:\n`;
    system += `- "route": the label of the goal to switch to, or null\n`;
    system += `- "extracted_fields": an object of values found in the latest user message, or null\n`;
    system += `- "out_of_scope": true if the message fits neither the goal nor any switch\n`;
    system += `- "confirmed": true/false when answering a confirmation, otherwise null\n`;
    system += `- "done": true when there is nothing left to ask for\n`;
    system += `- "message": your natural reply to the user, or null`;

    return [{ role: 'system', content: system }, ...toChatMessages(messages)];
  },

  REPHRASE: ({ response, goal, messages }) => {
    let system = `Your role is to continue the conversation below as the Assistant.\n`;
    system += `Normally you respond with: ${response}\n`;

    if (messages.length > 0) {
      system += `Goal: ${goal}\n`;
      system += `Take the conversation so far into account and tailor your response accordingly. `;
      system += `Continue the conversation naturally. Do not add information that is not in the response.\n`;
      system += `Conversation so far:\n${transcript(messages)}\n`;
    } else {
      system += `Simply rephrase your response as the Assistant.\n`;
    }

    return [{ role: 'system', content: system + 'Assistant:' }];
  },

  ASK_FOR_FIELD: (field) => `Could you please provide the ${field.description}?`,

  CONFIRMATION: (fields, data) => {
    let text = 'Here is what I have so far:\n';
    fields
      .filter((field) => field.name in data)
      .forEach((field) => {
        text += `- ${field.description}: ${formatValue(data[field.name])}\n`;
      });
    text += 'Is everything correct? (yes/no)';
    return text;
  },

  VALIDATION_FAILURE: (errors, field) => {
    const sentences = errors.map((error) => (/[.!?]$/.test(error) ? error : `${error}.`));
    return `${sentences.join(' ')} ${PROMPT_TEMPLATES.ASK_FOR_FIELD(field)}`;
  },

  REVISE: 'Which details would you like to change?',

  OUT_OF_SCOPE: "I'm sorry, I can't help with that here.",
};

export function resolvePrompts(overrides: Partial<PromptTemplates> = {}): PromptTemplates {
  return { ...PROMPT_TEMPLATES, ...overrides };
}
