import dotenv from 'dotenv';

dotenv.config();

export const config = {
  llm: {
    apiKey: process.env.LLM_API_KEY || '',
    baseUrl: process.env.LLM_BASE_URL || 'https://openrouter.ai/api/v1',
    temperature: parseFloat(process.env.LLM_TEMPERATURE || '0.2'),
    maxTokens: parseInt(process.env.LLM_MAX_TOKENS || '1500'),
  },
  models: {
    chat: process.env.CHAT_MODEL || 'openai/gpt-4o-mini',
    json: process.env.JSON_MODEL || 'openai/gpt-4o-mini',
  },
  execution: {
    llmTimeout: parseInt(process.env.LLM_TIMEOUT || '60000'), // 60s for LLM calls
  },
  chain: {
    // Goals a single input may be handed over through before the turn fails
    maxHandOvers: parseInt(process.env.MAX_HAND_OVERS || '4'),
  },
  server: {
    port: parseInt(process.env.PORT || '3002'),
    env: process.env.NODE_ENV || 'development',
  },
  logging: {
    level: process.env.LOG_LEVEL || 'info',
    silent: process.env.NODE_ENV === 'test' || process.env.LOG_SILENT === 'true',
  },
};
