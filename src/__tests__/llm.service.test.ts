import { CompletionServiceError } from '../core/errors';
import { LLMService } from '../services/llm.service';
import { withTimeout } from '../utils/timeout';

const messages = [{ role: 'user' as const, content: 'Hello' }];

describe('LLMService', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  test('should request a JSON object in JSON mode', async () => {
    const post = jest.fn().mockResolvedValue({
      data: { model: 'test-model', choices: [{ message: { content: '{"route": null}' } }] },
    });
    const service = new LLMService({ client: { post }, temperature: 0.1, maxTokens: 200 });

    const content = await service.complete({ model: 'test-model', messages, jsonMode: true });

    expect(content).toBe('{"route": null}');
    expect(post).toHaveBeenCalledWith('/chat/completions', {
      model: 'test-model',
      messages,
      temperature: 0.1,
      max_tokens: 200,
      response_format: { type: 'json_object' },
    });
  });

  test('should omit the response format for plain text', async () => {
    const post = jest.fn().mockResolvedValue({ data: { choices: [{ message: { content: 'Hi!' } }] } });
    const service = new LLMService({ client: { post } });

    await service.complete({ model: 'test-model', messages, jsonMode: false });

    expect(post.mock.calls[0][1]).not.toHaveProperty('response_format');
  });

  test('should let goal params override sampling defaults but not the model', async () => {
    const post = jest.fn().mockResolvedValue({ data: { choices: [{ message: { content: 'Hi!' } }] } });
    const service = new LLMService({ client: { post }, temperature: 0.1, maxTokens: 200 });

    await service.complete({
      model: 'test-model',
      messages,
      jsonMode: false,
      params: { temperature: 0.9, top_p: 0.5, model: 'other-model' },
    });

    expect(post).toHaveBeenCalledWith('/chat/completions', {
      model: 'test-model',
      messages,
      temperature: 0.9,
      max_tokens: 200,
      top_p: 0.5,
    });
  });

  test('should wrap transport failures', async () => {
    const post = jest.fn().mockRejectedValue(new Error('Network Error'));
    const service = new LLMService({ client: { post } });

    const attempt = service.complete({ model: 'test-model', messages, jsonMode: true });

    await expect(attempt).rejects.toThrow(CompletionServiceError);
    await expect(attempt).rejects.toThrow('LLM request failed: Network Error');
  });

  test('should reject a response without content', async () => {
    const post = jest.fn().mockResolvedValue({ data: { choices: [] } });
    const service = new LLMService({ client: { post } });

    await expect(service.complete({ model: 'test-model', messages, jsonMode: true })).rejects.toThrow(
      'LLM response has no message content'
    );
  });

  test('should give up after the configured timeout', async () => {
    const post = jest.fn().mockReturnValue(new Promise(() => undefined));
    const service = new LLMService({ client: { post }, timeoutMs: 10 });

    await expect(service.complete({ model: 'test-model', messages, jsonMode: true })).rejects.toThrow(
      'LLM request failed: Timeout: LLM request timeout for test-model (10ms)'
    );
  });
});

describe('withTimeout', () => {
  test('should resolve with the wrapped value when it settles in time', async () => {
    await expect(withTimeout(Promise.resolve('ok'), 50, 'quick')).resolves.toBe('ok');
  });

  test('should pass through the wrapped rejection', async () => {
    await expect(withTimeout(Promise.reject(new Error('boom')), 50, 'quick')).rejects.toThrow('boom');
  });
});
