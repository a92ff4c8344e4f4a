import { describe, it, expect } from 'vitest';
import { AnthropicMessagesUnit } from '../../../src/units/anthropic-messages.js';
import { FatalExecutionError } from '../../../src/errors/index.js';
import { createTaskInput } from '../../utils/fixtures.js';
import { anthropicMessage, createMockMessagesClient, sdkError } from '../../utils/mocks.js';

const MODEL = 'claude-3-5-haiku-latest';

describe('AnthropicMessagesUnit', () => {
  it('should return the message text with its token usage', async () => {
    const { client } = createMockMessagesClient(anthropicMessage('Paris'));
    const unit = new AnthropicMessagesUnit('direct-claude', { model: MODEL }, { client });

    const result = await unit.execute(createTaskInput(), new AbortController().signal);

    expect(result).toEqual({
      status: 'ok',
      output: 'Paris',
      usageEvents: [
        {
          provider: 'anthropic',
          model: MODEL,
          inputUnits: 80,
          outputUnits: 20,
          timestamp: expect.any(Date),
          requestId: 'msg-test',
        },
      ],
    });
  });

  it('should send the default max tokens and the family prompt', async () => {
    const { client, create } = createMockMessagesClient(anthropicMessage('Paris'));
    const unit = new AnthropicMessagesUnit('direct-claude', { model: MODEL }, { client });
    const controller = new AbortController();

    await unit.execute(createTaskInput(), controller.signal);

    expect(create).toHaveBeenCalledWith(
      {
        model: MODEL,
        max_tokens: 1024,
        system: 'Answer the question concisely. Reply with the answer only.',
        messages: [{ role: 'user', content: 'What is the capital of France?' }],
        temperature: undefined,
      },
      { signal: controller.signal }
    );
  });

  it('should join every text block', async () => {
    const message = anthropicMessage('Par');
    message.content.push({ type: 'tool_use' }, { type: 'text', text: 'is' });
    const { client } = createMockMessagesClient(message);
    const unit = new AnthropicMessagesUnit('direct-claude', { model: MODEL }, { client });

    const result = await unit.execute(createTaskInput(), new AbortController().signal);

    expect(result).toMatchObject({ status: 'ok', output: 'Paris' });
  });

  it('should report an empty message as a validation error', async () => {
    const { client } = createMockMessagesClient(anthropicMessage(''));
    const unit = new AnthropicMessagesUnit('direct-claude', { model: MODEL }, { client });

    const result = await unit.execute(createTaskInput(), new AbortController().signal);

    expect(result).toMatchObject({
      status: 'error',
      errorKind: 'validation',
      message: `Empty message from ${MODEL}`,
    });
  });

  it('should treat authentication failures as fatal', async () => {
    const { client } = createMockMessagesClient(
      sdkError('AuthenticationError', 401, 'invalid x-api-key')
    );
    const unit = new AnthropicMessagesUnit('direct-claude', { model: MODEL }, { client });

    const execution = unit.execute(createTaskInput(), new AbortController().signal);

    await expect(execution).rejects.toBeInstanceOf(FatalExecutionError);
    await expect(execution).rejects.toMatchObject({ code: 'AUTH_FAILED' });
  });

  it('should rethrow the abort reason once aborted', async () => {
    const { client } = createMockMessagesClient(new Error('Request was aborted.'));
    const unit = new AnthropicMessagesUnit('direct-claude', { model: MODEL }, { client });
    const controller = new AbortController();
    const reason = new Error('cell cancelled');
    controller.abort(reason);

    await expect(unit.execute(createTaskInput(), controller.signal)).rejects.toBe(reason);
  });
});
