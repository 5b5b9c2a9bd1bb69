import { describe, expect, it, vi } from 'vitest';
import { InvokeModelCommand } from '@aws-sdk/client-bedrock-runtime';
import { BedrockModelInvoker, type BedrockInvokeOutput } from '../bedrock_invoker.js';

const encoder = new TextEncoder();

describe('BedrockModelInvoker', () => {
  it('sends an InvokeModel command with a JSON body', async () => {
    const send = vi.fn(async (_command: InvokeModelCommand): Promise<BedrockInvokeOutput> => ({
      body: encoder.encode('{"completion":"X"}'),
    }));
    const invoker = new BedrockModelInvoker({ send });

    const raw = await invoker.invoke({ modelId: 'anthropic.claude-v2', body: '{"prompt":"p"}' });

    expect(raw).toBe('{"completion":"X"}');
    const command = send.mock.calls[0]?.[0];
    expect(command).toBeInstanceOf(InvokeModelCommand);
    expect(command?.input).toEqual({
      modelId: 'anthropic.claude-v2',
      body: '{"prompt":"p"}',
      contentType: 'application/json',
      accept: 'application/json',
    });
  });

  it('returns an empty string when the response has no body', async () => {
    const send = vi.fn(async (_command: InvokeModelCommand): Promise<BedrockInvokeOutput> => ({}));

    await expect(new BedrockModelInvoker({ send }).invoke({ modelId: 'm', body: '{}' })).resolves.toBe('');
  });

  it('propagates client errors unchanged', async () => {
    const failure = Object.assign(new Error('slow down'), { name: 'ThrottlingException' });
    const send = vi.fn(async (_command: InvokeModelCommand): Promise<BedrockInvokeOutput> => {
      throw failure;
    });

    await expect(new BedrockModelInvoker({ send }).invoke({ modelId: 'm', body: '{}' })).rejects.toBe(failure);
  });
});
