import { BedrockRuntimeClient, InvokeModelCommand } from '@aws-sdk/client-bedrock-runtime';
import type { ModelInvocation, ModelInvoker } from './types.js';

/**
 * The slice of the InvokeModel output this package reads.
 */
export interface BedrockInvokeOutput {
  body?: Uint8Array;
}

/**
 * Anything that can send an InvokeModel command: a `BedrockRuntimeClient`, or
 * a fake in tests.
 */
export interface BedrockInvokeClient {
  send(command: InvokeModelCommand): Promise<BedrockInvokeOutput>;
}

export class BedrockModelInvoker implements ModelInvoker {
  private readonly decoder = new TextDecoder();

  constructor(private readonly client: BedrockInvokeClient) {}

  static forRegion(region: string): BedrockModelInvoker {
    const runtime = new BedrockRuntimeClient({ region });
    return new BedrockModelInvoker({ send: (command) => runtime.send(command) });
  }

  async invoke({ modelId, body }: ModelInvocation): Promise<string> {
    const output = await this.client.send(
      new InvokeModelCommand({
        modelId,
        body,
        contentType: 'application/json',
        accept: 'application/json',
      })
    );
    return output.body ? this.decoder.decode(output.body) : '';
  }
}
