import { z } from 'zod';
import type {
  Model,
  ModelProvider,
  ModelRequest,
  ModelResponse,
  ResponseStreamEvent,
} from '../src/model';
import { tool } from '../src/tool';
import type { AgentOutputItem } from '../src/types';
import type * as protocol from '../src/types/protocol';
import { Usage } from '../src/usage';

export function fakeModelMessage(
  text: string,
  id = 'msg_1',
): protocol.AssistantMessageItem {
  return {
    id,
    type: 'message',
    role: 'assistant',
    status: 'completed',
    content: [
      {
        type: 'output_text',
        text,
        providerData: { annotations: [] },
      },
    ],
  };
}

export function fakeFunctionCall(
  name: string,
  args: Record<string, unknown>,
  callId: string,
  id?: string,
): protocol.FunctionCallItem {
  return {
    ...(id ? { id } : {}),
    type: 'function_call',
    name,
    callId,
    status: 'completed',
    arguments: JSON.stringify(args),
  };
}

/**
 * A response worth one request with a handful of tokens.
 */
export function fakeResponse(
  output: AgentOutputItem[],
  responseId?: string,
): ModelResponse {
  return {
    output,
    usage: new Usage({ inputTokens: 3, outputTokens: 2 }),
    responseId,
  };
}

/**
 * Serves queued responses in order and records every request it received. A queued error is
 * thrown instead of answering.
 */
export class FakeModel implements Model {
  public readonly requests: ModelRequest[] = [];

  constructor(private _responses: (ModelResponse | Error)[] = []) {}

  queue(...responses: (ModelResponse | Error)[]) {
    this._responses.push(...responses);
  }

  async getResponse(request: ModelRequest): Promise<ModelResponse> {
    this.requests.push(request);
    const response = this._responses.shift();
    if (!response) {
      throw new Error('No response found');
    }
    if (response instanceof Error) {
      throw response;
    }
    return response;
  }
}

export class FakeModelProvider implements ModelProvider {
  public readonly requestedNames: (string | undefined)[] = [];

  constructor(private readonly model: Model) {}

  async getModel(name?: string): Promise<Model> {
    this.requestedNames.push(name);
    return this.model;
  }
}

export const echoTool = tool({
  name: 'echo',
  description: 'Echoes the given text',
  parameters: z.object({ text: z.string() }),
  execute: async ({ text }) => `echo: ${text}`,
});

/**
 * Streams each queued response as text deltas followed by `response_done`.
 */
export class FakeStreamingModel extends FakeModel {
  public streamedRequests = 0;

  async *getStreamedResponse(
    request: ModelRequest,
  ): AsyncIterable<ResponseStreamEvent> {
    this.streamedRequests++;
    const response = await this.getResponse(request);
    for (const item of response.output) {
      if (item.type !== 'message') {
        continue;
      }
      for (const part of item.content) {
        if (part.type === 'output_text') {
          yield { type: 'output_text_delta', delta: part.text };
        }
      }
    }
    yield { type: 'response_done', response };
  }
}
