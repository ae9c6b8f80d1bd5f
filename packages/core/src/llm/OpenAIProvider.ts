import type { CompletionProvider, CompletionRequest } from '@pipeask/types';
import type OpenAI from 'openai';
import { APIError, NoChoicesError, ParseError, TransportError, describeError } from '../errors.js';

/** Chat-completion endpoint every request is posted to. */
export const CHAT_COMPLETIONS_URL = 'https://api.openai.com/v1/chat/completions';

/** Options for the HTTP-backed OpenAI provider. */
export type OpenAIProviderOptions = {
  /** Bearer token sent with the request */
  apiKey: string;
  /** Endpoint override (default: {@link CHAT_COMPLETIONS_URL}) */
  url?: string;
  /** Fetch implementation (default: global fetch) */
  fetch?: typeof fetch;
};

/**
 * OpenAI chat-completions provider issuing a single POST per call.
 * No retries and no streaming; the transport's default timeout applies.
 */
export class OpenAIProvider implements CompletionProvider {
  private readonly apiKey: string;
  private readonly url: string;
  private readonly fetchImpl: typeof fetch;

  public constructor(options: OpenAIProviderOptions) {
    this.apiKey = options.apiKey;
    this.url = options.url ?? CHAT_COMPLETIONS_URL;
    this.fetchImpl = options.fetch ?? fetch;
  }

  public async complete(request: CompletionRequest): Promise<string> {
    const body: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming = {
      model: request.model,
      messages: request.messages,
      max_tokens: request.max_tokens,
    };

    let response: Response;
    try {
      response = await this.fetchImpl(this.url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify(body),
      });
    } catch (err) {
      throw new TransportError(`request to ${this.url} failed: ${describeError(err)}`, {
        cause: err,
      });
    }

    const text = await response.text();
    if (response.status !== 200) {
      throw new APIError(response.status, text);
    }
    return extractContent(text);
  }
}

/** Pull `choices[0].message.content` out of a raw completion body. */
export function extractContent(body: string): string {
  let data: unknown;
  try {
    data = JSON.parse(body);
  } catch (err) {
    throw new ParseError(`invalid completion response: ${describeError(err)}`, { cause: err });
  }
  if (!isRecord(data)) {
    throw new ParseError('invalid completion response: body is not a JSON object');
  }

  const choices = data.choices;
  if (choices === undefined || choices === null) throw new NoChoicesError();
  if (!Array.isArray(choices)) {
    throw new ParseError('invalid completion response: choices is not an array');
  }
  if (choices.length === 0) throw new NoChoicesError();

  const first: unknown = choices[0];
  if (first === null) return '';
  if (!isRecord(first)) {
    throw new ParseError('invalid completion response: choice is not an object');
  }
  const message = first.message;
  if (message === undefined || message === null) return '';
  if (!isRecord(message)) {
    throw new ParseError('invalid completion response: message is not an object');
  }
  const content = message.content;
  if (content === undefined || content === null) return '';
  if (typeof content !== 'string') {
    throw new ParseError('invalid completion response: content is not a string');
  }
  return content;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
