/** Settings read from the user's config file. */
export type Configuration = {
  apiKey: string;
  model: string;
  /** Upper bound on response tokens requested from the API */
  maxTokens: number;
};

/** Raw text sources a prompt is assembled from. */
export type InputSource = {
  /** Piped standard input, if stdin was not a terminal */
  stdinText?: string;
  /** Positional arguments joined with single spaces */
  argText?: string;
};

/** A single chat message as sent on the wire. */
export type ChatMessage = { role: 'user'; content: string };

/** Chat-completion request body. */
export type CompletionRequest = {
  model: string;
  messages: ChatMessage[];
  max_tokens: number;
};

/** Minimal interface for a chat-completion backend. */
export interface CompletionProvider {
  /** Send one request and return the first choice's message content. */
  complete(request: CompletionRequest): Promise<string>;
}
