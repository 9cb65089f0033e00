/**
 * Chat-completions client for the vision and planning models.
 * Both are served behind one OpenAI-compatible endpoint (vLLM or similar).
 */

import OpenAI, { APIConnectionTimeoutError } from "openai";

// ===========================================
// Chat Message Types
// ===========================================

export type ContentPart =
  | { type: "text"; text: string }
  | { type: "image"; base64: string; mimeType: "image/png" | "image/jpeg" };

export interface ChatMessage {
  role: "system" | "user" | "assistant";
  content: string | ContentPart[];
}

export interface ChatRequest {
  model: string;
  messages: ChatMessage[];
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
}

/** Anything that can answer a chat request with the assistant's text. */
export interface ChatCompleter {
  complete(request: ChatRequest): Promise<string>;
}

// ===========================================
// Errors
// ===========================================

export class ModelTimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Model request timed out after ${Math.round(timeoutMs / 1000)}s`);
    this.name = "ModelTimeoutError";
  }
}

export class ModelRequestError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ModelRequestError";
  }
}

// ===========================================
// OpenAI-compatible implementation
// ===========================================

/** The slice of `openai.chat.completions` this client calls. */
export interface CompletionsApi {
  create(
    body: OpenAI.ChatCompletionCreateParamsNonStreaming,
    options?: { timeout?: number; maxRetries?: number }
  ): Promise<{ choices: Array<{ message: { content: string | null } }> }>;
}

function textOf(content: string | ContentPart[]): string {
  if (typeof content === "string") return content;
  return content
    .map((part) => (part.type === "text" ? part.text : "[Screenshot attached]"))
    .join("\n");
}

function toOpenAIPart(part: ContentPart): OpenAI.ChatCompletionContentPart {
  if (part.type === "text") {
    return { type: "text", text: part.text };
  }
  return {
    type: "image_url",
    image_url: { url: `data:${part.mimeType};base64,${part.base64}` },
  };
}

export function toOpenAIMessages(messages: ChatMessage[]): OpenAI.ChatCompletionMessageParam[] {
  return messages.map((msg): OpenAI.ChatCompletionMessageParam => {
    switch (msg.role) {
      case "user":
        return {
          role: "user",
          content: typeof msg.content === "string" ? msg.content : msg.content.map(toOpenAIPart),
        };
      case "assistant":
        return { role: "assistant", content: textOf(msg.content) };
      case "system":
        return { role: "system", content: textOf(msg.content) };
    }
  });
}

export class OpenAIChatClient implements ChatCompleter {
  constructor(private readonly completions: CompletionsApi) {}

  async complete(request: ChatRequest): Promise<string> {
    let response: Awaited<ReturnType<CompletionsApi["create"]>>;
    try {
      response = await this.completions.create(
        {
          model: request.model,
          messages: toOpenAIMessages(request.messages),
          temperature: request.temperature,
          max_tokens: request.maxTokens,
        },
        // Timeouts surface to the caller, which decides whether to retry
        { timeout: request.timeoutMs, maxRetries: 0 }
      );
    } catch (err) {
      if (err instanceof APIConnectionTimeoutError) {
        throw new ModelTimeoutError(request.timeoutMs);
      }
      const message = err instanceof Error ? err.message : String(err);
      throw new ModelRequestError(message, { cause: err });
    }

    const choice = response.choices[0];
    if (!choice) {
      throw new ModelRequestError("Model returned no choices");
    }
    return choice.message.content ?? "";
  }
}

export interface ModelEndpoint {
  baseUrl: string;
  apiKey: string;
}

export function createChatClient(endpoint: ModelEndpoint): OpenAIChatClient {
  const client = new OpenAI({ apiKey: endpoint.apiKey, baseURL: endpoint.baseUrl });
  return new OpenAIChatClient(client.chat.completions);
}
