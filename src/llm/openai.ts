import OpenAI from "openai";
import type { CompletionClient } from "./types.js";

export const DEFAULT_MODEL = "gpt-4o-mini";

export function createOpenAiCompletionClient(params: {
  apiKey?: string;
  client?: OpenAI;
  defaultModel?: string;
  fetch?: typeof fetch;
}): CompletionClient {
  const client =
    params.client ??
    new OpenAI({
      apiKey: params.apiKey,
      maxRetries: 0,
      ...(params.fetch ? { fetch: params.fetch } : {}),
    });
  const defaultModel = params.defaultModel ?? DEFAULT_MODEL;
  return {
    async complete(request) {
      const resp = await client.chat.completions.create({
        model: request.model ?? defaultModel,
        messages: [
          { role: "system", content: request.system },
          { role: "user", content: request.prompt },
        ],
        temperature: request.temperature,
        max_tokens: request.maxTokens,
        ...(request.json ? { response_format: { type: "json_object" as const } } : {}),
      });
      const text = resp.choices[0]?.message?.content ?? "";
      const input = resp.usage?.prompt_tokens ?? 0;
      const output = resp.usage?.completion_tokens ?? 0;
      return {
        text,
        usage: { input, output, total: resp.usage?.total_tokens ?? input + output },
      };
    },
  };
}
