import OpenAI from "openai";

export type JsonCompletionRequest = {
  model: string;
  system: string;
  user: string;
  temperature?: number;
  maxTokens?: number;
  signal?: AbortSignal;
};

/** Chat completion in JSON mode; resolves with the raw message content. */
export type JsonCompletion = (request: JsonCompletionRequest) => Promise<string>;

export function createOpenAIJsonCompletion(openai: OpenAI): JsonCompletion {
  return async (request) => {
    const response = await openai.chat.completions.create(
      {
        model: request.model,
        temperature: request.temperature ?? 0.1,
        max_tokens: request.maxTokens ?? 1500,
        messages: [
          { role: "system", content: request.system },
          { role: "user", content: request.user },
        ],
        response_format: { type: "json_object" },
      },
      { signal: request.signal }
    );

    const content = response.choices[0]?.message?.content;
    if (!content) {
      throw new Error("OpenAI returned no content");
    }
    return content;
  };
}

/** Parses model output, tolerating a ```json fence around it. */
export function parseJsonContent(content: string): unknown {
  let jsonText = content.trim();
  if (jsonText.startsWith("```json")) {
    jsonText = jsonText.replace(/^```json\s*/, "").replace(/\s*```$/, "");
  } else if (jsonText.startsWith("```")) {
    jsonText = jsonText.replace(/^```\s*/, "").replace(/\s*```$/, "");
  }
  return JSON.parse(jsonText);
}
