import OpenAI from "openai";

export interface OpenAiClientOptions {
  apiKey: string;
  baseUrl: string;
  model: string;
}

export interface JsonLlmLike {
  completeJsonObject(system: string, user: string): Promise<string>;
}

export class OpenAiClient implements JsonLlmLike {
  private readonly client: OpenAI;

  constructor(private readonly options: OpenAiClientOptions) {
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseUrl
    });
  }

  async completeJsonObject(system: string, user: string): Promise<string> {
    const response = await this.client.chat.completions.create({
      model: this.options.model,
      messages: [
        { role: "system", content: system },
        { role: "user", content: user }
      ],
      response_format: { type: "json_object" }
    });

    const text = response.choices[0]?.message?.content?.trim();
    if (!text) {
      throw new Error("LLM returned empty output.");
    }
    return text;
  }
}
