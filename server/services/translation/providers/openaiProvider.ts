import {
  translationSystemPrompt,
  translationUserPrompt,
} from "../../../prompts/translationPrompts";
import { classifyProviderError } from "./providerErrors";
import type { ProviderResult, TranslationProvider, TranslationRequest } from "./types";

/** The slice of the OpenAI client the provider calls. */
export interface ChatCompletionClient {
  chat: {
    completions: {
      create(
        body: {
          model: string;
          temperature?: number;
          messages: Array<{ role: "system" | "user"; content: string }>;
        },
        options?: { timeout?: number },
      ): Promise<{ choices: Array<{ message: { content: string | null } }> }>;
    };
  };
}

export interface OpenAITranslationProviderOptions {
  client: ChatCompletionClient;
  model: string;
  timeoutMs: number;
  temperature?: number;
}

export class OpenAITranslationProvider implements TranslationProvider {
  readonly name: string;

  constructor(private readonly options: OpenAITranslationProviderOptions) {
    this.name = `openai:${options.model}`;
  }

  async translate(request: TranslationRequest): Promise<ProviderResult> {
    try {
      const completion = await this.options.client.chat.completions.create(
        {
          model: this.options.model,
          temperature: this.options.temperature ?? 0.2,
          messages: [
            { role: "system", content: translationSystemPrompt(request.targetLanguage) },
            { role: "user", content: translationUserPrompt(request.text, request.context) },
          ],
        },
        { timeout: this.options.timeoutMs },
      );
      return { ok: true, text: completion.choices[0]?.message.content ?? "" };
    } catch (error) {
      const classified = classifyProviderError(error);
      if (classified) {
        return { ok: false, error: classified };
      }
      throw error;
    }
  }
}
