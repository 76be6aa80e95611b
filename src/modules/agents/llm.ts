import OpenAI from "openai";
import type { ModelConfigInput, ResolvedModelConfig } from "../../config";
import { resolveModelConfig } from "../../config";
import type {
  IChatMessage,
  ICompletionOptions,
  ILanguageModel,
} from "../../interfaces";

export interface ChatModelOptions {
  openaiClient?: OpenAI;
  apiKey?: string;
  baseURL?: string;
  models?: ModelConfigInput;
}

/** Chat completions against any OpenAI-compatible endpoint. */
export class OpenAIChatModel implements ILanguageModel {
  private openai: OpenAI;
  private config: ResolvedModelConfig;

  constructor(options: ChatModelOptions) {
    if (options.openaiClient) {
      this.openai = options.openaiClient;
    } else if (options.apiKey) {
      this.openai = new OpenAI({
        apiKey: options.apiKey,
        baseURL: options.baseURL,
        maxRetries: resolveModelConfig(options.models).maxRetries,
      });
    } else {
      throw new Error("Either openaiClient or apiKey must be provided");
    }
    this.config = resolveModelConfig(options.models);
  }

  get model(): string {
    return this.config.chatModel;
  }

  async complete(
    messages: IChatMessage[],
    options: ICompletionOptions = {},
  ): Promise<string> {
    const completion = await this.openai.chat.completions.create({
      model: this.config.chatModel,
      temperature: options.temperature ?? this.config.temperature,
      max_tokens: options.maxTokens ?? this.config.maxTokens,
      messages,
    });
    return completion.choices[0]?.message.content?.trim() ?? "";
  }
}

export function userMessage(content: string): IChatMessage {
  return { role: "user", content };
}

export function systemMessage(content: string): IChatMessage {
  return { role: "system", content };
}
