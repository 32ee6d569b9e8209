import Anthropic from "@anthropic-ai/sdk";
import OpenAI from "openai";
import {
  ProviderError,
  createChildLogger,
  formatError,
  type AiProvider,
} from "@echopost/core";

const logger = createChildLogger({ module: "content-pipeline:llm" });

export interface GenerateOptions {
  systemPrompt?: string;
  temperature?: number;
  maxTokens?: number;
}

export interface LlmConfig {
  provider: AiProvider;
  apiKey: string;
  model: string;
}

/**
 * Text generation as the rest of the app sees it. Every failure rejects
 * with a ProviderError.
 */
export interface LlmClient {
  readonly provider: AiProvider;
  readonly model: string;
  generate(prompt: string, options?: GenerateOptions): Promise<string>;
  analyze(prompt: string): Promise<string>;
}

export const ANALYZER_SYSTEM_PROMPT =
  "You are an expert writing style analyzer. Provide detailed, accurate analysis in the requested format.";

interface CompletionRequest {
  prompt: string;
  systemPrompt?: string;
  temperature: number;
  maxTokens: number;
}

type Completion = (request: CompletionRequest) => Promise<string>;

function anthropicCompletion(apiKey: string, model: string): Completion {
  const client = new Anthropic({ apiKey });

  return async ({ prompt, systemPrompt, temperature, maxTokens }) => {
    const response = await client.messages.create({
      model,
      max_tokens: maxTokens,
      temperature,
      system: systemPrompt,
      messages: [{ role: "user", content: prompt }],
    });

    logger.debug(
      {
        model,
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
      },
      "Anthropic call complete"
    );

    return response.content
      .flatMap((block) => (block.type === "text" ? [block.text] : []))
      .join("\n");
  };
}

function openaiCompletion(apiKey: string, model: string): Completion {
  const client = new OpenAI({ apiKey });

  return async ({ prompt, systemPrompt, temperature, maxTokens }) => {
    const response = await client.chat.completions.create({
      model,
      temperature,
      max_tokens: maxTokens,
      messages: [
        ...(systemPrompt ? [{ role: "system" as const, content: systemPrompt }] : []),
        { role: "user" as const, content: prompt },
      ],
    });

    logger.debug(
      {
        model,
        inputTokens: response.usage?.prompt_tokens ?? 0,
        outputTokens: response.usage?.completion_tokens ?? 0,
      },
      "OpenAI call complete"
    );

    return response.choices[0]?.message.content ?? "";
  };
}

export function createLlmClient(config: LlmConfig): LlmClient {
  const { provider, apiKey, model } = config;
  const complete =
    provider === "openai"
      ? openaiCompletion(apiKey, model)
      : anthropicCompletion(apiKey, model);

  logger.info({ provider, model }, "Initialized LLM client");

  const generate = async (
    prompt: string,
    options: GenerateOptions = {}
  ): Promise<string> => {
    const { systemPrompt, temperature = 0.8, maxTokens = 500 } = options;
    logger.debug(
      { provider, model, promptLength: prompt.length, temperature, maxTokens },
      "Calling LLM"
    );

    try {
      const text = await complete({ prompt, systemPrompt, temperature, maxTokens });
      return text.trim();
    } catch (err) {
      logger.error({ provider, model, error: formatError(err) }, "LLM call failed");
      throw new ProviderError(provider, `LLM call failed: ${formatError(err)}`, {
        cause: err,
      });
    }
  };

  return {
    provider,
    model,
    generate,
    analyze: (prompt) =>
      generate(prompt, {
        systemPrompt: ANALYZER_SYSTEM_PROMPT,
        temperature: 0.3,
        maxTokens: 2000,
      }),
  };
}
