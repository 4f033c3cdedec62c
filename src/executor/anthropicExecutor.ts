/**
 * Anthropic executor using the Messages API.
 */

import Anthropic from "@anthropic-ai/sdk";
import { errorMessage } from "../errors.js";
import type { Executor, ExecutionRequest, ExecutionResult } from "./types.js";

export class AnthropicExecutor implements Executor {
  private readonly client: Anthropic;

  constructor(apiKey: string) {
    const key = apiKey || process.env.ANTHROPIC_API_KEY;
    if (!key || key.trim() === "") {
      throw new Error(
        "ANTHROPIC_API_KEY is required for AnthropicExecutor. Set it in your environment."
      );
    }
    this.client = new Anthropic({ apiKey: key });
  }

  async execute(req: ExecutionRequest): Promise<ExecutionResult> {
    const start = Date.now();
    try {
      const response = await this.client.messages.create(
        {
          model: req.modelId,
          max_tokens: 1500,
          temperature: 0.2,
          messages: [{ role: "user", content: req.prompt }],
        },
        { signal: req.signal }
      );

      const extractedText = response.content
        .map((block) => (block.type === "text" ? block.text : ""))
        .join("");

      return {
        status: "ok",
        outputText: extractedText,
        usage: {
          inputTokens: response.usage.input_tokens,
          outputTokens: response.usage.output_tokens,
        },
        latencyMs: Date.now() - start,
      };
    } catch (error) {
      return {
        status: "error",
        outputText: "",
        error: errorMessage(error),
        latencyMs: Date.now() - start,
      };
    }
  }
}
