/**
 * OpenAI executor using the official Chat Completions API.
 */

import OpenAI from "openai";
import { errorMessage } from "../errors.js";
import type { Executor, ExecutionRequest, ExecutionResult } from "./types.js";

export class OpenAIExecutor implements Executor {
  private readonly client: OpenAI;

  constructor(apiKey: string) {
    const key = apiKey || process.env.OPENAI_API_KEY;
    if (!key || key.trim() === "") {
      throw new Error(
        "OPENAI_API_KEY is required for OpenAIExecutor. Set it in your environment."
      );
    }
    this.client = new OpenAI({ apiKey: key });
  }

  async execute(req: ExecutionRequest): Promise<ExecutionResult> {
    const start = Date.now();
    try {
      const response = await this.client.chat.completions.create(
        {
          model: req.modelId,
          messages: [{ role: "user", content: req.prompt }],
          temperature: 0.2,
          max_tokens: 1500,
          response_format: { type: "json_object" },
        },
        { signal: req.signal }
      );

      const content = response.choices[0]?.message?.content ?? "";
      return {
        status: "ok",
        outputText: content,
        usage: {
          inputTokens: response.usage?.prompt_tokens,
          outputTokens: response.usage?.completion_tokens,
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
