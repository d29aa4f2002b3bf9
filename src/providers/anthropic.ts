import { Anthropic } from "@anthropic-ai/sdk";
import { TransportError } from "../types/errors.js";
import type { CompletionProvider } from "../types/provider.js";
import { logger } from "../utils/logger.js";

export const DEFAULT_CLAUDE_MODEL = "claude-3-5-sonnet-latest";

export class ClaudeProvider implements CompletionProvider {
  readonly name = "claude" as const;
  readonly model: string;
  private anthropic: Anthropic;

  constructor(apiKey: string, model = DEFAULT_CLAUDE_MODEL) {
    this.anthropic = new Anthropic({ apiKey });
    this.model = model;
  }

  async complete(prompt: string): Promise<string> {
    logger.debug(`claude request (${this.model}, ${prompt.length} chars)`);
    try {
      const message = await this.anthropic.messages.create({
        model: this.model,
        max_tokens: 2048,
        messages: [{ role: "user", content: prompt }],
      });
      return message.content
        .map((block) => (block.type === "text" ? block.text : ""))
        .join("");
    } catch (error) {
      if (error instanceof Anthropic.APIError) {
        throw new TransportError(`Claude request failed: ${error.message}`, {
          status: error.status,
        });
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new TransportError(`Claude request failed: ${message}`);
    }
  }
}
