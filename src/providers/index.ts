import type { Config } from "../types/config.js";
import type { CompletionProvider } from "../types/provider.js";
import { ClaudeProvider } from "./anthropic.js";
import { GeminiProvider } from "./gemini.js";

export function getApiKey(config: Config): string | undefined {
  switch (config.ai.provider) {
    case "claude":
      return config.ai.anthropicKey;
    case "gemini":
      return config.ai.geminiKey;
  }
}

export function getCompletionProvider(config: Config): CompletionProvider {
  const apiKey = getApiKey(config);
  switch (config.ai.provider) {
    case "claude":
      if (!apiKey) throw new Error("Anthropic API key required");
      return new ClaudeProvider(apiKey, config.ai.model);
    case "gemini":
      if (!apiKey) throw new Error("Gemini API key required");
      return new GeminiProvider(apiKey, config.ai.model);
  }
}
