import {
  GoogleGenerativeAI,
  type GenerateContentResult,
  type GenerativeModel,
} from "@google/generative-ai";
import { TransportError } from "../types/errors.js";
import type { CompletionProvider } from "../types/provider.js";
import { logger } from "../utils/logger.js";

export const DEFAULT_GEMINI_MODEL = "gemini-1.5-flash";

const GENERATION_CONFIG = {
  temperature: 0.4,
};

export class GeminiProvider implements CompletionProvider {
  readonly name = "gemini" as const;
  readonly model: string;
  private generativeModel: GenerativeModel;

  constructor(apiKey: string, model = DEFAULT_GEMINI_MODEL) {
    const genAI = new GoogleGenerativeAI(apiKey);
    this.model = model;
    this.generativeModel = genAI.getGenerativeModel({
      model,
      generationConfig: GENERATION_CONFIG,
    });
  }

  async complete(prompt: string): Promise<string> {
    logger.debug(`gemini request (${this.model}, ${prompt.length} chars)`);
    let result: GenerateContentResult;
    try {
      result = await this.generativeModel.generateContent(prompt);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new TransportError(`Gemini request failed: ${message}`);
    }

    // text() throws when the candidate was blocked; treat that as no text
    try {
      return result.response.text();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.debug(`gemini returned no text: ${message}`);
      return "";
    }
  }
}
