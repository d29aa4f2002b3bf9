import type { ProviderName } from "./config.js";

/**
 * Best-effort text completion. Implementations throw `TransportError` when
 * the service cannot be reached; they never validate the reply.
 */
export interface CompletionProvider {
  readonly name: ProviderName;
  readonly model: string;
  complete(prompt: string): Promise<string>;
}
