import { type ChatCompletionsApi, OpenAICompletionsClient } from "./providers/openai-completions";
import type { ModelClient, ProviderSettings } from "./types";

/** Ollama accepts any bearer token on its OpenAI-compatible endpoint. */
const OLLAMA_API_KEY = "ollama";

export function ollamaBaseUrl(serverUrl: string): string {
	return `${serverUrl.replace(/\/+$/, "")}/v1`;
}

export function createModelClient(settings: ProviderSettings, api?: ChatCompletionsApi): ModelClient {
	switch (settings.backend) {
		case "openai":
			return new OpenAICompletionsClient({
				model: settings.model,
				visionModel: settings.visionModel,
				apiKey: settings.apiKey,
				baseUrl: settings.baseUrl,
				api,
			});
		case "ollama":
			return new OpenAICompletionsClient({
				model: settings.model,
				visionModel: settings.visionModel,
				apiKey: OLLAMA_API_KEY,
				baseUrl: ollamaBaseUrl(settings.baseUrl),
				api,
			});
	}
}
