export { createModelClient, ollamaBaseUrl } from "./client";
export { imageMimeType, readImageAsDataUrl } from "./images";
export {
	type ChatCompletionsApi,
	type CompletionParams,
	type CompletionResponse,
	OpenAICompletionsClient,
	type OpenAICompletionsOptions,
} from "./providers/openai-completions";
export {
	type Backend,
	type GenerateRequest,
	type ImageAnalysisRequest,
	type ModelClient,
	ModelRequestError,
	type ProviderSettings,
} from "./types";
