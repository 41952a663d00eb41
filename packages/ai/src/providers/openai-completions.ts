/**
 * Chat-completions client for OpenAI and OpenAI-compatible servers.
 */
import { $env, errorMessage, logger } from "@scene-forge/utils";
import OpenAI from "openai";
import type {
	ChatCompletionContentPart,
	ChatCompletionCreateParamsNonStreaming,
	ChatCompletionMessageParam,
} from "openai/resources/chat/completions";
import { readImageAsDataUrl } from "../images";
import { type GenerateRequest, type ImageAnalysisRequest, type ModelClient, ModelRequestError } from "../types";

export type CompletionParams = ChatCompletionCreateParamsNonStreaming;

/** The part of a completion response the client reads. */
export interface CompletionResponse {
	choices: Array<{ message: { content: string | null } }>;
}

/** Seam over `client.chat.completions` so tests can substitute it. */
export interface ChatCompletionsApi {
	create(params: CompletionParams): Promise<CompletionResponse>;
}

export interface OpenAICompletionsOptions {
	model: string;
	/** Model for image requests; defaults to `model` */
	visionModel?: string;
	apiKey?: string;
	baseUrl?: string;
	api?: ChatCompletionsApi;
}

const DEFAULT_MAX_TOKENS = 4000;

function createApi(apiKey: string | undefined, baseUrl: string | undefined): ChatCompletionsApi {
	const key = apiKey ?? $env.OPENAI_API_KEY;
	if (!key) {
		throw new Error("OpenAI API key is required. Set OPENAI_API_KEY or llm.openai.apiKey in the config file.");
	}
	const client = new OpenAI({ apiKey: key, baseURL: baseUrl });
	return { create: params => client.chat.completions.create(params) };
}

function withSystem(system: string | undefined, user: ChatCompletionMessageParam): ChatCompletionMessageParam[] {
	return system ? [{ role: "system", content: system }, user] : [user];
}

export class OpenAICompletionsClient implements ModelClient {
	readonly model: string;
	readonly visionModel: string;
	#api: ChatCompletionsApi;

	constructor(options: OpenAICompletionsOptions) {
		this.model = options.model;
		this.visionModel = options.visionModel ?? options.model;
		this.#api = options.api ?? createApi(options.apiKey, options.baseUrl);
	}

	generate(request: GenerateRequest): Promise<string> {
		const params: CompletionParams = {
			model: this.model,
			messages: withSystem(request.system, { role: "user", content: request.prompt }),
			temperature: request.temperature ?? 0.7,
		};
		if (request.maxTokens !== undefined) {
			params.max_tokens = request.maxTokens;
		}
		return this.#complete(params);
	}

	async analyzeImages(request: ImageAnalysisRequest): Promise<string> {
		const content: ChatCompletionContentPart[] = [{ type: "text", text: request.prompt }];
		for (const imagePath of request.imagePaths) {
			content.push({ type: "image_url", image_url: { url: await readImageAsDataUrl(imagePath) } });
		}
		return this.#complete({
			model: this.visionModel,
			messages: withSystem(request.system, { role: "user", content }),
			max_tokens: request.maxTokens ?? DEFAULT_MAX_TOKENS,
		});
	}

	async #complete(params: CompletionParams): Promise<string> {
		logger.debug("Requesting completion", { model: params.model, messages: params.messages.length });
		let response: CompletionResponse;
		try {
			response = await this.#api.create(params);
		} catch (err) {
			throw new ModelRequestError(`Completion request failed: ${errorMessage(err)}`, params.model, { cause: err });
		}
		const text = response.choices.at(0)?.message.content;
		if (!text) {
			throw new ModelRequestError("Model returned no text", params.model);
		}
		return text;
	}
}
