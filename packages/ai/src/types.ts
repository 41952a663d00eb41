export interface GenerateRequest {
	prompt: string;
	system?: string;
	/** Sampling temperature, 0 to 2 */
	temperature?: number;
	maxTokens?: number;
}

export interface ImageAnalysisRequest {
	imagePaths: string[];
	prompt: string;
	system?: string;
	maxTokens?: number;
}

/**
 * Text and vision completion, as the agents use it.
 * Implementations resolve to the model's text or reject with {@link ModelRequestError}.
 */
export interface ModelClient {
	readonly model: string;
	generate(request: GenerateRequest): Promise<string>;
	analyzeImages(request: ImageAnalysisRequest): Promise<string>;
}

export type Backend = "openai" | "ollama";

export type ProviderSettings =
	| {
			backend: "openai";
			model: string;
			visionModel?: string;
			apiKey?: string;
			baseUrl?: string;
	  }
	| {
			backend: "ollama";
			model: string;
			visionModel: string;
			/** Server root, e.g. `http://localhost:11434` */
			baseUrl: string;
	  };

export class ModelRequestError extends Error {
	constructor(
		message: string,
		public readonly model: string,
		options?: { cause?: unknown },
	) {
		super(message, options);
		this.name = "ModelRequestError";
	}
}
