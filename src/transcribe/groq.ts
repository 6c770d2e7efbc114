import Groq, { APIConnectionError, APIError, toFile } from "groq-sdk";
import { HttpsProxyAgent } from "https-proxy-agent";
import { loadConfig } from "../config/loader";
import type { Config } from "../config/schema";
import { ErrorTemplates } from "../utils/error-templates";
import { errorMessage } from "../utils/errors";
import { logError, logger } from "../utils/logger";
import { truncate } from "../utils/text";
import type {
	Transcriber,
	TranscriptionFailure,
	TranscriptionResult,
} from "./types";

type ApiSettings = Config["api"];

export const classifyTranscriptionError = (
	error: unknown,
): TranscriptionFailure => {
	// APIConnectionError extends APIError, so it has to be checked first
	if (error instanceof APIConnectionError) {
		return { kind: "connection_failed", message: error.message };
	}
	if (error instanceof APIError) {
		return { kind: "api_error", status: error.status, message: error.message };
	}
	return { kind: "other", message: errorMessage(error) };
};

export class GroqClient implements Transcriber {
	private client: Groq | null = null;

	constructor(private readonly settings: ApiSettings = loadConfig().api) {}

	private getClient(): Groq | null {
		if (!this.settings.key) return null;
		if (!this.client) {
			const { proxy } = this.settings;
			if (proxy) {
				logger.info(
					{ proxy: new URL(proxy).host },
					"Routing transcription requests through proxy",
				);
			}
			this.client = new Groq({
				apiKey: this.settings.key,
				baseURL: this.settings.endpoint,
				timeout: this.settings.timeoutMs,
				maxRetries: 0,
				...(proxy ? { httpAgent: new HttpsProxyAgent(proxy) } : {}),
			});
		}
		return this.client;
	}

	public async transcribe(
		audio: Buffer,
		languageHint?: string,
	): Promise<TranscriptionResult> {
		const client = this.getClient();
		if (!client) {
			return {
				ok: false,
				error: { kind: "other", message: ErrorTemplates.API.MISSING_KEY.message },
			};
		}

		const startTime = Date.now();
		logger.info(
			{
				model: this.settings.model,
				language: languageHint ?? "auto-detect",
				sizeKb: Math.round(audio.length / 1024),
			},
			"Sending audio for transcription",
		);

		try {
			const file = await toFile(audio, "recording.wav", { type: "audio/wav" });
			const transcription = await client.audio.transcriptions.create(
				{
					file,
					model: this.settings.model,
					language: languageHint,
					temperature: 0,
					response_format: "json",
				},
				{ timeout: this.settings.timeoutMs, maxRetries: 0 },
			);

			const text = transcription.text;
			logger.info(
				{
					processingTime: Date.now() - startTime,
					textLength: text.length,
					preview: truncate(text, 50),
				},
				"Transcription complete",
			);
			return { ok: true, text };
		} catch (error) {
			const failure = classifyTranscriptionError(error);
			logError("Transcription request failed", error, {
				kind: failure.kind,
				processingTime: Date.now() - startTime,
			});
			return { ok: false, error: failure };
		}
	}
}
