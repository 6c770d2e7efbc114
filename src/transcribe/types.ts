export type TranscriptionFailure =
	| { kind: "connection_failed"; message: string }
	| { kind: "api_error"; status: number | undefined; message: string }
	| { kind: "other"; message: string };

/** Outcome of one transcription attempt; produced once per recording. */
export type TranscriptionResult =
	| { ok: true; text: string }
	| { ok: false; error: TranscriptionFailure };

export interface Transcriber {
	/**
	 * A single attempt, no internal retry. Resolves with a failure instead
	 * of rejecting.
	 */
	transcribe(audio: Buffer, languageHint?: string): Promise<TranscriptionResult>;
}
