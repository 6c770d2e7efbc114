export interface ErrorTemplate {
	message: string;
	action: string;
}

// `message` is what the overlay shows, so keep it short.
export const ErrorTemplates = {
	API: {
		CONNECTION_FAILED: {
			message: "API connection failed. Check internet/proxy.",
			action:
				"Check your internet connection. If you use a custom endpoint, verify 'api.endpoint' in ~/.config/hotmic/config.json.",
		},
		API_ERROR: (status: number | undefined, detail: string) => ({
			message:
				status === undefined ? `API Error: ${detail}` : `API Error ${status}: ${detail}`,
			action:
				status === 401
					? "Your API key was rejected. Set 'api.key' in ~/.config/hotmic/config.json or export GROQ_API_KEY."
					: "The transcription service returned an error. Try again in a few seconds.",
		}),
		TRANSCRIPTION_FAILED: (detail: string) => ({
			message: `Transcription failed: ${detail}`,
			action: "Check the logs in ~/.config/hotmic/logs/ for details.",
		}),
		EMPTY_RESULT: {
			message: "Empty transcription received",
			action: "Speak closer to the microphone or record a little longer.",
		},
		MISSING_KEY: {
			message: "API key not configured",
			action:
				"Set 'api.key' in ~/.config/hotmic/config.json or export GROQ_API_KEY.",
		},
	},

	AUDIO: {
		RECORDING_TOO_SHORT: {
			message: "Recording too short",
			action: "Press the hotkey again after you finish speaking.",
		},
		AUDIO_BACKEND_MISSING: {
			message: "arecord is not installed",
			action:
				"Please install 'alsa-utils' using your package manager (e.g., 'sudo apt install alsa-utils').",
		},
		NO_MICROPHONE: {
			message: "No microphone detected",
			action:
				"1. Check if your microphone is physically connected.\n2. Run 'hotmic list-mics' and set 'audio.device' in ~/.config/hotmic/config.json.",
		},
		PERMISSION_DENIED: {
			message: "Microphone permission denied",
			action:
				"Ensure your user is in the 'audio' group: 'sudo usermod -aG audio $USER', then log out and back in.",
		},
		DEVICE_BUSY: {
			message: "Microphone is busy",
			action:
				"Close other applications that might be using the microphone, or run 'fuser /dev/snd/*' to find them.",
		},
	},

	OUTPUT: {
		INJECTION_FAILED: {
			message: "Text insertion failed. Check ydotool.",
			action:
				"Install ydotool and make sure ydotoold is running. The text is still on the clipboard if clipboard copy is enabled.",
		},
	},

	CONFIG: {
		VALIDATION_FAILED: {
			message: "Configuration validation failed.",
			action:
				"Review the error details and fix the invalid fields in ~/.config/hotmic/config.json.",
		},
		CORRUPTED: {
			message: "Configuration file is corrupted (invalid JSON).",
			action:
				"To reset, run 'hotmic config init --force' or delete ~/.config/hotmic/config.json.",
		},
		WRITE_FAILED: {
			message: "Failed to save configuration.",
			action: "Ensure you have write permissions for ~/.config/hotmic/.",
		},
	},
};

export const formatUserError = (template: ErrorTemplate): string => {
	return `${template.message}\n\nAction: ${template.action}`;
};
