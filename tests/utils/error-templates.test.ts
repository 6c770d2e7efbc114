import { describe, expect, it } from "vitest";
import {
	ErrorTemplates,
	formatUserError,
} from "../../src/utils/error-templates";

describe("ErrorTemplates", () => {
	it("should have correct message and action for static templates", () => {
		const template = ErrorTemplates.API.MISSING_KEY;
		expect(template.message).toBe("API key not configured");
		expect(template.action).toContain("GROQ_API_KEY");
	});

	it("should include the status in API errors when there is one", () => {
		expect(ErrorTemplates.API.API_ERROR(401, "Invalid API Key").message).toBe(
			"API Error 401: Invalid API Key",
		);
		expect(ErrorTemplates.API.API_ERROR(undefined, "bad gateway").message).toBe(
			"API Error: bad gateway",
		);
	});

	it("should point at the key for a rejected key only", () => {
		expect(ErrorTemplates.API.API_ERROR(401, "x").action).toContain("api.key");
		expect(ErrorTemplates.API.API_ERROR(500, "x").action).toBe(
			"The transcription service returned an error. Try again in a few seconds.",
		);
	});

	it("should wrap arbitrary transcription failures", () => {
		expect(ErrorTemplates.API.TRANSCRIPTION_FAILED("socket hang up").message).toBe(
			"Transcription failed: socket hang up",
		);
	});
});

describe("formatUserError", () => {
	it("should format template into a user-friendly string", () => {
		const template = {
			message: "Test error.",
			action: "Test action.",
		};
		const formatted = formatUserError(template);
		expect(formatted).toBe("Test error.\n\nAction: Test action.");
	});
});
