export interface ErrorTemplate {
	message: string;
	action: string;
}

export const ErrorTemplates = {
	// API Errors
	API: {
		INVALID_KEY: (provider: string, envVar: string) => ({
			message: `${provider} API key is invalid or was rejected.`,
			action: `Check the value of ${envVar} (or apiKeys in ~/.config/batch-race/config.json).`,
		}),
		RATE_LIMIT_EXCEEDED: (provider: string) => ({
			message: `${provider} rate limit exceeded.`,
			action:
				"Please wait a moment before trying again or check your API usage limits.",
		}),
		JOB_FAILED: (provider: string, state: string) => ({
			message: `${provider} batch job ended with status: ${state}.`,
			action:
				"Check the job in the vendor dashboard. Batch jobs are not resubmitted automatically.",
		}),
	},

	// Configuration Errors
	CONFIG: {
		MISSING_API_KEY: (variables: string[]) => ({
			message: `Missing API key: ${variables.join(", ")} not set.`,
			action: variables
				.map((name) => `Set it with: export ${name}='your-key'`)
				.join("\n"),
		}),
		VALIDATION_FAILED: {
			message: "Configuration validation failed.",
			action:
				"Review the error details and fix the invalid fields in ~/.config/batch-race/config.json.",
		},
		CORRUPTED: (path: string) => ({
			message: "Configuration file is corrupted (invalid JSON).",
			action: `Fix or delete the file: ${path}`,
		}),
	},
};

export const formatUserError = (template: ErrorTemplate): string => {
	return `${template.message}\n\nAction: ${template.action}`;
};

/**
 * Suggested next step for a vendor failure, when there is one worth printing.
 */
export const actionFor = (
	error: { code: string; provider: string },
	envVar: string,
): string | undefined => {
	switch (error.code) {
		case "INVALID_API_KEY":
			return ErrorTemplates.API.INVALID_KEY(error.provider, envVar).action;
		case "RATE_LIMIT_EXCEEDED":
			return ErrorTemplates.API.RATE_LIMIT_EXCEEDED(error.provider).action;
		case "JOB_FAILED":
			return ErrorTemplates.API.JOB_FAILED(error.provider, "").action;
		default:
			return undefined;
	}
};
