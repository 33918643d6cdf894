export interface ValidationResult {
	valid: boolean;
	/** Empty when valid */
	message: string;
}

export const MAX_PROJECT_NAME_LENGTH = 64;

const PROJECT_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]{0,63}$/;

const RESERVED_DEVICE_NAMES = new Set([
	"CON",
	"PRN",
	"AUX",
	"NUL",
	...Array.from({ length: 9 }, (_, index) => `COM${index + 1}`),
	...Array.from({ length: 9 }, (_, index) => `LPT${index + 1}`),
]);

export const PROJECT_NAME_MESSAGES = {
	required: "Project name is required.",
	charset: `Use ASCII letters, digits, ".", "_" or "-", starting with a letter or digit (1-${MAX_PROJECT_NAME_LENGTH} characters).`,
	trailing: "Project name must not end with a dot or a space.",
	reserved: "Project name is a reserved device name on Windows.",
} as const;

const VALID: ValidationResult = { valid: true, message: "" };

function invalid(message: string): ValidationResult {
	return { valid: false, message };
}

/**
 * Checks a proposed project directory name. First failing rule wins.
 * Pure and cheap enough to run on every keystroke.
 */
export function validateProjectName(name: string): ValidationResult {
	if (name.trim().length === 0) {
		return invalid(PROJECT_NAME_MESSAGES.required);
	}
	if (!PROJECT_NAME_PATTERN.test(name)) {
		return invalid(PROJECT_NAME_MESSAGES.charset);
	}
	// A trailing space is already rejected by the pattern; a trailing dot is not.
	if (name.endsWith(".") || name.endsWith(" ")) {
		return invalid(PROJECT_NAME_MESSAGES.trailing);
	}
	if (RESERVED_DEVICE_NAMES.has(name.toUpperCase())) {
		return invalid(PROJECT_NAME_MESSAGES.reserved);
	}
	return VALID;
}
