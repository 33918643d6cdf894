import { describe, expect, it } from "vitest";
import {
	PROJECT_NAME_MESSAGES,
	validateProjectName,
} from "../../../server/validation/name-validator";

describe("validateProjectName", () => {
	it.each(["my_app-1", "a", "Project04", "v1.2.3", "9lives", "a".repeat(64)])(
		"accepts %s",
		(name) => {
			expect(validateProjectName(name)).toEqual({ valid: true, message: "" });
		},
	);

	it.each(["", "   ", "\t"])("rejects blank input %j as required", (name) => {
		expect(validateProjectName(name)).toEqual({
			valid: false,
			message: PROJECT_NAME_MESSAGES.required,
		});
	});

	it.each([
		"a".repeat(65),
		"_hidden",
		".env",
		"-flag",
		"my app",
		"проект",
		"name/child",
		" padded",
	])("rejects %j with the charset message", (name) => {
		expect(validateProjectName(name)).toEqual({
			valid: false,
			message: PROJECT_NAME_MESSAGES.charset,
		});
	});

	it("charset message names the allowed characters and the length limit", () => {
		expect(PROJECT_NAME_MESSAGES.charset).toContain('"."');
		expect(PROJECT_NAME_MESSAGES.charset).toContain("1-64 characters");
	});

	it("rejects a trailing dot", () => {
		expect(validateProjectName("name.")).toEqual({
			valid: false,
			message: PROJECT_NAME_MESSAGES.trailing,
		});
	});

	it("rejects a trailing space before reaching the trailing rule", () => {
		expect(validateProjectName("name ").message).toBe(
			PROJECT_NAME_MESSAGES.charset,
		);
	});

	it.each(["CON", "con", "Prn", "aux", "NUL", "com1", "COM9", "lpt1", "LpT9"])(
		"rejects reserved device name %s",
		(name) => {
			expect(validateProjectName(name)).toEqual({
				valid: false,
				message: PROJECT_NAME_MESSAGES.reserved,
			});
		},
	);

	it.each(["COM0", "COM10", "LPT0", "console", "con1", "auxiliary"])(
		"accepts %s, which only resembles a device name",
		(name) => {
			expect(validateProjectName(name).valid).toBe(true);
		},
	);

	it("compares the whole name against device names", () => {
		expect(validateProjectName("com1.txt")).toEqual({ valid: true, message: "" });
	});
});
