import type {
	CandidateCommand,
	CapabilityDefinitions,
	CapabilityId,
} from "./capability-types";

/** Exits 0 only when the interpreter ships the standard `venv` module. */
export const VENV_IMPORT_PROBE = "import venv";

export const DEFAULT_CAPABILITIES: CapabilityDefinitions = {
	interpreter: {
		id: "interpreter",
		label: "Python",
		candidates: [
			["python", "--version"],
			["python3", "--version"],
		],
		remediation: "Python not found. Install Python and add it to PATH.",
	},
	packageInstaller: {
		id: "packageInstaller",
		label: "pip",
		candidates: [
			["pip", "--version"],
			["python", "-m", "pip", "--version"],
			["python3", "-m", "pip", "--version"],
		],
		remediation: "pip not found. Install pip for your Python interpreter.",
	},
	venvTool: {
		id: "venvTool",
		label: "venv/virtualenv",
		candidates: [
			["virtualenv", "--version"],
			["python", "-m", "virtualenv", "--version"],
			["python3", "-m", "virtualenv", "--version"],
			["python", "-c", VENV_IMPORT_PROBE],
			["python3", "-c", VENV_IMPORT_PROBE],
		],
		remediation:
			"Neither virtualenv nor the built-in venv module was found. Install virtualenv or a Python build that includes venv.",
	},
};

export type CandidateOverrides = Partial<
	Record<CapabilityId, readonly CandidateCommand[]>
>;

/** Default definitions with any configured candidate chains swapped in. */
export function resolveCapabilities(
	overrides: CandidateOverrides = {},
): CapabilityDefinitions {
	return {
		interpreter: {
			...DEFAULT_CAPABILITIES.interpreter,
			candidates:
				overrides.interpreter ?? DEFAULT_CAPABILITIES.interpreter.candidates,
		},
		packageInstaller: {
			...DEFAULT_CAPABILITIES.packageInstaller,
			candidates:
				overrides.packageInstaller ??
				DEFAULT_CAPABILITIES.packageInstaller.candidates,
		},
		venvTool: {
			...DEFAULT_CAPABILITIES.venvTool,
			candidates:
				overrides.venvTool ?? DEFAULT_CAPABILITIES.venvTool.candidates,
		},
	};
}
