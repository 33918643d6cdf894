/**
 * External tools whose presence gates project creation.
 */
export type CapabilityId = "interpreter" | "packageInstaller" | "venvTool";

export const CAPABILITY_IDS = [
	"interpreter",
	"packageInstaller",
	"venvTool",
] as const satisfies readonly CapabilityId[];

/** Program followed by its arguments. */
export type CandidateCommand = readonly [program: string, ...args: string[]];

export interface CapabilityDefinition {
	id: CapabilityId;
	/** Display name, e.g. "pip" */
	label: string;
	/** Tried left to right; the first that starts and exits 0 wins */
	candidates: readonly CandidateCommand[];
	/** Shown when every candidate fails */
	remediation: string;
}

export type CandidateAttempt =
	| { command: CandidateCommand; outcome: "succeeded" }
	| { command: CandidateCommand; outcome: "exited"; exitCode: number | null }
	| { command: CandidateCommand; outcome: "launch-failed"; reason: string }
	| { command: CandidateCommand; outcome: "timed-out" };

export type ChainResult =
	| { ok: true; detectedBy: CandidateCommand; attempts: CandidateAttempt[] }
	| { ok: false; attempts: CandidateAttempt[] };

export type CapabilityStatus =
	| { state: "checking" }
	| { state: "available"; detectedBy: CandidateCommand }
	| { state: "unavailable"; reason: string; attempts: CandidateAttempt[] };

export type TerminalCapabilityStatus = Exclude<
	CapabilityStatus,
	{ state: "checking" }
>;

export type CapabilityStatuses = Record<CapabilityId, CapabilityStatus>;

export type CapabilityDefinitions = Record<CapabilityId, CapabilityDefinition>;
