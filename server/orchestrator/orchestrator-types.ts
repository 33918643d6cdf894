import type {
	CapabilityDefinitions,
	CapabilityId,
	CapabilityStatus,
	CapabilityStatuses,
} from "../capabilities/capability-types";
import type { RunOutcome } from "../process/process-runner";
import type { ProjectRequest } from "../projects/project-types";
import type { ValidationResult } from "../validation/name-validator";

export interface OrchestratorConfig {
	/** Absolute path handed to the interpreter as its first argument */
	scriptPath: string;
	/** Working directory of the scaffold run; projects are created here */
	workingDir: string;
	/** Overrides the interpreter found by the probe */
	interpreter?: string;
	capabilities: CapabilityDefinitions;
}

/**
 * Everything a client needs to render the console.
 * `canCreate` is derived at snapshot time, never stored.
 */
export interface OrchestratorSnapshot {
	request: ProjectRequest;
	validation: ValidationResult;
	capabilities: CapabilityStatuses;
	busy: boolean;
	canCreate: boolean;
	/** Reason the create action is disabled; null when it is enabled */
	blockedReason: string | null;
	/** `seq` of the newest log entry, 0 when empty */
	lastLogSeq: number;
}

export type CreateAttempt =
	| {
			started: true;
			request: ProjectRequest;
			/** Settles after the final log line; never rejects */
			completion: Promise<RunOutcome>;
	  }
	| { started: false; reason: string };

export interface CapabilityChangedEvent {
	id: CapabilityId;
	status: CapabilityStatus;
}

export const ORCHESTRATOR_EVENTS = {
	state: "state",
	log: "log",
	capability: "capability",
} as const;
