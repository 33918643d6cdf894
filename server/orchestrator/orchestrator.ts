import { EventEmitter } from "node:events";
import type { CapabilityProbe } from "../capabilities/capability-probe";
import {
	CAPABILITY_IDS,
	type CapabilityId,
	type CapabilityStatuses,
	type TerminalCapabilityStatus,
} from "../capabilities/capability-types";
import { toErrorMessage } from "../errors";
import { LogStore } from "../log/log-store";
import type { LogEntry, LogLine } from "../log/log-types";
import type { ProcessRunner, RunOutcome } from "../process/process-runner";
import {
	copyRequest,
	createEmptyRequest,
	type ProjectFlag,
	type ProjectRequest,
} from "../projects/project-types";
import { buildScaffoldArgs } from "../projects/scaffold-args";
import {
	type ValidationResult,
	validateProjectName,
} from "../validation/name-validator";
import {
	type CreateAttempt,
	ORCHESTRATOR_EVENTS,
	type OrchestratorConfig,
	type OrchestratorSnapshot,
} from "./orchestrator-types";

export interface OrchestratorDeps {
	probe: Pick<CapabilityProbe, "probe">;
	runner: Pick<ProcessRunner, "run" | "kill">;
	emitter?: EventEmitter;
}

const FALLBACK_INTERPRETER = "python";

const BLOCKED_BUSY = "A project is already being created.";
const BLOCKED_CHECKING = "Checking the environment...";

function allChecking(): CapabilityStatuses {
	return {
		interpreter: { state: "checking" },
		packageInstaller: { state: "checking" },
		venvTool: { state: "checking" },
	};
}

/**
 * Owns the console state: the form, the capability statuses, the busy flag
 * and the run log. Every mutation goes through one of its handlers, which
 * emit `state`, `log` and `capability` events on `emitter`.
 *
 * The create gate is computed from (busy, validation, capabilities) on each
 * read. `busy` is set before the first side effect of a run and cleared only
 * after its last log line.
 */
export class Orchestrator {
	public readonly emitter: EventEmitter;
	private readonly config: OrchestratorConfig;
	private readonly deps: OrchestratorDeps;
	private readonly log = new LogStore();
	private request: ProjectRequest = createEmptyRequest();
	private validation: ValidationResult = validateProjectName("");
	private capabilities: CapabilityStatuses = allChecking();
	private readonly probeGenerations: Record<CapabilityId, number> = {
		interpreter: 0,
		packageInstaller: 0,
		venvTool: 0,
	};
	private busy = false;
	private activeRun: Promise<RunOutcome> | null = null;
	private latestProbe: Promise<void>;

	constructor(config: OrchestratorConfig, deps: OrchestratorDeps) {
		this.config = config;
		this.deps = deps;
		this.emitter = deps.emitter ?? new EventEmitter();
		// One state and one log listener per connected client
		this.emitter.setMaxListeners(0);
		this.latestProbe = this.refreshCapabilities();
	}

	// -- Form --

	setName(name: string): ValidationResult {
		this.request.name = name;
		this.validation = validateProjectName(name);
		this.emitState();
		return this.validation;
	}

	setFlag(flag: ProjectFlag, value: boolean): void {
		this.request.flags[flag] = value;
		this.emitState();
	}

	// -- Environment --

	/**
	 * Re-runs every capability chain. Results of an earlier, still pending
	 * probe are dropped once the capability has been restarted here.
	 * Never rejects.
	 */
	refreshCapabilities(): Promise<void> {
		const started = CAPABILITY_IDS.map((id) => {
			this.probeGenerations[id] += 1;
			this.capabilities[id] = { state: "checking" };
			return { id, generation: this.probeGenerations[id] };
		});
		this.emitState();

		const probe = Promise.all(
			started.map(({ id, generation }) => this.probeCapability(id, generation)),
		).then(() => {
			const current = started.every(
				({ id, generation }) => this.probeGenerations[id] === generation,
			);
			if (current) {
				this.appendLog({ kind: "status", text: this.describeEnvironment() });
			}
		});
		this.latestProbe = probe;
		return probe;
	}

	// -- Create --

	canCreate(): boolean {
		return this.blockedReason() === null;
	}

	/**
	 * Starts the scaffold run when the gate is open; otherwise a no-op that
	 * reports why. `busy` is already true when this returns `started: true`.
	 */
	create(): CreateAttempt {
		const reason = this.blockedReason();
		if (reason !== null) {
			return { started: false, reason };
		}

		this.busy = true;
		const request = copyRequest(this.request);
		this.emitState();

		const completion = this.runScaffold(request);
		this.activeRun = completion;
		void completion.then(() => {
			if (this.activeRun === completion) {
				this.activeRun = null;
			}
		});
		return { started: true, request, completion };
	}

	// -- Queries --

	getSnapshot(): OrchestratorSnapshot {
		const blockedReason = this.blockedReason();
		return {
			request: copyRequest(this.request),
			validation: { ...this.validation },
			capabilities: { ...this.capabilities },
			busy: this.busy,
			canCreate: blockedReason === null,
			blockedReason,
			lastLogSeq: this.log.size,
		};
	}

	getLog(afterSeq = 0): LogEntry[] {
		return this.log.list(afterSeq);
	}

	isBusy(): boolean {
		return this.busy;
	}

	/** Resolves once the latest probe and any in-flight run have settled. */
	async whenIdle(): Promise<void> {
		await this.latestProbe;
		if (this.activeRun) {
			await this.activeRun;
		}
	}

	/**
	 * Waits up to `timeoutMs` for an in-flight run, then kills its child.
	 * Used on server shutdown only.
	 */
	async shutdown(timeoutMs: number): Promise<void> {
		const run = this.activeRun;
		if (!run) {
			return;
		}

		const finished = await new Promise<boolean>((resolve) => {
			const timer = setTimeout(() => resolve(false), timeoutMs);
			void run.then(() => {
				clearTimeout(timer);
				resolve(true);
			});
		});

		if (!finished) {
			console.warn("[orchestrator] Run still active at shutdown, killing it");
			this.deps.runner.kill("SIGKILL");
			await run;
		}
	}

	// -- Internals --

	private blockedReason(): string | null {
		if (this.busy) {
			return BLOCKED_BUSY;
		}
		if (!this.validation.valid) {
			return this.validation.message;
		}
		if (CAPABILITY_IDS.some((id) => this.capabilities[id].state === "checking")) {
			return BLOCKED_CHECKING;
		}
		const missing = this.missingCapabilityLabels();
		if (missing.length > 0) {
			return `Missing: ${missing.join(", ")}.`;
		}
		return null;
	}

	private missingCapabilityLabels(): string[] {
		return CAPABILITY_IDS.filter(
			(id) => this.capabilities[id].state === "unavailable",
		).map((id) => this.config.capabilities[id].label);
	}

	private describeEnvironment(): string {
		const missing = this.missingCapabilityLabels();
		if (missing.length === 0) {
			return "Environment check: all tools available.";
		}
		return `Environment check: missing ${missing.join(", ")}.`;
	}

	private async probeCapability(
		id: CapabilityId,
		generation: number,
	): Promise<void> {
		const definition = this.config.capabilities[id];
		let status: TerminalCapabilityStatus;
		try {
			status = await this.deps.probe.probe(definition);
		} catch (error: unknown) {
			status = {
				state: "unavailable",
				reason: `${definition.label}: probe failed (${toErrorMessage(error)})`,
				attempts: [],
			};
		}

		if (this.probeGenerations[id] !== generation) {
			return;
		}

		this.capabilities[id] = status;
		this.emitter.emit(ORCHESTRATOR_EVENTS.capability, { id, status });
		this.emitState();
	}

	private resolveInterpreter(): string {
		if (this.config.interpreter) {
			return this.config.interpreter;
		}
		const interpreter = this.capabilities.interpreter;
		if (interpreter.state === "available") {
			return interpreter.detectedBy[0];
		}
		return FALLBACK_INTERPRETER;
	}

	private async runScaffold(request: ProjectRequest): Promise<RunOutcome> {
		try {
			return await this.deps.runner.run(
				{
					command: this.resolveInterpreter(),
					args: buildScaffoldArgs(this.config.scriptPath, request),
					cwd: this.config.workingDir,
				},
				(line) => this.appendLog(line),
			);
		} catch (error: unknown) {
			const message = toErrorMessage(error);
			console.error("[orchestrator] Scaffold run failed:", error);
			this.appendLog({ kind: "error", text: `Scaffold run failed: ${message}` });
			return { kind: "spawn-failed", message };
		} finally {
			this.busy = false;
			this.emitState();
		}
	}

	private appendLog(line: LogLine): void {
		const entry = this.log.append(line);
		this.emitter.emit(ORCHESTRATOR_EVENTS.log, entry);
	}

	private emitState(): void {
		this.emitter.emit(ORCHESTRATOR_EVENTS.state, this.getSnapshot());
	}
}
