import {
	type ChildHandle,
	describeLaunchError,
	type SpawnFn,
	spawnChild,
} from "../process/process-types";
import {
	CAPABILITY_IDS,
	type CandidateAttempt,
	type CandidateCommand,
	type CapabilityDefinition,
	type CapabilityDefinitions,
	type CapabilityId,
	type ChainResult,
	type TerminalCapabilityStatus,
} from "./capability-types";

export interface CapabilityProbeDeps {
	spawn: SpawnFn;
	/** A candidate still running after this long is killed and counted as failed */
	timeoutMs: number;
}

const DEFAULT_DEPS: CapabilityProbeDeps = {
	spawn: spawnChild,
	timeoutMs: 10000,
};

/**
 * Detects external tools by running their candidate commands.
 * Failing to find a tool is an ordinary result, never a thrown error.
 */
export class CapabilityProbe {
	private readonly deps: CapabilityProbeDeps;

	constructor(deps?: Partial<CapabilityProbeDeps>) {
		this.deps = { ...DEFAULT_DEPS, ...deps };
	}

	/** Probe every capability concurrently. */
	async probeAll(
		definitions: CapabilityDefinitions,
	): Promise<Record<CapabilityId, TerminalCapabilityStatus>> {
		const [interpreter, packageInstaller, venvTool] = await Promise.all(
			CAPABILITY_IDS.map((id) => this.probe(definitions[id])),
		);
		return { interpreter, packageInstaller, venvTool };
	}

	async probe(
		definition: CapabilityDefinition,
	): Promise<TerminalCapabilityStatus> {
		const result = await this.probeChain(definition.candidates);
		if (result.ok) {
			return { state: "available", detectedBy: result.detectedBy };
		}

		console.log(
			`[probe] ${definition.label} unavailable after ${result.attempts.length} candidate(s)`,
		);
		return {
			state: "unavailable",
			reason: definition.remediation,
			attempts: result.attempts,
		};
	}

	/** Left to right, stopping at the first candidate that succeeds. */
	async probeChain(
		candidates: readonly CandidateCommand[],
	): Promise<ChainResult> {
		const attempts: CandidateAttempt[] = [];
		for (const command of candidates) {
			const attempt = await this.runCandidate(command);
			attempts.push(attempt);
			if (attempt.outcome === "succeeded") {
				return { ok: true, detectedBy: command, attempts };
			}
		}
		return { ok: false, attempts };
	}

	/** Starts the command with its output discarded; only the exit status counts. */
	runCandidate(command: CandidateCommand): Promise<CandidateAttempt> {
		const [program, ...args] = command;

		let child: ChildHandle;
		try {
			child = this.deps.spawn(program, args, { captureOutput: false });
		} catch (error: unknown) {
			return Promise.resolve<CandidateAttempt>({
				command,
				outcome: "launch-failed",
				reason:
					error instanceof Error ? describeLaunchError(error) : String(error),
			});
		}

		return new Promise<CandidateAttempt>((resolve) => {
			let settled = false;
			const settle = (attempt: CandidateAttempt) => {
				if (settled) {
					return;
				}
				settled = true;
				clearTimeout(timer);
				resolve(attempt);
			};

			const timer = setTimeout(() => {
				child.kill("SIGKILL");
				settle({ command, outcome: "timed-out" });
			}, this.deps.timeoutMs);

			child.on("error", (error) => {
				settle({
					command,
					outcome: "launch-failed",
					reason: describeLaunchError(error),
				});
			});
			child.on("exit", (code) => {
				settle(
					code === 0
						? { command, outcome: "succeeded" }
						: { command, outcome: "exited", exitCode: code },
				);
			});
		});
	}
}
