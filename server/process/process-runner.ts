import { createInterface, type Interface } from "node:readline";
import type { Readable } from "node:stream";
import type { LogSink, OutputStream } from "../log/log-types";
import {
	type ChildHandle,
	describeLaunchError,
	type SpawnFn,
	spawnChild,
} from "./process-types";

/** Reported when the child ended without an exit code (killed by a signal). */
export const UNKNOWN_EXIT_CODE = -1;

export interface RunRequest {
	command: string;
	args: readonly string[];
	cwd?: string;
}

export type RunOutcome =
	| { kind: "exited"; exitCode: number; signal: NodeJS.Signals | null }
	| { kind: "spawn-failed"; message: string };

export interface ProcessRunnerDeps {
	spawn: SpawnFn;
}

type SettledChild =
	| { kind: "exited"; code: number | null; signal: NodeJS.Signals | null }
	| { kind: "spawn-failed"; error: Error };

const DEFAULT_DEPS: ProcessRunnerDeps = {
	spawn: spawnChild,
};

const NEEDS_QUOTING = /[\s"']/;

function quoteArgument(arg: string): string {
	if (arg.length === 0 || NEEDS_QUOTING.test(arg)) {
		return JSON.stringify(arg);
	}
	return arg;
}

export function formatCommandLine(
	command: string,
	args: readonly string[],
): string {
	return [command, ...args].map(quoteArgument).join(" ");
}

export function formatExitLine(
	exitCode: number,
	signal: NodeJS.Signals | null,
): string {
	if (exitCode === UNKNOWN_EXIT_CODE && signal) {
		return `Exit code: ${exitCode} (terminated by ${signal})`;
	}
	return `Exit code: ${exitCode}`;
}

/**
 * Runs one external command and streams its output into a log sink.
 *
 * Both output streams are read line by line by independent readers. Their
 * lines meet in a single `deliver` function, which is the only place run
 * output reaches the sink. Lines of one stream keep their order; lines of
 * stdout and stderr that arrive together interleave in arrival order.
 *
 * `run` never rejects. A command that cannot be started produces a single
 * error line and a `spawn-failed` outcome.
 */
export class ProcessRunner {
	private readonly deps: ProcessRunnerDeps;
	private active: ChildHandle | null = null;

	constructor(deps?: Partial<ProcessRunnerDeps>) {
		this.deps = { ...DEFAULT_DEPS, ...deps };
	}

	/** Signal the in-flight child, if any. */
	kill(signal: NodeJS.Signals = "SIGTERM"): boolean {
		if (!this.active) {
			return false;
		}
		return this.active.kill(signal);
	}

	async run(request: RunRequest, sink: LogSink): Promise<RunOutcome> {
		sink({
			kind: "command",
			text: `> ${formatCommandLine(request.command, request.args)}`,
		});

		let child: ChildHandle;
		try {
			child = this.deps.spawn(request.command, request.args, {
				cwd: request.cwd,
				captureOutput: true,
			});
		} catch (error: unknown) {
			const launchError =
				error instanceof Error ? error : new Error(String(error));
			return this.reportSpawnFailure(request.command, launchError, sink);
		}

		this.active = child;
		try {
			return await this.collect(request.command, child, sink);
		} finally {
			this.active = null;
		}
	}

	private async collect(
		command: string,
		child: ChildHandle,
		sink: LogSink,
	): Promise<RunOutcome> {
		let accepting = true;
		const deliver = (text: string, stream: OutputStream) => {
			if (!accepting) {
				return;
			}
			sink({ kind: "output", text, stream });
		};

		const settled = new Promise<SettledChild>((resolve) => {
			child.on("error", (error) => {
				if (child.pid === undefined) {
					resolve({ kind: "spawn-failed", error });
					return;
				}
				console.warn(`[runner] ${command}: ${error.message}`);
			});
			child.on("exit", (code, signal) => {
				resolve({ kind: "exited", code, signal });
			});
		});

		const readers: Interface[] = [];
		const drains = [
			drainLines(child.stdout, "stdout", deliver, readers),
			drainLines(child.stderr, "stderr", deliver, readers),
		];

		const result = await settled;
		if (result.kind === "spawn-failed") {
			accepting = false;
			for (const reader of readers) {
				reader.close();
			}
			return this.reportSpawnFailure(command, result.error, sink);
		}

		await Promise.all(drains);
		accepting = false;

		const exitCode = result.code ?? UNKNOWN_EXIT_CODE;
		sink({ kind: "exit", text: formatExitLine(exitCode, result.signal) });
		return { kind: "exited", exitCode, signal: result.signal };
	}

	private reportSpawnFailure(
		command: string,
		error: Error,
		sink: LogSink,
	): RunOutcome {
		const message = describeLaunchError(error);
		sink({ kind: "error", text: `Failed to start ${command}: ${message}` });
		return { kind: "spawn-failed", message };
	}
}

function drainLines(
	stream: Readable | null,
	name: OutputStream,
	deliver: (text: string, stream: OutputStream) => void,
	readers: Interface[],
): Promise<void> {
	if (!stream) {
		return Promise.resolve();
	}

	return new Promise((resolve) => {
		const reader = createInterface({ input: stream, crlfDelay: Infinity });
		readers.push(reader);
		reader.on("line", (line) => deliver(line, name));
		reader.on("close", () => resolve());
		// readline re-emits input errors on the interface
		reader.on("error", (error) => {
			console.warn(`[runner] ${name} read failed: ${error.message}`);
			reader.close();
		});
	});
}
