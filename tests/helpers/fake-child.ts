import { EventEmitter } from "node:events";
import { PassThrough } from "node:stream";
import { vi } from "vitest";
import type { SpawnFn } from "@server/process/process-types";

/**
 * Stand-in for a spawned ChildProcess: an EventEmitter with PassThrough
 * output streams. `failToSpawn` clears `pid` the way Node does for a child
 * the OS never started.
 */
export class FakeChild extends EventEmitter {
	readonly stdout = new PassThrough();
	readonly stderr = new PassThrough();
	pid: number | undefined;
	readonly kill = vi.fn<(signal?: NodeJS.Signals) => boolean>(() => true);

	constructor(pid = 4321) {
		super();
		this.pid = pid;
	}

	writeStdout(line: string): void {
		this.stdout.write(`${line}\n`);
	}

	writeStderr(line: string): void {
		this.stderr.write(`${line}\n`);
	}

	/** Closes both streams, then reports the exit. */
	finish(code: number | null, signal: NodeJS.Signals | null = null): void {
		this.stdout.end();
		this.stderr.end();
		this.emit("exit", code, signal);
	}

	failToSpawn(error: Error): void {
		this.pid = undefined;
		this.emit("error", error);
	}
}

export function launchError(command: string, code = "ENOENT"): Error {
	return Object.assign(new Error(`spawn ${command} ${code}`), { code });
}

export type ScriptedOutcome = number | "missing";

/**
 * Spawn double for probing: looks up the outcome by the full command line
 * ("python3 --version"). Unlisted commands behave as missing executables.
 */
export function createScriptedSpawn(
	outcomes: Record<string, ScriptedOutcome>,
): ReturnType<typeof vi.fn<SpawnFn>> {
	return vi.fn<SpawnFn>((command, args) => {
		const outcome = outcomes[[command, ...args].join(" ")] ?? "missing";
		const child = new FakeChild();
		queueMicrotask(() => {
			if (outcome === "missing") {
				child.failToSpawn(launchError(command));
				return;
			}
			child.emit("exit", outcome, null);
		});
		return child;
	});
}

export interface Deferred<T> {
	promise: Promise<T>;
	resolve: (value: T) => void;
	reject: (error: unknown) => void;
}

export function createDeferred<T>(): Deferred<T> {
	let resolve: (value: T) => void = () => {};
	let reject: (error: unknown) => void = () => {};
	const promise = new Promise<T>((innerResolve, innerReject) => {
		resolve = innerResolve;
		reject = innerReject;
	});
	return { promise, resolve, reject };
}

/** Lets pending stream and promise callbacks run. */
export function flush(ms = 10): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}
