import { spawn } from "node:child_process";
import type { Readable } from "node:stream";

/**
 * The slice of a Node `ChildProcess` the runner and the probe rely on.
 * Tests substitute an EventEmitter with PassThrough streams.
 */
export interface ChildHandle {
	/** Undefined when the OS never started the process */
	readonly pid?: number;
	readonly stdout: Readable | null;
	readonly stderr: Readable | null;
	on(event: "error", listener: (error: Error) => void): unknown;
	on(
		event: "exit",
		listener: (code: number | null, signal: NodeJS.Signals | null) => void,
	): unknown;
	kill(signal?: NodeJS.Signals): boolean;
}

export interface SpawnRequestOptions {
	cwd?: string;
	/** When false both output streams are discarded instead of piped */
	captureOutput: boolean;
}

export type SpawnFn = (
	command: string,
	args: readonly string[],
	options: SpawnRequestOptions,
) => ChildHandle;

export const spawnChild: SpawnFn = (command, args, options) =>
	spawn(command, [...args], {
		cwd: options.cwd,
		stdio: options.captureOutput
			? ["ignore", "pipe", "pipe"]
			: ["ignore", "ignore", "ignore"],
		windowsHide: true,
	});

function errorCode(error: Error): string | undefined {
	return "code" in error && typeof error.code === "string"
		? error.code
		: undefined;
}

/** Short human-readable reason for a failed launch. */
export function describeLaunchError(error: Error): string {
	switch (errorCode(error)) {
		case "ENOENT":
			return "executable not found";
		case "EACCES":
		case "EPERM":
			return "permission denied";
		default:
			return error.message;
	}
}
