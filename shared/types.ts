import type { LogEntry } from "../server/log/log-types";
import type { OrchestratorSnapshot } from "../server/orchestrator/orchestrator-types";
import type { ProjectFlag } from "../server/projects/project-types";

/**
 * Client -> Server WebSocket messages.
 * All messages include an optional requestId for correlating responses.
 */
export type ClientMessage = {
	requestId?: string;
} & (
	| { type: "state:get" }
	| { type: "log:get"; afterSeq?: number }
	| { type: "form:name"; name: string }
	| { type: "form:flag"; flag: ProjectFlag; value: boolean }
	| { type: "environment:refresh" }
	| { type: "project:create" }
);

/**
 * Server -> Client WebSocket messages.
 */
export type ServerMessage =
	| { type: "state:snapshot"; snapshot: OrchestratorSnapshot; requestId?: string }
	| { type: "log:append"; entry: LogEntry }
	| { type: "log:entries"; entries: LogEntry[]; requestId?: string }
	| { type: "project:create:started"; name: string; requestId?: string }
	| { type: "project:create:rejected"; reason: string; requestId?: string }
	| { type: "error"; requestId?: string; message: string };
