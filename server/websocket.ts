import type { EventEmitter } from "node:events";
import type { ClientMessage, ServerMessage } from "../shared/types";
import { toErrorMessage } from "./errors";
import type { LogEntry } from "./log/log-types";
import type { Orchestrator } from "./orchestrator/orchestrator";
import {
	ORCHESTRATOR_EVENTS,
	type OrchestratorSnapshot,
} from "./orchestrator/orchestrator-types";
import { parseClientMessage } from "./websocket/client-message-schema";

type WebSocketLike = {
	send: (payload: string) => void;
	on: {
		(event: "message", listener: (raw: Buffer | string) => void): void;
		(event: "close", listener: () => void): void;
		(event: "error", listener: (error: Error) => void): void;
	};
};

export interface WebSocketDeps {
	orchestrator: Pick<
		Orchestrator,
		| "getSnapshot"
		| "getLog"
		| "setName"
		| "setFlag"
		| "refreshCapabilities"
		| "create"
	> & {
		emitter: Pick<EventEmitter, "on" | "off">;
	};
}

function sendEnvelope(socket: WebSocketLike, message: ServerMessage): void {
	socket.send(JSON.stringify(message));
}

function extractRequestId(value: unknown): string | undefined {
	if (typeof value !== "object" || value === null) {
		return undefined;
	}

	if (!("requestId" in value)) {
		return undefined;
	}
	return typeof value.requestId === "string" ? value.requestId : undefined;
}

/**
 * WebSocket connection handler.
 * Routes client messages to the orchestrator and relays its state and log
 * events to the connected client.
 */
export function handleWebSocket(
	socket: WebSocketLike,
	deps: WebSocketDeps,
): void {
	console.log("[ws] Client connected");
	const { orchestrator } = deps;

	const onState = (snapshot: OrchestratorSnapshot) => {
		sendEnvelope(socket, { type: "state:snapshot", snapshot });
	};
	const onLog = (entry: LogEntry) => {
		sendEnvelope(socket, { type: "log:append", entry });
	};

	orchestrator.emitter.on(ORCHESTRATOR_EVENTS.state, onState);
	orchestrator.emitter.on(ORCHESTRATOR_EVENTS.log, onLog);

	// Late joiners get the current state and the whole history.
	sendEnvelope(socket, {
		type: "state:snapshot",
		snapshot: orchestrator.getSnapshot(),
	});
	sendEnvelope(socket, { type: "log:entries", entries: orchestrator.getLog() });

	socket.on("message", (raw: Buffer | string) => {
		handleIncomingMessage(socket, raw, deps);
	});

	socket.on("close", () => {
		orchestrator.emitter.off(ORCHESTRATOR_EVENTS.state, onState);
		orchestrator.emitter.off(ORCHESTRATOR_EVENTS.log, onLog);
		console.log("[ws] Client disconnected");
	});

	socket.on("error", (err: Error) => {
		console.error("[ws] Socket error:", err.message);
	});
}

function handleIncomingMessage(
	socket: WebSocketLike,
	raw: Buffer | string,
	deps: WebSocketDeps,
): void {
	let parsed: unknown;
	try {
		parsed = JSON.parse(typeof raw === "string" ? raw : raw.toString("utf-8"));
	} catch {
		sendEnvelope(socket, { type: "error", message: "Invalid JSON" });
		return;
	}

	const message = parseClientMessage(parsed);
	if (!message) {
		sendEnvelope(socket, {
			type: "error",
			requestId: extractRequestId(parsed),
			message: "Invalid message format",
		});
		return;
	}

	console.log("[ws] Received:", message.type);
	try {
		routeMessage(socket, message, deps);
	} catch (error) {
		console.error("[ws] Failed to handle message:", error);
		sendEnvelope(socket, {
			type: "error",
			requestId: message.requestId,
			message: toErrorMessage(error),
		});
	}
}

function routeMessage(
	socket: WebSocketLike,
	message: ClientMessage,
	deps: WebSocketDeps,
): void {
	const { orchestrator } = deps;

	switch (message.type) {
		case "state:get": {
			sendEnvelope(socket, {
				type: "state:snapshot",
				snapshot: orchestrator.getSnapshot(),
				requestId: message.requestId,
			});
			return;
		}
		case "log:get": {
			sendEnvelope(socket, {
				type: "log:entries",
				entries: orchestrator.getLog(message.afterSeq),
				requestId: message.requestId,
			});
			return;
		}
		case "form:name": {
			// The resulting snapshot reaches every client through the state event.
			orchestrator.setName(message.name);
			return;
		}
		case "form:flag": {
			orchestrator.setFlag(message.flag, message.value);
			return;
		}
		case "environment:refresh": {
			void orchestrator.refreshCapabilities();
			return;
		}
		case "project:create": {
			const attempt = orchestrator.create();
			if (!attempt.started) {
				sendEnvelope(socket, {
					type: "project:create:rejected",
					reason: attempt.reason,
					requestId: message.requestId,
				});
				return;
			}
			sendEnvelope(socket, {
				type: "project:create:started",
				name: attempt.request.name,
				requestId: message.requestId,
			});
			return;
		}
	}
}
