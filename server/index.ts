import fastifyStatic from "@fastify/static";
import fastifyWebsocket from "@fastify/websocket";
import Fastify from "fastify";
import { fileURLToPath } from "node:url";
import { registerConsoleRoutes } from "./api/routes";
import { CapabilityProbe } from "./capabilities/capability-probe";
import { loadConfig } from "./config";
import { Orchestrator } from "./orchestrator/orchestrator";
import { ProcessRunner } from "./process/process-runner";
import { handleWebSocket } from "./websocket";

const CLIENT_DIR = fileURLToPath(new URL("../client", import.meta.url));

async function main() {
	const config = await loadConfig();
	const app = Fastify({ logger: true });

	const runner = new ProcessRunner();
	const orchestrator = new Orchestrator(
		{
			scriptPath: config.scriptPath,
			workingDir: config.workingDir,
			interpreter: config.interpreter,
			capabilities: config.capabilities,
		},
		{
			probe: new CapabilityProbe({ timeoutMs: config.probeTimeoutMs }),
			runner,
		},
	);

	// Static file serving for the client
	await app.register(fastifyStatic, {
		root: CLIENT_DIR,
		prefix: "/",
	});

	// WebSocket support
	await app.register(fastifyWebsocket);

	// WebSocket endpoint
	app.get("/ws", { websocket: true }, (socket, _req) => {
		handleWebSocket(socket, { orchestrator });
	});

	await registerConsoleRoutes(app, { orchestrator });

	// Start server
	await app.listen({ port: config.port, host: config.host });
	console.log(
		`Scaffold console running at http://${config.host}:${config.port} (script: ${config.scriptPath})`,
	);

	let shuttingDown = false;
	const shutdown = async (signal: string) => {
		if (shuttingDown) {
			return;
		}
		shuttingDown = true;
		console.log(`\n[server] Received ${signal}, shutting down...`);
		try {
			await orchestrator.shutdown(config.shutdownTimeoutMs);
			await app.close();
			process.exit(0);
		} catch (error) {
			console.error("[server] Shutdown failed:", error);
			process.exit(1);
		}
	};

	process.on("SIGINT", () => {
		void shutdown("SIGINT");
	});
	process.on("SIGTERM", () => {
		void shutdown("SIGTERM");
	});
}

main().catch((err) => {
	console.error("Failed to start server:", err);
	process.exit(1);
});
