import type { FastifyInstance, FastifyReply } from "fastify";
import { z } from "zod";
import { AppError, type AppErrorCode } from "../errors";
import type { Orchestrator } from "../orchestrator/orchestrator";
import { PROJECT_FLAGS } from "../projects/project-types";

export interface ConsoleRoutesDeps {
	orchestrator: Pick<
		Orchestrator,
		"getSnapshot" | "getLog" | "setName" | "setFlag" | "refreshCapabilities" | "create"
	>;
}

const logQuerySchema = z.object({
	afterSeq: z.coerce.number().int().nonnegative().optional(),
});

const createBodySchema = z
	.object({
		name: z.string(),
		flags: z
			.object({
				createVenv: z.boolean(),
				installPackages: z.boolean(),
				refreshTemplates: z.boolean(),
				force: z.boolean(),
			})
			.partial()
			.strict()
			.optional(),
	})
	.strict();

const STATUS_BY_CODE: Record<AppErrorCode, number> = {
	INVALID_REQUEST: 400,
	CREATE_REJECTED: 409,
	INVALID_CONFIG: 500,
};

function sendAppError(reply: FastifyReply, error: AppError): FastifyReply {
	return reply
		.code(STATUS_BY_CODE[error.code])
		.send({ code: error.code, message: error.message });
}

function invalidRequest(error: z.ZodError): AppError {
	const detail = error.issues
		.map((issue) =>
			issue.path.length > 0
				? `${issue.path.join(".")}: ${issue.message}`
				: issue.message,
		)
		.join("; ");
	return new AppError("INVALID_REQUEST", detail);
}

/**
 * HTTP surface of the console. Mirrors the WebSocket protocol for scripts
 * and tests that prefer request/response.
 */
export async function registerConsoleRoutes(
	app: FastifyInstance,
	deps: ConsoleRoutesDeps,
): Promise<void> {
	const { orchestrator } = deps;

	app.get("/api/state", async () => orchestrator.getSnapshot());

	app.get("/api/log", async (request, reply) => {
		const query = logQuerySchema.safeParse(request.query);
		if (!query.success) {
			return sendAppError(reply, invalidRequest(query.error));
		}
		return { entries: orchestrator.getLog(query.data.afterSeq) };
	});

	app.post("/api/environment/refresh", async (_request, reply) => {
		void orchestrator.refreshCapabilities();
		return reply.code(202).send({ refreshing: true });
	});

	app.post("/api/projects", async (request, reply) => {
		const body = createBodySchema.safeParse(request.body);
		if (!body.success) {
			return sendAppError(reply, invalidRequest(body.error));
		}

		orchestrator.setName(body.data.name);
		const flags = body.data.flags ?? {};
		for (const flag of PROJECT_FLAGS) {
			const value = flags[flag];
			if (value !== undefined) {
				orchestrator.setFlag(flag, value);
			}
		}

		const attempt = orchestrator.create();
		if (!attempt.started) {
			return sendAppError(
				reply,
				new AppError("CREATE_REJECTED", attempt.reason),
			);
		}
		return reply.code(202).send({ started: true, request: attempt.request });
	});
}
