import { z } from "zod";
import type { ClientMessage } from "../../shared/types";
import { PROJECT_FLAGS } from "../projects/project-types";

const requestIdSchema = z.string().optional();

export const clientMessageSchema = z.discriminatedUnion("type", [
	z.object({ type: z.literal("state:get"), requestId: requestIdSchema }),
	z.object({
		type: z.literal("log:get"),
		requestId: requestIdSchema,
		afterSeq: z.number().int().nonnegative().optional(),
	}),
	z.object({
		type: z.literal("form:name"),
		requestId: requestIdSchema,
		name: z.string(),
	}),
	z.object({
		type: z.literal("form:flag"),
		requestId: requestIdSchema,
		flag: z.enum(PROJECT_FLAGS),
		value: z.boolean(),
	}),
	z.object({
		type: z.literal("environment:refresh"),
		requestId: requestIdSchema,
	}),
	z.object({ type: z.literal("project:create"), requestId: requestIdSchema }),
]);

export function parseClientMessage(value: unknown): ClientMessage | null {
	const result = clientMessageSchema.safeParse(value);
	return result.success ? result.data : null;
}
