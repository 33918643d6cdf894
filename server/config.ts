import { readFile } from "node:fs/promises";
import { homedir } from "node:os";
import { isAbsolute, join, resolve } from "node:path";
import { z } from "zod";
import {
	type CandidateOverrides,
	resolveCapabilities,
} from "./capabilities/capability-chains";
import type { CapabilityDefinitions } from "./capabilities/capability-types";
import { AppError } from "./errors";

export const DEFAULT_SCRIPT_NAME = "create_project.py";
export const CONFIG_FILE_ENV = "SCAFFOLD_CONSOLE_CONFIG";
export const DEFAULT_CONFIG_FILE = join(
	homedir(),
	".scaffold-console",
	"config.json",
);

const candidateCommandSchema = z
	.tuple([z.string().min(1)])
	.rest(z.string());

const candidateChainSchema = z.array(candidateCommandSchema).min(1);

export const fileConfigSchema = z
	.object({
		port: z.number().int().min(0).max(65535),
		host: z.string().min(1),
		scriptPath: z.string().min(1),
		workingDir: z.string().min(1),
		interpreter: z.string().min(1),
		probeTimeoutMs: z.number().int().positive(),
		shutdownTimeoutMs: z.number().int().positive(),
		capabilities: z
			.object({
				interpreter: candidateChainSchema,
				packageInstaller: candidateChainSchema,
				venvTool: candidateChainSchema,
			})
			.partial()
			.strict(),
	})
	.partial()
	.strict();

type FileConfig = z.infer<typeof fileConfigSchema>;

const portSchema = z.coerce.number().int().min(0).max(65535);

export interface AppConfig {
	port: number;
	host: string;
	/** Absolute */
	scriptPath: string;
	/** Absolute */
	workingDir: string;
	interpreter?: string;
	probeTimeoutMs: number;
	shutdownTimeoutMs: number;
	capabilities: CapabilityDefinitions;
}

export interface LoadConfigOptions {
	env?: NodeJS.ProcessEnv;
	cwd?: string;
	readText?: (filePath: string) => Promise<string>;
}

function isMissingFile(error: unknown): boolean {
	return (
		error instanceof Error &&
		"code" in error &&
		(error.code === "ENOENT" || error.code === "ENOTDIR")
	);
}

function describeIssues(error: z.ZodError): string {
	return error.issues
		.map((issue) => {
			const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
			return `${path}: ${issue.message}`;
		})
		.join("; ");
}

async function readConfigFile(
	filePath: string,
	required: boolean,
	readText: (filePath: string) => Promise<string>,
): Promise<FileConfig> {
	let raw: string;
	try {
		raw = await readText(filePath);
	} catch (error: unknown) {
		if (!required && isMissingFile(error)) {
			return {};
		}
		throw new AppError(
			"INVALID_CONFIG",
			`Cannot read config file ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
		);
	}

	let parsed: unknown;
	try {
		parsed = JSON.parse(raw);
	} catch {
		throw new AppError("INVALID_CONFIG", `Config file ${filePath} is not valid JSON`);
	}

	const result = fileConfigSchema.safeParse(parsed);
	if (!result.success) {
		throw new AppError(
			"INVALID_CONFIG",
			`Invalid config file ${filePath}: ${describeIssues(result.error)}`,
		);
	}
	return result.data;
}

function parsePort(value: string): number {
	const result = portSchema.safeParse(value);
	if (!result.success) {
		throw new AppError("INVALID_CONFIG", `PORT must be a port number, got "${value}"`);
	}
	return result.data;
}

/**
 * Defaults, then the JSON config file, then environment variables.
 * Relative paths resolve against the working directory.
 */
export async function loadConfig(
	options: LoadConfigOptions = {},
): Promise<AppConfig> {
	const env = options.env ?? process.env;
	const cwd = options.cwd ?? process.cwd();
	const readText =
		options.readText ?? ((filePath: string) => readFile(filePath, "utf-8"));

	const explicitFile = env[CONFIG_FILE_ENV];
	const file = await readConfigFile(
		explicitFile ? resolve(cwd, explicitFile) : DEFAULT_CONFIG_FILE,
		Boolean(explicitFile),
		readText,
	);

	const workingDir = resolve(cwd, env.SCAFFOLD_WORKDIR ?? file.workingDir ?? ".");
	const scriptPath =
		env.SCAFFOLD_SCRIPT ?? file.scriptPath ?? DEFAULT_SCRIPT_NAME;
	const interpreter = env.SCAFFOLD_INTERPRETER ?? file.interpreter;
	const overrides: CandidateOverrides = file.capabilities ?? {};

	return {
		port: env.PORT ? parsePort(env.PORT) : (file.port ?? 3000),
		host: env.HOST ?? file.host ?? "127.0.0.1",
		scriptPath: isAbsolute(scriptPath)
			? scriptPath
			: resolve(workingDir, scriptPath),
		workingDir,
		...(interpreter ? { interpreter } : {}),
		probeTimeoutMs: file.probeTimeoutMs ?? 10000,
		shutdownTimeoutMs: file.shutdownTimeoutMs ?? 5000,
		capabilities: resolveCapabilities(overrides),
	};
}
