import type { ProjectFlag, ProjectRequest } from "./project-types";

/** Fixed emission order keeps logged command lines reproducible. */
const FLAG_ARGUMENTS: ReadonlyArray<readonly [ProjectFlag, string]> = [
	["force", "--force"],
	["createVenv", "--venv"],
	["installPackages", "--install"],
	["refreshTemplates", "--refresh-templates"],
];

/** `[scriptPath, name, ...flags]` for the interpreter invocation. */
export function buildScaffoldArgs(
	scriptPath: string,
	request: ProjectRequest,
): string[] {
	const args = [scriptPath, request.name];
	for (const [flag, argument] of FLAG_ARGUMENTS) {
		if (request.flags[flag]) {
			args.push(argument);
		}
	}
	return args;
}
