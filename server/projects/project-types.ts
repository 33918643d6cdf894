/**
 * Options forwarded to the scaffolding script.
 *
 * Used by: orchestrator, scaffold-args, websocket handler, REST routes
 */
export interface ProjectFlags {
	/** --venv */
	createVenv: boolean;
	/** --install */
	installPackages: boolean;
	/** --refresh-templates */
	refreshTemplates: boolean;
	/** --force: fill in an existing, non-empty directory */
	force: boolean;
}

export type ProjectFlag = keyof ProjectFlags;

export const PROJECT_FLAGS = [
	"createVenv",
	"installPackages",
	"refreshTemplates",
	"force",
] as const satisfies readonly ProjectFlag[];

/** What the user has entered so far. */
export interface ProjectRequest {
	/** Raw input; validated separately */
	name: string;
	flags: ProjectFlags;
}

export function createEmptyRequest(): ProjectRequest {
	return {
		name: "",
		flags: {
			createVenv: false,
			installPackages: false,
			refreshTemplates: false,
			force: false,
		},
	};
}

export function copyRequest(request: ProjectRequest): ProjectRequest {
	return { name: request.name, flags: { ...request.flags } };
}
