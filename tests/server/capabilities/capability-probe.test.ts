import { describe, expect, it, vi } from "vitest";
import {
	DEFAULT_CAPABILITIES,
	resolveCapabilities,
	VENV_IMPORT_PROBE,
} from "../../../server/capabilities/capability-chains";
import { CapabilityProbe } from "../../../server/capabilities/capability-probe";
import type { SpawnFn } from "../../../server/process/process-types";
import { createScriptedSpawn, FakeChild } from "../../helpers/fake-child";

describe("CapabilityProbe", () => {
	it("stops at the first candidate that succeeds", async () => {
		const spawn = createScriptedSpawn({
			"python --version": 0,
			"python3 --version": 0,
		});
		const probe = new CapabilityProbe({ spawn });

		const result = await probe.probeChain(
			DEFAULT_CAPABILITIES.interpreter.candidates,
		);

		expect(result).toEqual({
			ok: true,
			detectedBy: ["python", "--version"],
			attempts: [{ command: ["python", "--version"], outcome: "succeeded" }],
		});
		expect(spawn).toHaveBeenCalledTimes(1);
	});

	it("falls back to later candidates in order", async () => {
		const spawn = createScriptedSpawn({
			"pip --version": 1,
			"python3 -m pip --version": 0,
		});
		const probe = new CapabilityProbe({ spawn });

		const status = await probe.probe(DEFAULT_CAPABILITIES.packageInstaller);

		expect(status).toEqual({
			state: "available",
			detectedBy: ["python3", "-m", "pip", "--version"],
		});
		expect(spawn.mock.calls.map(([command, args]) => [command, ...args])).toEqual(
			[
				["pip", "--version"],
				["python", "-m", "pip", "--version"],
				["python3", "-m", "pip", "--version"],
			],
		);
	});

	it("reports the remediation hint and every attempt when all candidates fail", async () => {
		const spawn = createScriptedSpawn({ "python3 --version": 9009 });
		const probe = new CapabilityProbe({ spawn });

		const status = await probe.probe(DEFAULT_CAPABILITIES.interpreter);

		expect(status).toEqual({
			state: "unavailable",
			reason: DEFAULT_CAPABILITIES.interpreter.remediation,
			attempts: [
				{
					command: ["python", "--version"],
					outcome: "launch-failed",
					reason: "executable not found",
				},
				{ command: ["python3", "--version"], outcome: "exited", exitCode: 9009 },
			],
		});
	});

	it("launches candidates with their output discarded", async () => {
		const spawn = createScriptedSpawn({ "virtualenv --version": 0 });
		const probe = new CapabilityProbe({ spawn });

		await probe.probe(DEFAULT_CAPABILITIES.venvTool);

		expect(spawn).toHaveBeenCalledWith("virtualenv", ["--version"], {
			captureOutput: false,
		});
	});

	it("accepts the built-in venv module as the last resort", async () => {
		const spawn = createScriptedSpawn({
			[`python3 -c ${VENV_IMPORT_PROBE}`]: 0,
		});
		const probe = new CapabilityProbe({ spawn });

		const status = await probe.probe(DEFAULT_CAPABILITIES.venvTool);

		expect(status).toEqual({
			state: "available",
			detectedBy: ["python3", "-c", VENV_IMPORT_PROBE],
		});
		expect(spawn).toHaveBeenCalledTimes(5);
	});

	it("treats a synchronous spawn failure as a failed candidate", async () => {
		const spawn = vi.fn<SpawnFn>(() => {
			throw new Error("invalid argument");
		});
		const probe = new CapabilityProbe({ spawn });

		const attempt = await probe.runCandidate(["python", "--version"]);

		expect(attempt).toEqual({
			command: ["python", "--version"],
			outcome: "launch-failed",
			reason: "invalid argument",
		});
	});

	it("kills a candidate that does not exit in time", async () => {
		const child = new FakeChild();
		const probe = new CapabilityProbe({
			spawn: () => child,
			timeoutMs: 20,
		});

		const attempt = await probe.runCandidate(["python", "--version"]);

		expect(attempt).toEqual({
			command: ["python", "--version"],
			outcome: "timed-out",
		});
		expect(child.kill).toHaveBeenCalledWith("SIGKILL");
	});

	it("probes all three capabilities", async () => {
		const spawn = createScriptedSpawn({
			"python3 --version": 0,
			"python3 -m pip --version": 0,
		});
		const probe = new CapabilityProbe({ spawn });

		const statuses = await probe.probeAll(DEFAULT_CAPABILITIES);

		expect(statuses.interpreter).toEqual({
			state: "available",
			detectedBy: ["python3", "--version"],
		});
		expect(statuses.packageInstaller).toEqual({
			state: "available",
			detectedBy: ["python3", "-m", "pip", "--version"],
		});
		expect(statuses.venvTool).toMatchObject({
			state: "unavailable",
			reason: DEFAULT_CAPABILITIES.venvTool.remediation,
		});
	});

	it("reports nonexistent executables as unavailable with the real spawner", async () => {
		const probe = new CapabilityProbe({ timeoutMs: 5000 });
		const definitions = resolveCapabilities({
			interpreter: [["scaffold-console-missing-python", "--version"]],
			packageInstaller: [["scaffold-console-missing-pip", "--version"]],
			venvTool: [["scaffold-console-missing-virtualenv", "--version"]],
		});

		const statuses = await probe.probeAll(definitions);

		expect(statuses.interpreter).toEqual({
			state: "unavailable",
			reason: DEFAULT_CAPABILITIES.interpreter.remediation,
			attempts: [
				{
					command: ["scaffold-console-missing-python", "--version"],
					outcome: "launch-failed",
					reason: "executable not found",
				},
			],
		});
		expect(statuses.packageInstaller.state).toBe("unavailable");
		expect(statuses.venvTool.state).toBe("unavailable");
	});

	it("detects the running Node binary as a working candidate", async () => {
		const probe = new CapabilityProbe();

		const result = await probe.probeChain([
			["scaffold-console-missing-tool"],
			[process.execPath, "--version"],
		]);

		expect(result.ok).toBe(true);
		expect(result.attempts.map((attempt) => attempt.outcome)).toEqual([
			"launch-failed",
			"succeeded",
		]);
	});
});
