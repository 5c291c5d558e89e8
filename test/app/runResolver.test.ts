// CHANGE: End-to-end specs for the APP layer with in-process stdin and temp files
// WHY: APP must map every failure to exit code 1 and print exactly one document on success
// REF: REQ-CMDLINE-CLI

import { Readable } from "node:stream";

import { afterEach, beforeEach, describe, expect, it, type MockInstance, vi } from "vitest";

import { type ResolverEnv, runResolver } from "../../src/app/runResolver.js";
import { USAGE } from "../../src/shell/config/index.js";
import { createTempProject, type TempProject } from "../utils/tempProject.js";

let logSpy: MockInstance<typeof console.log>;
let errorSpy: MockInstance<typeof console.error>;
let project: TempProject;

const envFor = (stdinLines: readonly string[] = []): ResolverEnv => ({
	cwd: project.cwd,
	stdin: Readable.from(stdinLines),
});

const logged = (): string =>
	logSpy.mock.calls.map((call) => call.map(String).join(" ")).join("\n");

const errored = (): string =>
	errorSpy.mock.calls.map((call) => call.map(String).join(" ")).join("\n");

beforeEach(() => {
	logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);
	errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);
	project = createTempProject({
		"cmdlines.txt": "cl.exe /c /W3 /wd4996 /wd4100\ncl.exe /O2 /MDd /GL\n",
	});
});

afterEach(() => {
	vi.restoreAllMocks();
	project.cleanup();
});

describe("runResolver: success", () => {
	it("prints a text summary for a positional command line", async () => {
		const code = await runResolver(
			["cl.exe /Wall /WX-", "--watch", "C4996"],
			envFor(),
		);
		expect(code).toBe(0);
		expect(logged()).toBe(
			[
				"command line: cl.exe /Wall /WX-",
				"warning level: 4",
				"warnings as errors: no",
				"optimizations: no",
				"debug C runtime: no",
				"eliminate duplicate strings: no",
				"whole program optimization: no",
				"disabled warnings: none",
				"C4996: not disabled",
			].join("\n"),
		);
		expect(errorSpy).not.toHaveBeenCalled();
	});

	it("prints one JSON array for file and stdin inputs", async () => {
		const code = await runResolver(
			["--file", "cmdlines.txt", "--stdin", "--json"],
			envFor(["cl /W1 /w14265 /wd4265\n"]),
		);
		expect(code).toBe(0);
		expect(logSpy).toHaveBeenCalledTimes(1);
		const parsed: Array<{ raw: string; warningsExplicitlyDisabled: number[] }> =
			JSON.parse(logged());
		expect(parsed.map((r) => r.raw)).toEqual([
			"cl.exe /c /W3 /wd4996 /wd4100",
			"cl.exe /O2 /MDd /GL",
			"cl /W1 /w14265 /wd4265",
		]);
		expect(parsed.map((r) => r.warningsExplicitlyDisabled)).toEqual([
			[4100, 4996],
			[],
			[4265],
		]);
	});

	it("takes format and watch list from the config file", async () => {
		const t = createTempProject({
			"cmdline.config.json": JSON.stringify({ format: "json", watch: [4100] }),
		});
		try {
			const code = await runResolver(["cl /wd4100", "--watch", "4996"], {
				cwd: t.cwd,
				stdin: Readable.from([]),
			});
			expect(code).toBe(0);
			const parsed: Array<{ watched: Record<string, boolean> }> = JSON.parse(
				logged(),
			);
			expect(parsed[0]?.watched).toEqual({ C4100: true, C4996: false });
		} finally {
			t.cleanup();
		}
	});

	it("prints usage for --help without reading input", async () => {
		const code = await runResolver(["--help", "--file", "missing.txt"], envFor());
		expect(code).toBe(0);
		expect(logged()).toBe(USAGE);
	});
});

describe("runResolver: failures", () => {
	it("reports an unknown option", async () => {
		const code = await runResolver(["--nope"], envFor());
		expect(code).toBe(1);
		expect(errored()).toBe("Error: unknown option: --nope");
		expect(logSpy).not.toHaveBeenCalled();
	});

	it("reports missing input", async () => {
		const code = await runResolver([], envFor());
		expect(code).toBe(1);
		expect(errored()).toBe("Error: no command line given (see --help)");
	});

	it("reports an unreadable input file", async () => {
		const code = await runResolver(["--file", "missing.txt"], envFor());
		expect(code).toBe(1);
		expect(errored().startsWith("Error: cannot read input:")).toBe(true);
		expect(errored().endsWith(`(${project.cwd}/missing.txt)`)).toBe(true);
	});

	it("reports an invalid config file", async () => {
		const t = createTempProject({ "cmdline.config.json": "[]" });
		try {
			const code = await runResolver(["cl /W3"], {
				cwd: t.cwd,
				stdin: Readable.from([]),
			});
			expect(code).toBe(1);
			expect(errored()).toBe(
				`Error: invalid config ${t.cwd}/cmdline.config.json: expected a JSON object`,
			);
		} finally {
			t.cleanup();
		}
	});
});
