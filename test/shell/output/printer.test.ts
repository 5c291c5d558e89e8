// CHANGE: Unit tests for console printing of resolved settings
// WHY: JSON mode must emit one parseable document; errors go to stderr only
// REF: REQ-CMDLINE-OUTPUT
// PURITY: SHELL - tests Effect-based I/O functions with spied console
// COMPLEXITY: O(n) where n = |results|

import { Effect } from "effect";
import { afterEach, describe, expect, it, vi } from "vitest";

import { parseCompilerCommandLine } from "../../../src/core/cmdline/resolver.js";
import { FSError } from "../../../src/core/errors.js";
import {
	printError,
	printResults,
	printUsage,
} from "../../../src/shell/output/printer.js";

afterEach(() => {
	vi.restoreAllMocks();
});

describe("printResults", () => {
	it("separates text blocks with a blank line", () => {
		const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
		const results = [
			parseCompilerCommandLine("cl /W1"),
			parseCompilerCommandLine("cl /W2"),
		];
		Effect.runSync(printResults(results, "text", []));
		expect(log).toHaveBeenCalledTimes(1);
		const text = String(log.mock.calls[0]?.[0]);
		expect(text.split("\n\n")).toHaveLength(2);
		expect(text.split("\n\n")[1]?.split("\n")[0]).toBe("command line: cl /W2");
	});

	it("prints a JSON array even for one result", () => {
		const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
		Effect.runSync(
			printResults([parseCompilerCommandLine("cl /wd4996")], "json", [4996]),
		);
		const parsed: unknown = JSON.parse(String(log.mock.calls[0]?.[0]));
		expect(parsed).toEqual([
			{
				raw: "cl /wd4996",
				warningLevel: 0,
				warningsAsErrors: false,
				optimizationsEnabled: false,
				usesDebugCRuntime: false,
				eliminateDuplicateStringsEnabled: false,
				wholeProgramOptimizationEnabled: false,
				warningsExplicitlyDisabled: [4996],
				watched: { C4996: true },
			},
		]);
	});
});

describe("printError / printUsage", () => {
	it("writes errors to stderr with a prefix", () => {
		const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
		Effect.runSync(printError(new FSError({ detail: "boom", path: "x.txt" })));
		expect(error).toHaveBeenCalledWith("Error: boom (x.txt)");
	});

	it("writes usage to stdout", () => {
		const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
		Effect.runSync(printUsage("usage text"));
		expect(log).toHaveBeenCalledWith("usage text");
	});
});
