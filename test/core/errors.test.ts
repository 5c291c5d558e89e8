import { describe, expect, it } from "vitest";

import {
	ConfigError,
	describeAppError,
	FSError,
	UsageError,
} from "../../src/core/errors.js";

describe("describeAppError", () => {
	it("renders each error variant on one line", () => {
		expect(describeAppError(new UsageError({ detail: "unknown option: --x" }))).toBe(
			"unknown option: --x",
		);
		expect(describeAppError(new FSError({ detail: "cannot read input" }))).toBe(
			"cannot read input",
		);
		expect(
			describeAppError(new FSError({ detail: "cannot read input", path: "a.txt" })),
		).toBe("cannot read input (a.txt)");
		expect(
			describeAppError(
				new ConfigError({ path: "cmdline.config.json", detail: "watch must be an array" }),
			),
		).toBe("invalid config cmdline.config.json: watch must be an array");
	});

	it("discriminates errors by _tag", () => {
		expect(new UsageError({ detail: "x" })._tag).toBe("UsageError");
		expect(new FSError({ detail: "x" })._tag).toBe("FS");
		expect(new ConfigError({ path: "p", detail: "x" })._tag).toBe("ConfigError");
	});
});
