import { describe, expect, it } from "vitest";

import { isCommandLineOption } from "../../../src/core/cmdline/option.js";

describe("isCommandLineOption", () => {
	it("accepts slash and dash introducers", () => {
		expect(isCommandLineOption("/W3")).toBe(true);
		expect(isCommandLineOption("-O2")).toBe(true);
		expect(isCommandLineOption("/")).toBe(true);
	});

	it("rejects positional arguments and empty tokens", () => {
		expect(isCommandLineOption("")).toBe(false);
		expect(isCommandLineOption("cl.exe")).toBe(false);
		expect(isCommandLineOption("W3")).toBe(false);
		expect(isCommandLineOption("C:/src/a.cpp")).toBe(false);
	});
});
