// CHANGE: Test helper creating isolated temporary directories with files
// WHY: Config and input loaders are exercised against the real filesystem, not mocks
// REF: REQ-CMDLINE-CONFIG, REQ-CMDLINE-INPUT

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";

/**
 * Result of creating a temporary project.
 *
 * Postconditions:
 * - cwd points to the root directory of the temporary project
 * - cleanup() removes the temporary directory recursively
 */
export interface TempProject {
	readonly cwd: string;
	readonly cleanup: () => void;
}

/**
 * Create a temporary directory holding the given files.
 *
 * @param files Map of relative path → file content
 */
export function createTempProject(
	files: Readonly<Record<string, string>> = {},
): TempProject {
	const cwd = fs.mkdtempSync(path.join(os.tmpdir(), "compiland-cmdline-"));
	for (const [relative, content] of Object.entries(files)) {
		const target = path.join(cwd, relative);
		fs.mkdirSync(path.dirname(target), { recursive: true });
		fs.writeFileSync(target, content, "utf8");
	}
	return {
		cwd,
		cleanup: () => {
			fs.rmSync(cwd, { recursive: true, force: true });
		},
	};
}
