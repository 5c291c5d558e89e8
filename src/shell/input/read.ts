// CHANGE: Read raw command lines from files and standard input
// WHY: Command lines extracted from PDBs are usually dumped one per line
// REF: REQ-CMDLINE-INPUT
// PURITY: SHELL (filesystem and stdin)
// EFFECT: Effect<readonly string[], FSError>
// INVARIANT: Returned lines are non-blank and keep their original text (line terminators removed)
// COMPLEXITY: O(n) where n = input size

import * as fs from "node:fs";
import type { Readable } from "node:stream";
import { text } from "node:stream/consumers";

import { Effect } from "effect";

import { FSError } from "../../core/errors.js";

const errorDetail = (error: unknown): string =>
	error instanceof Error ? error.message : String(error);

/**
 * Splits text into command lines, one per non-blank line.
 *
 * @pure true
 */
export function splitInputLines(content: string): readonly string[] {
	return content.split(/\r?\n/u).filter((line) => line.trim().length > 0);
}

/**
 * Reads command lines from a file.
 *
 * @pure false (reads the filesystem)
 * @effect Effect<readonly string[], FSError>
 */
export function readCommandLinesFromFile(
	filePath: string,
): Effect.Effect<readonly string[], FSError> {
	return Effect.tryPromise({
		try: () => fs.promises.readFile(filePath, "utf8"),
		catch: (error) =>
			new FSError({
				detail: `cannot read input: ${errorDetail(error)}`,
				path: filePath,
			}),
	}).pipe(Effect.map(splitInputLines));
}

/**
 * Reads command lines from a stream, standard input by default.
 *
 * @pure false (consumes the stream)
 * @effect Effect<readonly string[], FSError>
 */
export function readCommandLinesFromStream(
	stream: Readable = process.stdin,
): Effect.Effect<readonly string[], FSError> {
	return Effect.tryPromise({
		try: () => text(stream),
		catch: (error) =>
			new FSError({ detail: `cannot read standard input: ${errorDetail(error)}` }),
	}).pipe(Effect.map(splitInputLines));
}
