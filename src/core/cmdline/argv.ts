// CHANGE: Windows argument splitting for recorded compiler command lines
// WHY: Flag dispatch matches on exact token length, so token boundaries must follow CommandLineToArgvW
// REF: REQ-CMDLINE-TOKENIZE
// SOURCE: https://learn.microsoft.com/windows/win32/api/shellapi/nf-shellapi-commandlinetoargvw
// FORMAT THEOREM: ∀s: splitCommandLine(s) = CommandLineToArgvW(s) for s ≠ "" (program name included)
// PURITY: CORE
// INVARIANT: No token contains an unquoted blank
// COMPLEXITY: O(n) where n = |raw|

const QUOTE = '"';
const BACKSLASH = "\\";

interface Scan {
	readonly value: string;
	readonly next: number;
}

function isBlank(ch: string): boolean {
	return ch === " " || ch === "\t";
}

function skipBlanks(text: string, index: number): number {
	let i = index;
	while (i < text.length && isBlank(text.charAt(i))) {
		i += 1;
	}
	return i;
}

/**
 * Reads argv[0]. The program name has no escape processing: a leading quote
 * runs to the next quote, otherwise the name runs to the next blank.
 *
 * @pure true
 * @complexity O(k) where k = |program name|
 */
function readProgramName(text: string, start: number): Scan {
	if (text.charAt(start) === QUOTE) {
		const close = text.indexOf(QUOTE, start + 1);
		return close === -1
			? { value: text.slice(start + 1), next: text.length }
			: { value: text.slice(start + 1, close), next: close + 1 };
	}

	let i = start;
	while (i < text.length && !isBlank(text.charAt(i))) {
		i += 1;
	}
	return { value: text.slice(start, i), next: i };
}

/**
 * Reads one argument after argv[0].
 *
 * - 2n backslashes + quote → n backslashes, the quote toggles quoting
 * - 2n+1 backslashes + quote → n backslashes and a literal quote
 * - backslashes not followed by a quote are literal
 * - a run of three quotes yields one literal quote; `""` inside quotes closes them
 *
 * @pure true
 * @invariant text.charAt(start) is not blank
 * @complexity O(k) where k = |argument|
 */
function readArgument(text: string, start: number): Scan {
	const out: string[] = [];
	let quotes = 0;
	let backslashes = 0;
	let i = start;

	while (i < text.length) {
		const ch = text.charAt(i);
		if (isBlank(ch) && quotes === 0) {
			break;
		}

		if (ch === BACKSLASH) {
			out.push(ch);
			backslashes += 1;
			i += 1;
			continue;
		}

		if (ch !== QUOTE) {
			out.push(ch);
			backslashes = 0;
			i += 1;
			continue;
		}

		if (backslashes % 2 === 0) {
			out.splice(out.length - backslashes / 2);
			quotes += 1;
		} else {
			out.splice(out.length - (backslashes + 1) / 2);
			out.push(QUOTE);
		}
		backslashes = 0;
		i += 1;

		while (text.charAt(i) === QUOTE) {
			quotes += 1;
			if (quotes === 3) {
				out.push(QUOTE);
				quotes = 0;
			}
			i += 1;
		}
		if (quotes === 2) {
			quotes = 0;
		}
	}

	return { value: out.join(""), next: i };
}

/**
 * Splits a raw command line into arguments the way CommandLineToArgvW does.
 *
 * @param raw Command line as recorded by the compiler driver; absent means empty
 * @returns Ordered arguments, program name first
 *
 * @pure true
 * @invariant splitCommandLine("") = [] (the native API would return the host image path)
 * @invariant a leading blank ends argv[0] at once: splitCommandLine(" -c")[0] === ""
 * @complexity O(n)
 *
 * @example
 * ```ts
 * splitCommandLine('cl.exe /Fo"out dir\\\\" /c');
 * // ["cl.exe", "/Foout dir\\", "/c"]
 * ```
 */
export function splitCommandLine(raw: string | null | undefined): readonly string[] {
	const text = raw ?? "";
	const args: string[] = [];

	if (text.length === 0) {
		return args;
	}

	const program = isBlank(text.charAt(0))
		? { value: "", next: 0 }
		: readProgramName(text, 0);
	args.push(program.value);
	let i = skipBlanks(text, program.next);

	while (i < text.length) {
		const arg = readArgument(text, i);
		args.push(arg.value);
		i = skipBlanks(text, arg.next);
	}

	return args;
}
