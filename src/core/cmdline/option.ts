// CHANGE: Classify command-line tokens as options or positional arguments
// WHY: Only option tokens take part in flag dispatch
// REF: REQ-CMDLINE-CLASSIFY
// PURITY: CORE
// INVARIANT: isCommandLineOption(t) ⇒ t.length ≥ 1
// COMPLEXITY: O(1)

/**
 * Characters the MSVC driver accepts as option introducers.
 */
export const OPTION_PREFIXES: readonly string[] = ["/", "-"];

/**
 * Returns true when the token is a compiler option (`/W4`, `-O2`).
 *
 * @pure true
 * @complexity O(1)
 */
export function isCommandLineOption(token: string): boolean {
	return token.length > 0 && OPTION_PREFIXES.includes(token.charAt(0));
}
