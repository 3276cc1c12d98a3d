/**
 * Command line argument parsing.
 */

export type OptionValue = string | string[] | boolean;

export interface ParsedArgs {
	command: string;
	args: string[];
	options: Record<string, OptionValue>;
}

/**
 * Convert an option value to a string array.
 * Drops booleans, wraps single strings and splits comma-separated values
 * ("a,b,c" → ["a", "b", "c"]).
 */
export function toStringArray(value: OptionValue | undefined): string[] | undefined {
	if (value === undefined || typeof value === "boolean") return undefined;
	const values = Array.isArray(value) ? value : [value];
	const result = values.flatMap((v) => v.split(",").map((s) => s.trim())).filter(Boolean);
	return result.length > 0 ? result : undefined;
}

/**
 * Last string given for an option, if any.
 */
export function toSingleString(value: OptionValue | undefined): string | undefined {
	if (typeof value === "string") return value;
	if (Array.isArray(value)) return value[value.length - 1];
	return undefined;
}

/**
 * Parse `argv` (as in process.argv: node binary and script first).
 *
 * `--key v1 v2` collects every following non-flag word; `--flag` alone is
 * boolean true. Words before any flag become positional args.
 */
export function parseArgs(argv: string[]): ParsedArgs {
	const args = argv.slice(2);
	const command = args[0] ?? "help";
	const restArgs: string[] = [];
	const options: Record<string, OptionValue> = {};

	for (let i = 1; i < args.length; i++) {
		const arg = args[i];
		if (arg === undefined) continue;

		if (arg.startsWith("-")) {
			const key = arg.replace(/^--?/, "");
			const values: string[] = [];
			while (i + 1 < args.length) {
				const next = args[i + 1];
				if (next === undefined || next.startsWith("-")) break;
				values.push(next);
				i++;
			}
			options[key] = values.length === 0 ? true : values.length === 1 ? (values[0] ?? true) : values;
		} else {
			restArgs.push(arg);
		}
	}

	return { command, args: restArgs, options };
}
