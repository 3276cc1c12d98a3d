/**
 * Loads the YAML run configuration (seqmetrics.yaml).
 */

import { readFile } from "node:fs/promises";
import { glob } from "glob";
import { parse } from "yaml";
import { RunConfigSchema, formatZodIssues, type RunConfig } from "./config.ts";
import { ConfigError } from "./errors.ts";

export const DEFAULT_CONFIG_PATTERN = "seqmetrics.{yaml,yml}";

/**
 * Interpolate environment variables in a string.
 * Supports ${VAR} and ${VAR:-default}; unknown variables without a default
 * are left as written.
 */
export function interpolateEnvVars(
	value: string,
	env: NodeJS.ProcessEnv = process.env,
): string {
	return value.replace(
		/\$\{(\w+)(?::-([^}]*))?\}/g,
		(match: string, name: string, defaultValue?: string) => {
			const envVal = env[name];
			if (envVal !== undefined && envVal !== "") {
				return envVal;
			}
			if (defaultValue !== undefined) {
				return defaultValue;
			}
			return match;
		},
	);
}

/**
 * Recursively interpolate environment variables in parsed YAML.
 */
function interpolateEnvVarsInObject(obj: unknown, env: NodeJS.ProcessEnv): unknown {
	if (typeof obj === "string") {
		return interpolateEnvVars(obj, env);
	}
	if (Array.isArray(obj)) {
		return obj.map((item) => interpolateEnvVarsInObject(item, env));
	}
	if (obj !== null && typeof obj === "object") {
		const result: Record<string, unknown> = {};
		for (const [key, value] of Object.entries(obj)) {
			result[key] = interpolateEnvVarsInObject(value, env);
		}
		return result;
	}
	return obj;
}

/**
 * Parse and validate YAML text. An empty document yields the defaults.
 * @throws ConfigError on YAML syntax errors or schema violations
 */
export function parseRunConfig(
	content: string,
	filePath = "<inline>",
	env: NodeJS.ProcessEnv = process.env,
): RunConfig {
	let raw: unknown;
	try {
		raw = parse(content);
	} catch (error) {
		const reason = error instanceof Error ? error.message : String(error);
		throw new ConfigError(`Failed to parse YAML in ${filePath}: ${reason}`, filePath);
	}

	const parsed = RunConfigSchema.safeParse(interpolateEnvVarsInObject(raw ?? {}, env));
	if (!parsed.success) {
		throw new ConfigError(
			`Validation failed for ${filePath}:\n${formatZodIssues(parsed.error)}`,
			filePath,
		);
	}
	return parsed.data;
}

/**
 * Read and validate a config file.
 */
export async function loadRunConfig(filePath: string): Promise<RunConfig> {
	let content: string;
	try {
		content = await readFile(filePath, "utf8");
	} catch (error) {
		const reason = error instanceof Error ? error.message : String(error);
		throw new ConfigError(`Cannot read config file ${filePath}: ${reason}`, filePath);
	}
	return parseRunConfig(content, filePath);
}

/**
 * Find seqmetrics.yaml / seqmetrics.yml in a directory.
 */
export async function findRunConfig(basePath = "."): Promise<string | undefined> {
	const files = await glob(DEFAULT_CONFIG_PATTERN, { cwd: basePath, absolute: true, nodir: true });
	return files.sort()[0];
}
