/**
 * base/sysinit
 *
 * Reads the TOML configuration the kernel boots with.
 */

import * as TOML from "@ltd/j-toml";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { Err, Ok, Result } from "libsys/result";
import { z } from "zod";
import { levelNames } from "../../kernel/printk";

export const defaultConfigPath = fileURLToPath(new URL("../../../config/sysfs.toml", import.meta.url));

const configSchema = z.object({
	kset: z.object({
		name: z.string().min(1).regex(/^[^/]+$/, "must not contain '/'").default('btrfs'),
		mountpoint: z.string().startsWith('/', "must be absolute").default('/sys/fs/btrfs'),
	}).default({}),
	log: z.object({
		level: z.enum(levelNames).default('info'),
		color: z.boolean().default(true),
	}).default({}),
	device: z.array(z.object({
		label: z.string().min(1),
	})).default([]),
});

export type Config = z.infer<typeof configSchema>;

export namespace error {
	export class ConfigError extends Error {
		name: string = 'ConfigError';
		constructor(readonly issues: ReadonlyArray<string>, cause?: unknown) {
			super(`Invalid configuration: ${issues.join('; ')}`, { cause });
		}
	}
}

export function parseConfig(text: string): Result<Config, error.ConfigError> {
	let table: unknown;
	try {
		table = TOML.parse(text, 1.0, '\n', false);
	} catch (e) {
		return Err(new error.ConfigError([e instanceof Error ? e.message : String(e)], e));
	}

	const parsed = configSchema.safeParse(table);
	if (!parsed.success)
		return Err(new error.ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)));

	const labels = new Set<string>();
	for (const device of parsed.data.device) {
		if (labels.has(device.label))
			return Err(new error.ConfigError([`device.label: '${device.label}' is listed twice`]));
		labels.add(device.label);
	}

	return Ok(parsed.data);
}

export function loadConfig(file: string = defaultConfigPath): Result<Config, error.ConfigError> {
	let text: string;
	try {
		text = readFileSync(file, 'utf8');
	} catch (e) {
		return Err(new error.ConfigError([`cannot read '${file}'`], e));
	}

	return parseConfig(text);
}
