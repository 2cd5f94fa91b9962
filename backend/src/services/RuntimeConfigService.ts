/**
 * Runtime properties: site settings an administrator edits while the server runs.
 *
 * Definitions come from RuntimeConfigDefs.json. Stored values are loaded once and
 * kept in memory, so reads are synchronous after `load()`.
 */

import type { RuntimePropertyDao } from "../dao/RuntimePropertyDao";
import { getLog } from "../util/Logger";
import { readFileSync } from "node:fs";
import type { RuntimePropertyDef, RuntimePropertyError } from "weblogger-common";
import { z } from "zod";

const log = getLog(import.meta);

export const ABSOLUTE_URL_PROPERTY = "site.absoluteurl";

export const COMMENT_PLUGINS_PROPERTY = "users.comments.plugins";

const RuntimePropertyDefsSchema = z.array(
	z.object({
		name: z.string().min(1),
		type: z.enum(["boolean", "integer", "float", "string"]),
		defaultValue: z.string(),
	}),
);

/**
 * Reads and validates the bundled property definitions.
 */
export function loadRuntimePropertyDefs(
	url: URL = new URL("../config/RuntimeConfigDefs.json", import.meta.url),
): Array<RuntimePropertyDef> {
	return RuntimePropertyDefsSchema.parse(JSON.parse(readFileSync(url, "utf-8")));
}

const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const INT_MIN = -2_147_483_648;
const INT_MAX = 2_147_483_647;

export function isIntegerValue(value: string): boolean {
	if (!INTEGER_PATTERN.test(value)) {
		return false;
	}
	const parsed = Number(value);
	return parsed >= INT_MIN && parsed <= INT_MAX;
}

export function isFloatValue(value: string): boolean {
	return FLOAT_PATTERN.test(value.trim());
}

/**
 * Submitted values keyed by property name. An absent key is a field the form did not send.
 */
export type IncomingProperties = Partial<Record<string, string>>;

export type RuntimePropertiesUpdateResult =
	| { readonly status: "saved"; readonly properties: Record<string, string> }
	| { readonly status: "invalid"; readonly errors: Array<RuntimePropertyError> };

export interface RuntimeConfigService {
	readonly defs: ReadonlyArray<RuntimePropertyDef>;
	/**
	 * Loads stored values. Must complete before the getters are used.
	 */
	load(): Promise<void>;
	/**
	 * Every defined property, with defaults filled in for values never stored.
	 */
	getProperties(): Record<string, string>;
	getProperty(name: string): string | undefined;
	/**
	 * Validates and stores a full form submission.
	 *
	 * - boolean: an absent value means false; otherwise only "true" (any case) is true.
	 * - integer and float: an absent value leaves the property unchanged; a value must parse.
	 * - string: trimmed; an absent value is an error, except for the comment plugin list,
	 *   which is taken from `commentPlugins` instead.
	 *
	 * Nothing is stored when any value is invalid.
	 */
	updateProperties(
		incoming: IncomingProperties,
		commentPlugins?: ReadonlyArray<string>,
	): Promise<RuntimePropertiesUpdateResult>;
}

export function createRuntimeConfigService(
	runtimePropertyDao: RuntimePropertyDao,
	defs: ReadonlyArray<RuntimePropertyDef> = loadRuntimePropertyDefs(),
): RuntimeConfigService {
	const defaults = Object.fromEntries(defs.map(def => [def.name, def.defaultValue]));
	let current: Record<string, string> = { ...defaults };

	return {
		defs,
		load,
		getProperties,
		getProperty,
		updateProperties,
	};

	async function load(): Promise<void> {
		const stored = await runtimePropertyDao.getProperties();
		current = { ...defaults };
		for (const def of defs) {
			const value = stored[def.name];
			if (value !== undefined) {
				current[def.name] = value;
			}
		}
		log.info({ stored: Object.keys(stored).length }, "Loaded runtime properties");
	}

	function getProperties(): Record<string, string> {
		return { ...current };
	}

	function getProperty(name: string): string | undefined {
		return current[name];
	}

	async function updateProperties(
		incoming: IncomingProperties,
		commentPlugins: ReadonlyArray<string> = [],
	): Promise<RuntimePropertiesUpdateResult> {
		const updated: Record<string, string> = {};
		const errors: Array<RuntimePropertyError> = [];

		for (const def of defs) {
			const value = incoming[def.name];
			switch (def.type) {
				case "boolean":
					updated[def.name] = String(value?.toLowerCase() === "true");
					break;
				case "integer":
					if (value !== undefined) {
						if (isIntegerValue(value)) {
							updated[def.name] = value;
						} else {
							errors.push({ property: def.name, message: `Not an integer: ${value}` });
						}
					}
					break;
				case "float":
					if (value !== undefined) {
						if (isFloatValue(value)) {
							updated[def.name] = value;
						} else {
							errors.push({ property: def.name, message: `Not a number: ${value}` });
						}
					}
					break;
				case "string":
					if (def.name === COMMENT_PLUGINS_PROPERTY) {
						updated[def.name] = commentPlugins.join(",");
					} else if (value !== undefined) {
						updated[def.name] = value.trim();
					} else {
						errors.push({ property: def.name, message: "Missing value" });
					}
					break;
			}
		}

		if (errors.length > 0) {
			log.warn({ errors }, "Rejected runtime property update");
			return { status: "invalid", errors };
		}

		await runtimePropertyDao.saveProperties(updated);
		current = { ...current, ...updated };
		log.info({ properties: Object.keys(updated) }, "Saved runtime properties");
		return { status: "saved", properties: getProperties() };
	}
}
