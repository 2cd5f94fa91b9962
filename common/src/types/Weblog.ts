/**
 * Public view of a weblog.
 */
export interface WeblogSummary {
	readonly id: number;
	readonly handle: string;
	readonly name: string;
	/**
	 * Shared theme id, or "custom" for per-weblog templates.
	 */
	readonly editorTheme: string;
	readonly locale: string | null;
}

/**
 * Value types a runtime property can hold.
 */
export type RuntimePropertyType = "boolean" | "integer" | "float" | "string";

/**
 * Definition of an editable runtime property.
 */
export interface RuntimePropertyDef {
	readonly name: string;
	readonly type: RuntimePropertyType;
	readonly defaultValue: string;
}

export interface RuntimePropertyError {
	readonly property: string;
	readonly message: string;
}

/**
 * An uploaded media file as listed by the API.
 */
export interface MediaFileSummary {
	readonly id: string;
	readonly name: string;
	/** Path the file was uploaded under, without a leading slash */
	readonly originalPath: string;
	readonly contentType: string;
	readonly length: number;
	readonly url: string;
	readonly thumbnailUrl?: string | undefined;
}
