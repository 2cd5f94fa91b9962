import type { ModelDef } from "../util/ModelDef";
import { DataTypes, type Sequelize } from "sequelize";

/**
 * A weblog, addressed in URLs by its handle.
 */
export interface Weblog {
	readonly id: number;
	readonly handle: string;
	readonly name: string;
	/** Shared theme id, or "custom" when the weblog edits its own templates */
	readonly editorTheme: string;
	/** Default locale, e.g. "en_US" */
	readonly locale: string | null;
	readonly visible: boolean;
	readonly active: boolean;
	readonly createdAt: Date;
	readonly updatedAt: Date;
}

export type NewWeblog = Pick<Weblog, "handle" | "name" | "editorTheme"> &
	Partial<Pick<Weblog, "locale" | "visible" | "active">>;

const schema = {
	id: {
		type: DataTypes.INTEGER,
		autoIncrement: true,
		primaryKey: true,
	},
	handle: {
		type: DataTypes.STRING(64),
		allowNull: false,
		unique: "weblogs_handle_key",
	},
	name: {
		type: DataTypes.STRING,
		allowNull: false,
	},
	editorTheme: {
		type: DataTypes.STRING,
		allowNull: false,
	},
	locale: {
		type: DataTypes.STRING(20),
		allowNull: true,
	},
	visible: {
		type: DataTypes.BOOLEAN,
		allowNull: false,
		defaultValue: true,
	},
	active: {
		type: DataTypes.BOOLEAN,
		allowNull: false,
		defaultValue: true,
	},
};

export function defineWeblogs(sequelize: Sequelize): ModelDef<Weblog> {
	return sequelize.define("weblog", schema, {
		timestamps: true,
	});
}
