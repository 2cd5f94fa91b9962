import type { ModelDef } from "../util/ModelDef";
import { DataTypes, type Sequelize } from "sequelize";

/**
 * A persisted runtime property value. Properties without a row take their default.
 */
export interface RuntimeProperty {
	readonly name: string;
	readonly value: string;
}

const schema = {
	name: {
		type: DataTypes.STRING(255),
		primaryKey: true,
	},
	value: {
		type: DataTypes.TEXT,
		allowNull: false,
	},
};

export function defineRuntimeProperties(sequelize: Sequelize): ModelDef<RuntimeProperty> {
	return sequelize.define("runtime_property", schema, {
		timestamps: false,
	});
}
