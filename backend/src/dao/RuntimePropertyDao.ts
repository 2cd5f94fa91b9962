import { defineRuntimeProperties, type RuntimeProperty } from "../model/RuntimeProperty";
import type { Sequelize } from "sequelize";

/**
 * Runtime property DAO.
 */
export interface RuntimePropertyDao {
	/**
	 * Gets every stored property as a name to value map.
	 */
	getProperties(): Promise<Record<string, string>>;
	/**
	 * Inserts or replaces the given properties.
	 */
	saveProperties(properties: Record<string, string>): Promise<void>;
}

export function createRuntimePropertyDao(sequelize: Sequelize): RuntimePropertyDao {
	const RuntimeProperties = defineRuntimeProperties(sequelize);

	return {
		getProperties,
		saveProperties,
	};

	async function getProperties(): Promise<Record<string, string>> {
		const rows = await RuntimeProperties.findAll();
		const properties: Record<string, string> = {};
		for (const row of rows) {
			const { name, value } = row.get({ plain: true });
			properties[name] = value;
		}
		return properties;
	}

	async function saveProperties(properties: Record<string, string>): Promise<void> {
		const rows: Array<RuntimeProperty> = Object.entries(properties).map(([name, value]) => ({ name, value }));
		if (rows.length === 0) {
			return;
		}
		await RuntimeProperties.bulkCreate(rows, { updateOnDuplicate: ["value"] });
	}
}
