/**
 * Database - DAO factory and schema initialization.
 *
 * Models are defined in dependency order (weblogs before media files) so that
 * sync() creates parent tables first.
 *
 * @module Database
 */

import { createMediaFileDao, type MediaFileDao } from "../dao/MediaFileDao";
import { createRuntimePropertyDao, type RuntimePropertyDao } from "../dao/RuntimePropertyDao";
import { createWeblogDao, type WeblogDao } from "../dao/WeblogDao";
import { getLog } from "../util/Logger";
import type { Sequelize } from "sequelize";

const log = getLog(import.meta);

export interface Database {
	readonly sequelize: Sequelize;
	readonly weblogDao: WeblogDao;
	readonly mediaFileDao: MediaFileDao;
	readonly runtimePropertyDao: RuntimePropertyDao;
}

export interface CreateDatabaseOptions {
	/**
	 * Skip sequelize.sync(), for databases whose schema is managed elsewhere.
	 */
	skipSync?: boolean;
}

export async function createDatabase(sequelize: Sequelize, options?: CreateDatabaseOptions): Promise<Database> {
	const weblogDao = createWeblogDao(sequelize);
	const mediaFileDao = createMediaFileDao(sequelize);
	const runtimePropertyDao = createRuntimePropertyDao(sequelize);

	if (options?.skipSync) {
		log.info("Skipping database sync");
	} else {
		await sequelize.sync();
		log.info({ models: Object.keys(sequelize.models) }, "Database models synced");
	}

	return {
		sequelize,
		weblogDao,
		mediaFileDao,
		runtimePropertyDao,
	};
}
