import { defineWeblogs, type NewWeblog, type Weblog } from "../model/Weblog";
import type { Sequelize } from "sequelize";

/**
 * Weblog DAO
 */
export interface WeblogDao {
	/**
	 * Creates a new weblog.
	 * @param weblog the weblog to create.
	 */
	createWeblog(weblog: NewWeblog): Promise<Weblog>;
	/**
	 * Gets a weblog by id.
	 */
	getWeblog(id: number): Promise<Weblog | undefined>;
	/**
	 * Gets an active weblog by its handle.
	 * @param handle the weblog handle.
	 * @returns the weblog, or undefined if none is active under that handle.
	 */
	getWeblogByHandle(handle: string): Promise<Weblog | undefined>;
	/**
	 * Lists all weblogs, ordered by handle.
	 */
	listWeblogs(): Promise<Array<Weblog>>;
	/**
	 * Switches a weblog to another theme.
	 * @returns the updated weblog, or undefined if no weblog has that handle.
	 */
	updateTheme(handle: string, editorTheme: string): Promise<Weblog | undefined>;
	/**
	 * Deletes a weblog.
	 */
	deleteWeblog(id: number): Promise<void>;
}

export function createWeblogDao(sequelize: Sequelize): WeblogDao {
	const Weblogs = defineWeblogs(sequelize);

	return {
		createWeblog,
		getWeblog,
		getWeblogByHandle,
		listWeblogs,
		updateTheme,
		deleteWeblog,
	};

	async function createWeblog(weblog: NewWeblog): Promise<Weblog> {
		// Cast needed because Sequelize types expect all fields but auto-generated ones are handled by DB
		const created = await Weblogs.create({ locale: null, visible: true, active: true, ...weblog } as Weblog);
		return created.get({ plain: true });
	}

	async function getWeblog(id: number): Promise<Weblog | undefined> {
		const weblog = await Weblogs.findByPk(id);
		return weblog ? weblog.get({ plain: true }) : undefined;
	}

	async function getWeblogByHandle(handle: string): Promise<Weblog | undefined> {
		const weblog = await Weblogs.findOne({ where: { handle, active: true } });
		return weblog ? weblog.get({ plain: true }) : undefined;
	}

	async function listWeblogs(): Promise<Array<Weblog>> {
		const weblogs = await Weblogs.findAll({ order: [["handle", "ASC"]] });
		return weblogs.map(weblog => weblog.get({ plain: true }));
	}

	async function updateTheme(handle: string, editorTheme: string): Promise<Weblog | undefined> {
		const [count] = await Weblogs.update({ editorTheme }, { where: { handle } });
		if (count === 0) {
			return;
		}
		const weblog = await Weblogs.findOne({ where: { handle } });
		return weblog ? weblog.get({ plain: true }) : undefined;
	}

	async function deleteWeblog(id: number): Promise<void> {
		await Weblogs.destroy({ where: { id } });
	}
}
