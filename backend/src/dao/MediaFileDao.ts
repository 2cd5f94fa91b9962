import { defineMediaFiles, type MediaFile, type NewMediaFile } from "../model/MediaFile";
import type { Sequelize } from "sequelize";

/**
 * Media file metadata DAO.
 */
export interface MediaFileDao {
	createMediaFile(mediaFile: NewMediaFile): Promise<MediaFile>;
	getMediaFile(id: string): Promise<MediaFile | undefined>;
	/**
	 * Finds the file a weblog uploaded under the given path.
	 * @param originalPath path without a leading slash.
	 */
	getMediaFileByOriginalPath(weblogId: number, originalPath: string): Promise<MediaFile | undefined>;
	listMediaFiles(weblogId: number): Promise<Array<MediaFile>>;
	/**
	 * Records that a thumbnail was stored for the file.
	 * @returns false if no file has that id.
	 */
	setHasThumbnail(id: string): Promise<boolean>;
	/**
	 * @returns true if a file was deleted.
	 */
	deleteMediaFile(id: string): Promise<boolean>;
}

export function createMediaFileDao(sequelize: Sequelize): MediaFileDao {
	const MediaFiles = defineMediaFiles(sequelize);

	return {
		createMediaFile,
		getMediaFile,
		getMediaFileByOriginalPath,
		listMediaFiles,
		setHasThumbnail,
		deleteMediaFile,
	};

	async function createMediaFile(mediaFile: NewMediaFile): Promise<MediaFile> {
		// Cast needed because Sequelize types expect all fields but timestamps are handled by DB
		const created = await MediaFiles.create({ hasThumbnail: false, ...mediaFile } as MediaFile);
		return created.get({ plain: true });
	}

	async function getMediaFile(id: string): Promise<MediaFile | undefined> {
		const mediaFile = await MediaFiles.findByPk(id);
		return mediaFile ? mediaFile.get({ plain: true }) : undefined;
	}

	async function getMediaFileByOriginalPath(weblogId: number, originalPath: string): Promise<MediaFile | undefined> {
		const mediaFile = await MediaFiles.findOne({ where: { weblogId, originalPath } });
		return mediaFile ? mediaFile.get({ plain: true }) : undefined;
	}

	async function listMediaFiles(weblogId: number): Promise<Array<MediaFile>> {
		const mediaFiles = await MediaFiles.findAll({ where: { weblogId }, order: [["originalPath", "ASC"]] });
		return mediaFiles.map(mediaFile => mediaFile.get({ plain: true }));
	}

	async function setHasThumbnail(id: string): Promise<boolean> {
		const [count] = await MediaFiles.update({ hasThumbnail: true }, { where: { id } });
		return count > 0;
	}

	async function deleteMediaFile(id: string): Promise<boolean> {
		const count = await MediaFiles.destroy({ where: { id } });
		return count > 0;
	}
}
