import type { ModelDef } from "../util/ModelDef";
import { DataTypes, type Sequelize } from "sequelize";

/**
 * Metadata of a file uploaded to a weblog. The bytes live in media file storage under `id`.
 */
export interface MediaFile {
	readonly id: string;
	readonly weblogId: number;
	readonly name: string;
	/** Path the file was uploaded under, without a leading slash, e.g. "images/logo.png" */
	readonly originalPath: string;
	readonly contentType: string;
	readonly length: number;
	readonly hasThumbnail: boolean;
	readonly createdAt: Date;
	readonly updatedAt: Date;
}

export type NewMediaFile = Omit<MediaFile, "createdAt" | "updatedAt" | "hasThumbnail"> & {
	hasThumbnail?: boolean;
};

const schema = {
	id: {
		type: DataTypes.UUID,
		primaryKey: true,
	},
	weblogId: {
		type: DataTypes.INTEGER,
		allowNull: false,
		references: {
			model: "weblogs",
			key: "id",
		},
		onDelete: "CASCADE",
	},
	name: {
		type: DataTypes.STRING,
		allowNull: false,
	},
	originalPath: {
		type: DataTypes.STRING(1024),
		allowNull: false,
	},
	contentType: {
		type: DataTypes.STRING,
		allowNull: false,
	},
	length: {
		type: DataTypes.INTEGER,
		allowNull: false,
	},
	hasThumbnail: {
		type: DataTypes.BOOLEAN,
		allowNull: false,
		defaultValue: false,
	},
};

const indexes = [
	{
		unique: true,
		fields: ["weblog_id", "original_path"],
	},
];

export function defineMediaFiles(sequelize: Sequelize): ModelDef<MediaFile> {
	return sequelize.define("media_file", schema, {
		timestamps: true,
		indexes,
	});
}
