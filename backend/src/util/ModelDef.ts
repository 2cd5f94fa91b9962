import type { InferAttributes, Model, ModelStatic } from "sequelize";

/**
 * A row of a model whose attributes are described by the plain interface `T`.
 * `get({ plain: true })` on a row yields a `T`.
 */
export type ModelRow<T> = T & Model<InferAttributes<T & Model>>;

/**
 * The class Sequelize returns from `define()` for a model described by `T`.
 */
export type ModelDef<T> = ModelStatic<ModelRow<T>>;
