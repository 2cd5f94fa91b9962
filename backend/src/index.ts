export * from "./AppFactory";
export * from "./core/Database";
export * from "./util/Sequelize";
