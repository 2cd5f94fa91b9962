/**
 * Server-only exports from weblogger-common.
 * The logger writes to Node.js streams and files, so browser code should not import it.
 *
 * Usage: import { ... } from "weblogger-common/server"
 */
export * from "./util/LoggerCommon";
