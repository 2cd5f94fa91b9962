export { createDatabaseCheck } from "./DatabaseCheck";
export { createDirectoryCheck, type DirectoryCheckOptions } from "./DirectoryCheck";
