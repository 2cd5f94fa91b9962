import "./util/Env";
import { createAndStartServer } from "./AppFactory";
import { reloadConfig } from "./config/Config";

await createAndStartServer(reloadConfig());
