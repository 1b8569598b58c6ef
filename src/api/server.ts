import "dotenv/config";
import { createApp } from "./app";
import { loadToolConfig } from "../config/tool.config";
import { logger } from "../utils/logger";

const config = loadToolConfig();
const port = config.platform.port;

createApp(config).listen(port, () => logger.info(`Platform API listening on :${port}`));
