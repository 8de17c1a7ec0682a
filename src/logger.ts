import pino, { Logger } from "pino";
import { config } from "./config";

export type { Logger };

export const logger: Logger = pino({
  name: "site-forge",
  level: config.logLevel
});

export const componentLogger = (component: string): Logger => logger.child({ component });
