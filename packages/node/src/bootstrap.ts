/**
 * Bootstrap: config, logger and service in one call.
 */

import type { DestinationStream } from "pino";
import { loadConfig } from "./config.js";
import type { AppConfig } from "./config.js";
import { createLogger } from "./logger.js";
import type { Logger } from "./logger.js";
import { ShareportService } from "./services/shareport-service.js";

export interface Shareport {
  readonly config: AppConfig;
  readonly logger: Logger;
  readonly service: ShareportService;
}

export function bootstrap(
  env: Record<string, string | undefined> = process.env,
  destination?: DestinationStream,
): Shareport {
  const config = loadConfig(env);
  const logger = createLogger(config, destination);
  const service = new ShareportService(config, logger);
  return { config, logger, service };
}
