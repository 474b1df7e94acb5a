import {getNodeLogger} from "@zkpig/logger";
import type {Logger} from "@zkpig/utils";
import type {ZkPigConfig} from "../config/types.js";

export const cliLoggerModule = "zkpig";
/** Module of the logger handed to the prover inputs service */
export const serviceLoggerModule = "service";

/**
 * Terminal logger of a command, set up from the resolved configuration
 */
export function getCliLogger(opts: ZkPigConfig["log"], module = cliLoggerModule): Logger {
  return getNodeLogger({level: opts.level, format: opts.format, levelModule: opts.levelModule, module});
}
