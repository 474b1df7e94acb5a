import type {Logger} from "@zkpig/utils";
import type {ProverInputsServiceFactory} from "../service/interface.js";

export type OutputStream = {write(chunk: string): unknown};

/**
 * What commands get from the program embedding the CLI
 */
export type CommandEnv = {
  createService: ProverInputsServiceFactory;
  /** Signal of the invocation, passed to every service call */
  signal: AbortSignal;
  /** Where the `config` command prints */
  stdout: OutputStream;
  /** Overrides the terminal loggers of the command and of the service, built from the resolved configuration */
  logger?: Logger;
};
