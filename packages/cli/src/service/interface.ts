import type {Logger} from "@zkpig/utils";
import type {ZkPigConfig} from "../config/types.js";
import type {BlockNumber} from "../util/blockNumber.js";

/**
 * Long-lived service generating prover inputs. One instance is created, started and
 * stopped by each command invocation. `signal` is the signal of the invocation and is
 * aborted when the process is asked to shut down.
 */
export interface ProverInputsService {
  start(signal: AbortSignal): Promise<void>;
  stop(signal: AbortSignal): Promise<void>;
  /** Runs preflight, prepare and execute for one block */
  generate(blockNumber: BlockNumber, signal: AbortSignal): Promise<void>;
  /** Collects the data needed to generate prover inputs from a remote node */
  preflight(blockNumber: BlockNumber, signal: AbortSignal): Promise<void>;
  /** Builds prover inputs from data previously collected during preflight */
  prepare(blockNumber: BlockNumber, signal: AbortSignal): Promise<void>;
  /** Executes the block against prover inputs previously built during prepare */
  execute(blockNumber: BlockNumber, signal: AbortSignal): Promise<void>;
}

/**
 * Build a service from the resolved configuration. Throws if the configuration is not usable
 * to create one, e.g. a malformed node URL.
 */
export type ProverInputsServiceFactory = (
  config: Readonly<ZkPigConfig>,
  logger: Logger
) => ProverInputsService | Promise<ProverInputsService>;
