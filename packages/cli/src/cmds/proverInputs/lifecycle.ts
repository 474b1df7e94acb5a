import {Logger} from "@zkpig/utils";
import {ZkPigConfig, resolveConfig} from "../../config/index.js";
import {GlobalArgs} from "../../options/index.js";
import {ProverInputsService} from "../../service/interface.js";
import {BlockNumber, blockNumberToString, parseBlockNumberArg} from "../../util/blockNumber.js";
import {CommandError, CommandErrorCode, toCommandError, wrapCommandError} from "../../util/errors.js";
import {getCliLogger, serviceLoggerModule} from "../../util/logger.js";
import {validateS3Config} from "../../util/s3.js";
import {CommandEnv} from "../types.js";
import {BlockNumberArgs} from "./options.js";

export enum ProverInputsStage {
  generate = "generate",
  preflight = "preflight",
  prepare = "prepare",
  execute = "execute",
}

type StageOperation = (service: ProverInputsService, blockNumber: BlockNumber, signal: AbortSignal) => Promise<void>;

const stageOperations: Record<ProverInputsStage, StageOperation> = {
  [ProverInputsStage.generate]: (service, blockNumber, signal) => service.generate(blockNumber, signal),
  [ProverInputsStage.preflight]: (service, blockNumber, signal) => service.preflight(blockNumber, signal),
  [ProverInputsStage.prepare]: (service, blockNumber, signal) => service.prepare(blockNumber, signal),
  [ProverInputsStage.execute]: (service, blockNumber, signal) => service.execute(blockNumber, signal),
};

/**
 * State of one command invocation. Built by the setup phase, read by the run phase.
 */
export type ProverInputsContext = {
  readonly config: Readonly<ZkPigConfig>;
  readonly service: ProverInputsService;
  readonly blockNumber: BlockNumber;
  readonly logger: Logger;
};

/**
 * Setup phase: resolve configuration, create and start the service, parse the block number
 * and validate the S3 group, in this order. Stops at the first failure.
 *
 * The block number is only parsed once the service has started. A malformed block number
 * thus still costs a service start, and the started service is not stopped.
 */
export async function setupProverInputsContext(
  args: GlobalArgs & BlockNumberArgs,
  env: CommandEnv
): Promise<ProverInputsContext> {
  const config = resolveConfig(args);
  const logger = env.logger ?? getCliLogger(config.log);
  const serviceLogger = env.logger ?? getCliLogger(config.log, serviceLoggerModule);

  const service = await wrapCommandError(
    {code: CommandErrorCode.SERVICE_CREATE_FAILED},
    "failed to create prover inputs service",
    () => env.createService(config, serviceLogger)
  );

  logger.info("Starting prover inputs service", {chainId: config.chain.id, rpcUrl: config.chain.rpcUrl});
  await wrapCommandError({code: CommandErrorCode.SERVICE_START_FAILED}, "failed to start prover inputs service", () =>
    service.start(env.signal)
  );

  const blockNumber = await wrapCommandError(
    {code: CommandErrorCode.INVALID_BLOCK_NUMBER, blockNumber: args.blockNumber},
    "invalid block number",
    () => parseBlockNumberArg(args.blockNumber)
  );

  validateS3Config(config.store.s3);

  return {config, service, blockNumber, logger};
}

/**
 * Run one stage of the prover inputs pipeline for the block given in `args`.
 *
 * The service is stopped once setup succeeded, whatever the outcome of the stage.
 * If both the stage and the stop fail, the stage error is thrown and the stop error logged.
 */
export async function runProverInputsCommand(
  stage: ProverInputsStage,
  args: GlobalArgs & BlockNumberArgs,
  env: CommandEnv
): Promise<void> {
  const {service, blockNumber, logger} = await setupProverInputsContext(args, env);
  const block = blockNumberToString(blockNumber);

  let runError: CommandError | null = null;
  try {
    logger.info(`Running ${stage}`, {block});
    await stageOperations[stage](service, blockNumber, env.signal);
    logger.info(`${stage} completed`, {block});
  } catch (e) {
    runError = toCommandError(
      {code: CommandErrorCode.RUN_FAILED, stage, blockNumber: block},
      `${stage} failed for block ${block}`,
      e
    );
  }

  let stopError: CommandError | null = null;
  try {
    logger.debug("Stopping prover inputs service");
    await service.stop(env.signal);
  } catch (e) {
    stopError = toCommandError({code: CommandErrorCode.SERVICE_STOP_FAILED}, "failed to stop prover inputs service", e);
  }

  if (runError !== null) {
    if (stopError !== null) logger.error("Error stopping prover inputs service", {}, stopError);
    throw runError;
  }

  if (stopError !== null) throw stopError;
}
