export {getZkPigCli, runCli} from "./cli.js";
export type {ZkPigCliDeps} from "./cli.js";
export type {CommandEnv, OutputStream} from "./cmds/types.js";
export {ProverInputsStage, runProverInputsCommand, setupProverInputsContext} from "./cmds/proverInputs/lifecycle.js";
export type {ProverInputsContext} from "./cmds/proverInputs/lifecycle.js";
export * from "./config/index.js";
export * from "./service/interface.js";
export {BlockTag, blockTags, blockNumberToString, parseBlockNumberArg} from "./util/blockNumber.js";
export type {BlockNumber} from "./util/blockNumber.js";
export {CommandError, CommandErrorCode, isCommandError} from "./util/errors.js";
export type {CommandErrorType} from "./util/errors.js";
