import {ZkPigError, errorMessage} from "@zkpig/utils";
import type {S3FieldName} from "./s3.js";

/**
 * Expected error that shouldn't print a stack trace
 */
export class YargsError extends Error {}

export enum CommandErrorCode {
  /** Global arguments could not be turned into a configuration */
  INVALID_CONFIG = "COMMAND_ERROR_INVALID_CONFIG",
  /** Resolved configuration could not be serialized by the `config` command */
  CONFIG_DUMP_FAILED = "COMMAND_ERROR_CONFIG_DUMP_FAILED",
  SERVICE_CREATE_FAILED = "COMMAND_ERROR_SERVICE_CREATE_FAILED",
  SERVICE_START_FAILED = "COMMAND_ERROR_SERVICE_START_FAILED",
  INVALID_BLOCK_NUMBER = "COMMAND_ERROR_INVALID_BLOCK_NUMBER",
  /** Some but not all of the required S3 fields are set */
  INCOMPLETE_S3_CONFIG = "COMMAND_ERROR_INCOMPLETE_S3_CONFIG",
  /** The service operation bound to the command failed */
  RUN_FAILED = "COMMAND_ERROR_RUN_FAILED",
  SERVICE_STOP_FAILED = "COMMAND_ERROR_SERVICE_STOP_FAILED",
}

export type CommandErrorType =
  | {code: CommandErrorCode.INVALID_CONFIG; option: string}
  | {code: CommandErrorCode.CONFIG_DUMP_FAILED}
  | {code: CommandErrorCode.SERVICE_CREATE_FAILED}
  | {code: CommandErrorCode.SERVICE_START_FAILED}
  | {code: CommandErrorCode.INVALID_BLOCK_NUMBER; blockNumber: string}
  | {code: CommandErrorCode.INCOMPLETE_S3_CONFIG; missingFields: S3FieldName[]}
  | {code: CommandErrorCode.RUN_FAILED; stage: string; blockNumber: string}
  | {code: CommandErrorCode.SERVICE_STOP_FAILED};

export class CommandError extends ZkPigError<CommandErrorType> {}

export function isCommandError(e: unknown): e is CommandError {
  return e instanceof CommandError;
}

/**
 * `CommandError` of `type` with message `<prefix>: <cause message>`, keeping the original error as cause
 */
export function toCommandError(type: CommandErrorType, prefix: string, cause: unknown): CommandError {
  return new CommandError(type, `${prefix}: ${errorMessage(cause)}`, {cause});
}

/**
 * Run `fn` and turn whatever it throws into a `CommandError`, see `toCommandError`
 */
export async function wrapCommandError<T>(
  type: CommandErrorType,
  prefix: string,
  fn: () => T | Promise<T>
): Promise<T> {
  try {
    return await fn();
  } catch (e) {
    throw toCommandError(type, prefix, e);
  }
}
