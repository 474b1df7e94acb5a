import path from "node:path";
import {isLogFormat} from "@zkpig/logger";
import {LogLevel, isLogLevel} from "@zkpig/utils";
import {GlobalArgs, defaultDataDir} from "../options/globalOptions.js";
import {CommandError, CommandErrorCode} from "../util/errors.js";
import {
  ContentEncoding,
  ContentType,
  ZkPigConfig,
  ZkPigConfigInput,
  contentEncodings,
  contentTypes,
} from "./types.js";

export * from "./types.js";

export const defaultContentType: ContentType = "json";
export const defaultContentEncoding: ContentEncoding = "plain";

function invalidOption(option: string, reason: string): CommandError {
  return new CommandError({code: CommandErrorCode.INVALID_CONFIG, option}, `invalid --${option}: ${reason}`);
}

function parseOneOf<T extends string>(option: string, allowed: T[], value: string | undefined): T | undefined {
  if (value === undefined || value === "") return undefined;
  const match = allowed.find((item) => item === value);
  if (match === undefined) {
    throw invalidOption(option, `"${value}" is not one of ${allowed.join(", ")}`);
  }
  return match;
}

/**
 * Parse `<module>=<level>` items, the last item of a module wins
 */
function parseLogLevelModule(items: string[]): Record<string, LogLevel> {
  const levelModule: Record<string, LogLevel> = {};
  for (const item of items) {
    const [module, level, ...rest] = item.split("=");
    if (!module || level === undefined || rest.length > 0) {
      throw invalidOption("logLevelModule", `"${item}" is not of the form <module>=<level>`);
    }
    if (!isLogLevel(level)) {
      throw invalidOption("logLevelModule", `unknown log level "${level}" for module ${module}`);
    }
    levelModule[module] = level;
  }
  return levelModule;
}

function emptyToUndefined(value: string | undefined): string | undefined {
  return value === "" ? undefined : value;
}

/**
 * Turn merged global arguments into a typed configuration, without defaults
 */
export function fromGlobalArgs(args: GlobalArgs): ZkPigConfigInput {
  if (args.chainId !== undefined && !(Number.isSafeInteger(args.chainId) && args.chainId > 0)) {
    throw invalidOption("chainId", `${args.chainId} is not a positive integer`);
  }

  if (!isLogLevel(args.logLevel)) {
    throw invalidOption("logLevel", `unknown log level "${args.logLevel}"`);
  }

  if (!isLogFormat(args.logFormat)) {
    throw invalidOption("logFormat", `unknown log format "${args.logFormat}"`);
  }

  return {
    chain: {
      id: args.chainId,
      rpcUrl: emptyToUndefined(args.chainRpcUrl),
    },
    dataDir: {
      root: emptyToUndefined(args.dataDir),
      preflight: emptyToUndefined(args.preflightDataDir),
      inputs: emptyToUndefined(args.proverInputsDataDir),
    },
    proverInputs: {
      contentType: parseOneOf("inputsContentType", contentTypes, args.inputsContentType),
      contentEncoding: parseOneOf("inputsContentEncoding", contentEncodings, args.inputsContentEncoding),
    },
    store: {
      s3: {
        bucket: args.s3Bucket ?? "",
        bucketKeyPrefix: args.s3BucketKeyPrefix ?? "",
        accessKey: args.s3AccessKey ?? "",
        secretKey: args.s3SecretKey ?? "",
        region: args.s3Region ?? "",
      },
    },
    log: {
      level: args.logLevel,
      format: args.logFormat,
      levelModule: parseLogLevelModule(args.logLevelModule ?? []),
    },
  };
}

export function setConfigDefaults(input: ZkPigConfigInput): ZkPigConfig {
  const root = input.dataDir.root ?? defaultDataDir;

  return {
    ...input,
    dataDir: {
      root,
      preflight: input.dataDir.preflight ?? path.join(root, "preflight"),
      inputs: input.dataDir.inputs ?? path.join(root, "inputs"),
    },
    proverInputs: {
      contentType: input.proverInputs.contentType ?? defaultContentType,
      contentEncoding: input.proverInputs.contentEncoding ?? defaultContentEncoding,
    },
  };
}

function deepFreeze<T extends object>(obj: T): Readonly<T> {
  for (const value of Object.values(obj)) {
    if (value !== null && typeof value === "object") deepFreeze(value);
  }
  return Object.freeze(obj);
}

/**
 * Resolve the configuration of one command invocation: build it from global arguments,
 * fill defaults, and freeze it. Has no effect outside of the returned value.
 */
export function resolveConfig(args: GlobalArgs): Readonly<ZkPigConfig> {
  return deepFreeze(setConfigDefaults(fromGlobalArgs(args)));
}
