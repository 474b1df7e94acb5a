import {CliCommandOptions} from "@zkpig/utils";
import {contentEncodings, contentTypes} from "../config/types.js";
import {readFile} from "../util/file.js";
import {LogArgs, logOptions} from "./logOptions.js";

type GlobalSingleArgs = {
  chainId?: number;
  chainRpcUrl?: string;
  dataDir?: string;
  preflightDataDir?: string;
  proverInputsDataDir?: string;
  inputsContentType?: string;
  inputsContentEncoding?: string;
};

type S3Args = {
  s3Bucket?: string;
  s3BucketKeyPrefix?: string;
  s3AccessKey?: string;
  s3SecretKey?: string;
  s3Region?: string;
};

export const defaultDataDir = "data";

const globalSingleOptions: CliCommandOptions<GlobalSingleArgs> = {
  chainId: {
    description: "Chain ID, required by prepare and execute when running without a node",
    type: "number",
  },

  chainRpcUrl: {
    description: "URL of a remote JSON-RPC Ethereum Execution Layer node",
    type: "string",
  },

  dataDir: {
    description: "Root directory of the local store",
    defaultDescription: defaultDataDir,
    type: "string",
  },

  preflightDataDir: {
    description: "Directory where preflight data is stored",
    defaultDescription: `<dataDir>/preflight`,
    type: "string",
  },

  proverInputsDataDir: {
    description: "Directory where prover inputs are stored",
    defaultDescription: `<dataDir>/inputs`,
    type: "string",
  },

  inputsContentType: {
    description: "Serialization format of stored prover inputs",
    choices: contentTypes,
    defaultDescription: "json",
    type: "string",
  },

  inputsContentEncoding: {
    description: "Compression of stored prover inputs",
    choices: contentEncodings,
    defaultDescription: "plain",
    type: "string",
  },
};

const s3Options: CliCommandOptions<S3Args> = {
  s3Bucket: {
    description: "S3 bucket to store prover inputs in",
    type: "string",
    group: "s3",
  },

  s3BucketKeyPrefix: {
    description: "Prefix of the S3 keys prover inputs are stored under",
    type: "string",
    group: "s3",
  },

  s3AccessKey: {
    description: "AWS access key",
    type: "string",
    group: "s3",
  },

  s3SecretKey: {
    description: "AWS secret key",
    type: "string",
    group: "s3",
  },

  s3Region: {
    description: "AWS region of the S3 bucket",
    type: "string",
    group: "s3",
  },
};

export const rcConfigOption: [string, string, (configPath: string) => Record<string, unknown>] = [
  "rcConfig",
  "RC file to supplement command line args, accepted formats: .yml, .yaml, .json",
  (configPath: string): Record<string, unknown> => readFile(configPath, ["json", "yml", "yaml"]),
];

export type GlobalArgs = GlobalSingleArgs & S3Args & LogArgs;

export const globalOptions = {
  ...globalSingleOptions,
  ...s3Options,
  ...logOptions,
};
