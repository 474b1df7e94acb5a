import type {LogFormat} from "@zkpig/logger";
import type {LogLevel} from "@zkpig/utils";

export type ContentType = "json" | "protobuf";
export const contentTypes: ContentType[] = ["json", "protobuf"];

export type ContentEncoding = "plain" | "gzip" | "flate";
export const contentEncodings: ContentEncoding[] = ["plain", "gzip", "flate"];

/**
 * Optional S3 store of prover inputs. All fields are empty strings when unset.
 */
export type S3Config = {
  bucket: string;
  bucketKeyPrefix: string;
  accessKey: string;
  secretKey: string;
  region: string;
};

export type ZkPigConfig = {
  chain: {
    /** Lets `prepare` and `execute` run without a node */
    id?: number;
    rpcUrl?: string;
  };
  dataDir: {
    root: string;
    preflight: string;
    inputs: string;
  };
  proverInputs: {
    contentType: ContentType;
    contentEncoding: ContentEncoding;
  };
  store: {
    s3: S3Config;
  };
  log: {
    level: LogLevel;
    format: LogFormat;
    /** Overrides `level` for the listed modules */
    levelModule: Record<string, LogLevel>;
  };
};

/**
 * Configuration as built from global arguments, before defaults are filled
 */
export type ZkPigConfigInput = Omit<ZkPigConfig, "dataDir" | "proverInputs"> & {
  dataDir: Partial<ZkPigConfig["dataDir"]>;
  proverInputs: Partial<ZkPigConfig["proverInputs"]>;
};
