import {describe, expect, it} from "vitest";
import {fromGlobalArgs, resolveConfig, setConfigDefaults} from "../../../src/config/index.js";
import type {GlobalArgs} from "../../../src/options/index.js";
import {CommandError, CommandErrorCode} from "../../../src/util/errors.js";

const baseArgs: GlobalArgs = {logLevel: "info", logFormat: "human"};

function getCommandError(fn: () => unknown): CommandError {
  try {
    fn();
  } catch (e) {
    if (e instanceof CommandError) return e;
    throw e;
  }
  throw Error("Expected a CommandError");
}

describe("config / resolveConfig", () => {
  it("fills defaults", () => {
    expect(resolveConfig(baseArgs)).toEqual({
      chain: {id: undefined, rpcUrl: undefined},
      dataDir: {root: "data", preflight: "data/preflight", inputs: "data/inputs"},
      proverInputs: {contentType: "json", contentEncoding: "plain"},
      store: {s3: {bucket: "", bucketKeyPrefix: "", accessKey: "", secretKey: "", region: ""}},
      log: {level: "info", format: "human", levelModule: {}},
    });
  });

  it("derives data directories from the root", () => {
    const config = resolveConfig({...baseArgs, dataDir: "/var/zkpig"});
    expect(config.dataDir).toEqual({root: "/var/zkpig", preflight: "/var/zkpig/preflight", inputs: "/var/zkpig/inputs"});
  });

  it("keeps explicit data directories", () => {
    const config = resolveConfig({
      ...baseArgs,
      dataDir: "/var/zkpig",
      preflightDataDir: "/mnt/preflight",
      proverInputsDataDir: "",
    });
    expect(config.dataDir).toEqual({root: "/var/zkpig", preflight: "/mnt/preflight", inputs: "/var/zkpig/inputs"});
  });

  it("maps every global arg", () => {
    const config = resolveConfig({
      chainId: 1,
      chainRpcUrl: "http://localhost:8545",
      inputsContentType: "protobuf",
      inputsContentEncoding: "flate",
      s3Bucket: "zkpig-inputs",
      s3BucketKeyPrefix: "mainnet/",
      s3AccessKey: "test-access-key",
      s3SecretKey: "test-secret",
      s3Region: "eu-west-1",
      logLevel: "debug",
      logFormat: "json",
      logLevelModule: ["zkpig=debug", "service=warn", "zkpig=trace"],
    });

    expect(config.chain).toEqual({id: 1, rpcUrl: "http://localhost:8545"});
    expect(config.proverInputs).toEqual({contentType: "protobuf", contentEncoding: "flate"});
    expect(config.store.s3).toEqual({
      bucket: "zkpig-inputs",
      bucketKeyPrefix: "mainnet/",
      accessKey: "test-access-key",
      secretKey: "test-secret",
      region: "eu-west-1",
    });
    expect(config.log).toEqual({level: "debug", format: "json", levelModule: {zkpig: "trace", service: "warn"}});
  });

  it("returns a frozen configuration", () => {
    const config = resolveConfig(baseArgs);
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.dataDir)).toBe(true);
    expect(Object.isFrozen(config.store.s3)).toBe(true);
  });

  it("does not share state between calls", () => {
    const first = resolveConfig({...baseArgs, chainId: 1});
    const second = resolveConfig(baseArgs);
    expect(first.chain.id).toBe(1);
    expect(second.chain.id).toBeUndefined();
  });

  it.each<[Partial<GlobalArgs>, string, string]>([
    [{chainId: 0}, "chainId", "invalid --chainId: 0 is not a positive integer"],
    [{chainId: -5}, "chainId", "invalid --chainId: -5 is not a positive integer"],
    [{chainId: 1.5}, "chainId", "invalid --chainId: 1.5 is not a positive integer"],
    [{chainId: NaN}, "chainId", "invalid --chainId: NaN is not a positive integer"],
    [{logLevel: "loud"}, "logLevel", 'invalid --logLevel: unknown log level "loud"'],
    [{logFormat: "xml"}, "logFormat", 'invalid --logFormat: unknown log format "xml"'],
    [
      {logLevelModule: ["zkpig"]},
      "logLevelModule",
      'invalid --logLevelModule: "zkpig" is not of the form <module>=<level>',
    ],
    [
      {logLevelModule: ["=debug"]},
      "logLevelModule",
      'invalid --logLevelModule: "=debug" is not of the form <module>=<level>',
    ],
    [
      {logLevelModule: ["service=loud"]},
      "logLevelModule",
      'invalid --logLevelModule: unknown log level "loud" for module service',
    ],
    [
      {inputsContentType: "cbor"},
      "inputsContentType",
      'invalid --inputsContentType: "cbor" is not one of json, protobuf',
    ],
    [
      {inputsContentEncoding: "zstd"},
      "inputsContentEncoding",
      'invalid --inputsContentEncoding: "zstd" is not one of plain, gzip, flate',
    ],
  ])("rejects %j", (args, option, message) => {
    const error = getCommandError(() => resolveConfig({...baseArgs, ...args}));
    expect(error.message).toBe(message);
    expect(error.type).toEqual({code: CommandErrorCode.INVALID_CONFIG, option});
  });
});

describe("config / setConfigDefaults", () => {
  it("does not override values built from args", () => {
    const input = fromGlobalArgs({...baseArgs, inputsContentType: "protobuf", inputsContentEncoding: "gzip"});
    expect(setConfigDefaults(input).proverInputs).toEqual({contentType: "protobuf", contentEncoding: "gzip"});
  });
});
