import {afterEach, describe, expect, it, Mock, vi} from "vitest";
import {LogLevel} from "@zkpig/utils";
import type {ZkPigConfig} from "../../../src/config/types.js";
import {getCliLogger, serviceLoggerModule} from "../../../src/util/logger.js";

// Node.js maps `process.stdout` to `console._stdout`.
type TestConsole = typeof console & {_stdout: {write: Mock}};

describe("util / logger / getCliLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  const logConfig: ZkPigConfig["log"] = {
    level: LogLevel.info,
    format: "json",
    levelModule: {[serviceLoggerModule]: LogLevel.debug},
  };

  it("applies the level set for the service module", () => {
    const write = vi.spyOn((console as TestConsole)._stdout, "write").mockImplementation(() => true);

    getCliLogger(logConfig, serviceLoggerModule).debug("service debug");

    expect(write).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(write.mock.calls[0][0]))).toMatchObject({
      level: "debug",
      message: "service debug",
      module: "service",
    });
  });

  it("keeps the default level for the command module", () => {
    const write = vi.spyOn((console as TestConsole)._stdout, "write").mockImplementation(() => true);

    getCliLogger(logConfig).debug("command debug");

    expect(write).not.toHaveBeenCalled();
  });
});
