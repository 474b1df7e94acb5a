import {CliCommand} from "@zkpig/utils";
import {resolveConfig} from "../../config/index.js";
import {GlobalArgs} from "../../options/index.js";
import {CommandErrorCode, wrapCommandError} from "../../util/errors.js";
import {CommandEnv} from "../types.js";

/**
 * Print the configuration resolved from flags, environment and rc file, as indented JSON.
 * Never creates a service.
 */
export function getConfigCommand(env: CommandEnv): CliCommand<Record<never, never>, GlobalArgs> {
  return {
    command: "config",
    describe: "Print resolved configuration",
    examples: [
      {
        command: "config --rcConfig zkpig.yml",
        description: "Print configuration after merging zkpig.yml with flags and environment",
      },
    ],
    handler: async (args) => {
      const config = resolveConfig(args);
      const serialized = await wrapCommandError(
        {code: CommandErrorCode.CONFIG_DUMP_FAILED},
        "failed to serialize configuration",
        () => JSON.stringify(config, null, 2)
      );
      env.stdout.write(`${serialized}\n`);
    },
  };
}
