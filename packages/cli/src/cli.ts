// Must not use `* as yargs`, see https://github.com/yargs/yargs/issues/1131
import yargs from "yargs";
import type {Argv} from "yargs";
import {hideBin} from "yargs/helpers";
import {Logger, registerCommandToYargs} from "@zkpig/utils";
import {getCmds} from "./cmds/index.js";
import {CommandEnv, OutputStream} from "./cmds/types.js";
import {globalOptions, rcConfigOption} from "./options/index.js";
import {ProverInputsServiceFactory} from "./service/interface.js";
import {isCommandError, YargsError} from "./util/errors.js";
import {onGracefulShutdown} from "./util/process.js";
import {getVersionData} from "./util/version.js";

const {version} = getVersionData();
const topBanner = `🐷 zk-pig: generate prover inputs for Ethereum blocks.
  * Version: ${version}`;
const bottomBanner = `📖 Run <command> --help to list the options of a command.

Every option can also be set from the environment, e.g. ZKPIG_CHAIN_RPC_URL for --chainRpcUrl,
or from the file given by --rcConfig. Command line args take precedence over the environment,
which takes precedence over the file.`;

export type ZkPigCliDeps = {
  createService: ProverInputsServiceFactory;
  /** Aborted to ask running commands to stop, defaults to a signal that never aborts */
  signal?: AbortSignal;
  /** Defaults to process.stdout */
  stdout?: OutputStream;
  /** Defaults to a terminal logger built from the resolved configuration of each command */
  logger?: Logger;
};

/**
 * Common factory for running the CLI and running integration tests
 * The CLI must actually be executed through `runCli`
 */
export function getZkPigCli(deps: ZkPigCliDeps, processArgs: string[] = []): Argv {
  const env: CommandEnv = {
    createService: deps.createService,
    signal: deps.signal ?? new AbortController().signal,
    stdout: deps.stdout ?? process.stdout,
    logger: deps.logger,
  };

  const zkpig = yargs(processArgs)
    .env("ZKPIG")
    .parserConfiguration({
      // As of yargs v16.1.0 dot-notation breaks strictOptions()
      // Manually processing options is typesafe tho more verbose
      "dot-notation": false,
      // A repeated flag such as `-b 5 -b 6` keeps its last value
      "duplicate-arguments-array": false,
    })
    .options(globalOptions)
    // blank scriptName so that help text doesn't display the cli name before each command
    .scriptName("")
    .demandCommand(1)
    // Control show help behaviour in runCli
    .showHelpOnFail(false)
    .usage(topBanner)
    .epilogue(bottomBanner)
    .version(topBanner)
    .alias("h", "help")
    .alias("v", "version")
    .recommendCommands();

  for (const cmd of getCmds(env)) {
    registerCommandToYargs(zkpig, cmd);
  }

  // throw an error if we see an unrecognized cmd
  zkpig.recommendCommands().strict();
  zkpig.config(...rcConfigOption);

  return zkpig;
}

/**
 * Expected errors are printed without stack: argument errors of yargs and failed commands
 */
function getFailureMessage(e: unknown): string {
  if (e instanceof YargsError || isCommandError(e)) return e.message;
  if (e instanceof Error) return e.name === "YError" ? e.message : e.stack ?? e.message;
  return String(e);
}

/**
 * Parse the process arguments and run the selected command. Prints ` ✖ <message>` and exits
 * the process with code 1 on any error. SIGINT and SIGTERM abort the signal handed to the service.
 */
export async function runCli(
  deps: Omit<ZkPigCliDeps, "signal">,
  processArgs: string[] = hideBin(process.argv)
): Promise<void> {
  const controller = new AbortController();
  onGracefulShutdown(() => controller.abort());

  // Errors are thrown instead of handled by yargs, see below
  const zkpig = getZkPigCli({...deps, signal: controller.signal}, processArgs).fail(false);

  try {
    // Execute CLI
    await zkpig.parseAsync();
  } catch (e) {
    // Show command help message when no command is provided
    if (e instanceof Error && e.message.includes("Not enough non-option arguments")) {
      zkpig.showHelp();
      // eslint-disable-next-line no-console
      console.log("\n");
    }

    console.error(` ✖ ${getFailureMessage(e)}\n`);
    process.exit(1);
  }
}
