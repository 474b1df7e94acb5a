import {CliCommand} from "@zkpig/utils";
import {GlobalArgs} from "../options/index.js";
import {getConfigCommand} from "./config/index.js";
import {ProverInputsStage, getProverInputsCommand} from "./proverInputs/index.js";
import {CommandEnv} from "./types.js";

// biome-ignore lint/suspicious/noExplicitAny: each command has its own args
export function getCmds(env: CommandEnv): CliCommand<any, GlobalArgs>[] {
  return [
    getProverInputsCommand(ProverInputsStage.generate, env),
    getProverInputsCommand(ProverInputsStage.preflight, env),
    getProverInputsCommand(ProverInputsStage.prepare, env),
    getProverInputsCommand(ProverInputsStage.execute, env),
    getConfigCommand(env),
  ];
}
