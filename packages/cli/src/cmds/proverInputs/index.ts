import {CliCommand} from "@zkpig/utils";
import {GlobalArgs} from "../../options/index.js";
import {CommandEnv} from "../types.js";
import {ProverInputsStage, runProverInputsCommand} from "./lifecycle.js";
import {BlockNumberArgs, blockNumberOptions} from "./options.js";

export {ProverInputsStage} from "./lifecycle.js";
export type {BlockNumberArgs} from "./options.js";

type StageCommand = {
  describe: string;
  usage: string;
  examples: {command: string; description: string}[];
};

const stageCommands: Record<ProverInputsStage, StageCommand> = {
  [ProverInputsStage.generate]: {
    describe: "Generate prover inputs for a block",
    usage: `Generate prover inputs for a block by running preflight, prepare and execute in a row.

Data is collected from the node given by --chainRpcUrl.`,
    examples: [
      {
        command: "generate --chainRpcUrl http://localhost:8545 -b latest",
        description: "Generate prover inputs for the latest block",
      },
    ],
  },
  [ProverInputsStage.preflight]: {
    describe: "Collect necessary data to generate prover inputs from a remote JSON-RPC Ethereum Execution Layer node",
    usage: `Collect necessary data to generate prover inputs from a remote JSON-RPC Ethereum Execution Layer node.

Collected data is written under --preflightDataDir.`,
    examples: [
      {
        command: "preflight --chainRpcUrl http://localhost:8545 -b 21000000",
        description: "Collect preflight data for block 21000000",
      },
    ],
  },
  [ProverInputsStage.prepare]: {
    describe: "Prepare prover inputs by basing on data previously collected during preflight",
    usage: `Prepare prover inputs by basing on data previously collected during preflight.

Does not need a node, --chainId must be set when running offline.`,
    examples: [
      {
        command: "prepare --chainId 1 -b 21000000",
        description: "Prepare prover inputs for block 21000000 on mainnet",
      },
    ],
  },
  [ProverInputsStage.execute]: {
    describe: "Execute block by basing on prover inputs previously generated during prepare",
    usage: `Execute block by basing on prover inputs previously generated during prepare.

Checks that the stored prover inputs are enough to execute the block.`,
    examples: [
      {
        command: "execute --chainId 1 -b 21000000",
        description: "Execute block 21000000 from stored prover inputs",
      },
    ],
  },
};

export function getProverInputsCommand(
  stage: ProverInputsStage,
  env: CommandEnv
): CliCommand<BlockNumberArgs, GlobalArgs> {
  return {
    command: stage,
    ...stageCommands[stage],
    options: blockNumberOptions,
    handler: (args) => runProverInputsCommand(stage, args, env),
  };
}
