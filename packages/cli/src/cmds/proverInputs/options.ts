import {CliCommandOptions} from "@zkpig/utils";
import {BlockTag} from "../../util/blockNumber.js";

export type BlockNumberArgs = {
  blockNumber: string;
};

export const blockNumberOptions: CliCommandOptions<BlockNumberArgs> = {
  blockNumber: {
    alias: ["b", "block-number"],
    description: "Block number, decimal or 0x-prefixed hex, or a tag such as latest, earliest or pending",
    default: BlockTag.latest,
    type: "string",
  },
};
