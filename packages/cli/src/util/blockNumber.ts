/**
 * Named positions of the JSON-RPC block parameter
 */
export enum BlockTag {
  latest = "latest",
  earliest = "earliest",
  pending = "pending",
  finalized = "finalized",
  safe = "safe",
}

export const blockTags = Object.values(BlockTag);

export type BlockNumber = {type: "number"; number: bigint} | {type: "tag"; tag: BlockTag};

const decimalRx = /^[0-9]+$/;
const hexRx = /^0x[0-9a-fA-F]+$/;

function isBlockTag(arg: string): arg is BlockTag {
  return (blockTags as string[]).includes(arg);
}

/**
 * Parse a `--blockNumber` argument: a tag, a decimal integer or a 0x-prefixed hex integer.
 * ```ts
 * parseBlockNumberArg("latest") // {type: "tag", tag: BlockTag.latest}
 * parseBlockNumberArg("0x10") // {type: "number", number: 16n}
 * ```
 */
export function parseBlockNumberArg(arg: string): BlockNumber {
  if (isBlockTag(arg)) {
    return {type: "tag", tag: arg};
  }

  if (decimalRx.test(arg) || hexRx.test(arg)) {
    return {type: "number", number: BigInt(arg)};
  }

  throw Error(`"${arg}" is neither an integer nor one of ${blockTags.join(", ")}`);
}

export function blockNumberToString(blockNumber: BlockNumber): string {
  return blockNumber.type === "tag" ? blockNumber.tag : blockNumber.number.toString(10);
}
