import type {Options, Argv} from "yargs";

export interface CliExample {
  command: string;
  description: string;
}

// biome-ignore lint/suspicious/noExplicitAny: <explanation>
export interface CliOptionDefinition<T = any> extends Options {
  // Ensure `type` property matches type of `T`
  type: T extends string
    ? "string"
    : T extends number
      ? "number"
      : T extends boolean
        ? "boolean"
        : T extends Array<unknown>
          ? "array"
          : never;
}

export type CliCommandOptions<OwnArgs> = Required<{
  [K in keyof OwnArgs]: undefined extends OwnArgs[K]
    ? CliOptionDefinition<OwnArgs[K]>
    : // If arg cannot be undefined it must specify a default value or be provided by the user
      CliOptionDefinition<OwnArgs[K]> & (Required<Pick<Options, "default">> | {demandOption: true});
}>;

export interface CliCommand<OwnArgs = Record<never, never>, ParentArgs = Record<never, never>> {
  command: string;
  describe: string;
  /** Longer description printed by `<command> --help` */
  usage?: string;
  examples?: CliExample[];
  options?: CliCommandOptions<OwnArgs>;
  handler: (args: OwnArgs & ParentArgs) => Promise<void>;
}

/**
 * Register a CliCommand type to yargs.
 */

// biome-ignore lint/suspicious/noExplicitAny: <explanation>
export function registerCommandToYargs(yargs: Argv, cliCommand: CliCommand<any, any>): void {
  yargs.command({
    command: cliCommand.command,
    describe: cliCommand.describe,
    builder: (yargsBuilder) => {
      yargsBuilder.options(cliCommand.options ?? {});
      if (cliCommand.usage) {
        yargsBuilder.usage(cliCommand.usage);
      }
      for (const example of cliCommand.examples ?? []) {
        yargsBuilder.example(`$0 ${example.command}`, example.description);
      }
      return yargsBuilder;
    },
    handler: cliCommand.handler,
  });
}
