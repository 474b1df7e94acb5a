import {logFormats} from "@zkpig/logger";
import {CliCommandOptions, LogLevel, LogLevels} from "@zkpig/utils";

export type LogArgs = {
  logLevel: string;
  logFormat: string;
  logLevelModule?: string[];
};

export const logOptions: CliCommandOptions<LogArgs> = {
  logLevel: {
    choices: LogLevels,
    description: "Logging verbosity level for emitting logs to terminal",
    default: LogLevel.info,
    type: "string",
  },

  logFormat: {
    description: "Log format used when emitting logs to the terminal",
    choices: logFormats,
    default: "human",
    type: "string",
  },

  logLevelModule: {
    description: "Set log level for a specific module by name: 'service=debug' or 'zkpig=debug,service=warn'",
    type: "array",
    string: true,
    coerce: (args: string[]) => args.flatMap((item) => item.split(",")),
  },
};
