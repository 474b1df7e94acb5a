import type winston from "winston";
import {Logger, LogFormat, LogLevel, TimestampFormat} from "./interface.js";
import {ConsoleDynamicLevel} from "./utils/consoleTransport.js";
import {WinstonLogger} from "./winston.js";

export type LoggerNodeOpts = {
  level: LogLevel;
  /**
   * Module prefix for all logs
   */
  module?: string;
  /**
   * Rendering format for logs, defaults to "human"
   */
  format?: LogFormat;
  /**
   * Set specific log levels by module
   */
  levelModule?: Record<string, LogLevel>;
  timestampFormat?: TimestampFormat;
};

/**
 * Setup a CLI logger writing to the terminal
 */
export function getNodeLogger(opts: LoggerNodeOpts): Logger {
  return new WinstonLogger(WinstonLogger.createWinstonInstance(opts, getNodeLoggerTransports(opts)));
}

function getNodeLoggerTransports(opts: LoggerNodeOpts): winston.transport[] {
  const consoleTransport = new ConsoleDynamicLevel({
    // Set defaultLevel, not level for dynamic level setting of ConsoleDynamicLevel
    defaultLevel: opts.level,
    debugStdout: true,
    handleExceptions: true,
  });

  if (opts.levelModule) {
    for (const [module, level] of Object.entries(opts.levelModule)) {
      consoleTransport.setModuleLevel(module, level);
    }
  }

  return [consoleTransport];
}
