import { Logger } from "tslog";
import { LOG_LEVELS, type LogLevel } from "./config.js";

// stdout carries the MCP protocol, so every log line goes to stderr
export const logger = new Logger({
    name: "weather-mcp",
    type: "pretty",
    minLevel: LOG_LEVELS.indexOf("info"),
    stylePrettyLogs: false,
    prettyLogTemplate: "{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}} {{logLevelName}} [{{name}}] ",
    overwrite: {
        transportFormatted: (logMetaMarkup: string, logArgs: unknown[], logErrors: string[]) => {
            console.error(logMetaMarkup, ...logArgs, ...logErrors);
        },
    },
});

export function setLogLevel(level: LogLevel): void {
    logger.settings.minLevel = LOG_LEVELS.indexOf(level);
}
