#!/usr/bin/env node

import "dotenv/config";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfig } from "./config.js";
import { logger, setLogLevel } from "./logger.js";
import { createWeatherServer } from "./mcp-server.js";

async function main() {
    const config = loadConfig();
    setLogLevel(config.logLevel);
    if (!config.apiKey) {
        logger.warn("OPENWEATHER_API_KEY is not set; tool calls will report a configuration error");
    }

    const server = createWeatherServer({ config });
    const transport = new StdioServerTransport(); //create a transport using standard input/output
    await server.connect(transport);
    logger.info("Weather MCP server running on stdio");
}

main().catch((error) => {
    logger.fatal("Fatal error in main():", error);
    process.exit(1);
});
