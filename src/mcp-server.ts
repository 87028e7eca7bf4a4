import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
    CallToolRequestSchema,
    ErrorCode,
    ListToolsRequestSchema,
    McpError,
} from "@modelcontextprotocol/sdk/types.js";
import type { WeatherConfig } from "./config.js";
import { UnknownToolError } from "./errors.js";
import { logger } from "./logger.js";
import type { ToolRegistry } from "./registry.js";
import { createToolRegistry } from "./tools.js";
import { WeatherAdapter } from "./weather/adapter.js";
import { OpenWeatherClient, type FetchLike } from "./weather/openweather-client.js";

export const SERVER_INFO = {
    name: "weather-server",
    version: "1.0.0",
};

export function createMcpServer(registry: ToolRegistry): Server {
    const server = new Server(SERVER_INFO, {
        capabilities: {
            tools: {},
        },
    });

    server.setRequestHandler(ListToolsRequestSchema, async () => {
        return { tools: registry.listTools() };
    });

    server.setRequestHandler(CallToolRequestSchema, async (request) => {
        const { name, arguments: args } = request.params;

        try {
            return await registry.dispatch({ name, arguments: args });
        } catch (error) {
            if (error instanceof UnknownToolError) {
                throw new McpError(ErrorCode.MethodNotFound, error.message);
            }
            logger.error(`Tool ${name} crashed:`, error);
            const reason = error instanceof Error ? error.message : String(error);
            throw new McpError(ErrorCode.InternalError, `Tool execution error: ${reason}`);
        }
    });

    return server;
}

export interface WeatherServerOptions {
    config: WeatherConfig;
    /** Replaces the global fetch for upstream calls. */
    fetch?: FetchLike;
}

export function createWeatherServer({ config, fetch }: WeatherServerOptions): Server {
    const client = new OpenWeatherClient(config, fetch);
    return createMcpServer(createToolRegistry(new WeatherAdapter(client)));
}
