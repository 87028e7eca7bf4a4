#!/usr/bin/env node

import "dotenv/config";
import { fileURLToPath } from "node:url";
import { createGoogleGenerativeAI } from "@ai-sdk/google";
import { generateText, jsonSchema, stepCountIs, tool, type ToolSet } from "ai";
import { input, select } from "@inquirer/prompts";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { StdioClientTransport } from "@modelcontextprotocol/sdk/client/stdio.js";
import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import { SERVER_INFO } from "./mcp-server.js";
import { coerceArguments, toGeminiSchema, toolParameters, toolResultText } from "./tool-input.js";

const mcp = new Client(
    {
        name: `${SERVER_INFO.name}-client`,
        version: SERVER_INFO.version,
    },
    { capabilities: {} },
);

// the server reads OPENWEATHER_API_KEY from the same .env
const transport = new StdioClientTransport({
    command: process.execPath,
    args: [fileURLToPath(new URL("./server.js", import.meta.url))],
    stderr: "ignore",
});

const google = createGoogleGenerativeAI({
    apiKey: process.env.GEMINI_API_KEY,
});

async function main() {
    await mcp.connect(transport);
    const { tools } = await mcp.listTools();

    console.log("You are connected to the weather MCP server!");
    while (true) {
        const option = await select({
            message: "What do you want to do?",
            choices: ["Query", "Tools", "Exit"],
        });

        switch (option) {
            case "Tools": {
                const toolName = await select({
                    message: "Select a tool",
                    choices: tools.map((mcpTool) => ({
                        name: mcpTool.annotations?.title || mcpTool.name,
                        value: mcpTool.name,
                        description: mcpTool.description,
                    })),
                });
                const selected = tools.find((t) => t.name === toolName);
                if (selected == null) {
                    console.error("Tool not found");
                } else {
                    await handleTool(selected);
                }
                break;
            }
            case "Query":
                await handleQuery(tools);
                break;
            case "Exit":
                await mcp.close();
                return;
        }
    }
}

async function handleQuery(tools: Tool[]) {
    const query = await input({ message: "Enter your query" });

    const toolSet: ToolSet = {};
    for (const mcpTool of tools) {
        toolSet[mcpTool.name] = tool({
            description: mcpTool.description ?? "",
            inputSchema: jsonSchema<Record<string, unknown>>(toGeminiSchema(toolParameters(mcpTool))),
            execute: async (args: Record<string, unknown>) => {
                const result = await mcp.callTool({ name: mcpTool.name, arguments: args });
                return toolResultText(result);
            },
        });
    }

    const { text, toolResults } = await generateText({
        model: google("gemini-2.0-flash"),
        prompt: query,
        tools: toolSet,
        stopWhen: stepCountIs(3),
    });

    const fallback = toolResults.map((result) => result.output).find((output) => typeof output === "string");
    console.log(text || fallback || "No text generated.");
}

async function handleTool(selected: Tool) {
    const parameters = toolParameters(selected);
    const answers: Record<string, string> = {};
    for (const parameter of parameters) {
        answers[parameter.name] = await input({
            message: `Enter value for ${parameter.name} (${parameter.type}${parameter.required ? "" : ", optional"}):`,
            required: parameter.required,
        });
    }

    const result = await mcp.callTool({
        name: selected.name,
        arguments: coerceArguments(parameters, answers),
    });
    console.log(toolResultText(result));
}

main().catch((error) => {
    console.error("Fatal error in main():", error);
    process.exit(1);
});
