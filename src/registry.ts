import type z from "zod";
import { InvalidArgumentError, ToolError, UnknownToolError } from "./errors.js";
import { logger } from "./logger.js";

export type ParameterSchema = {
    type: "string" | "integer" | "number" | "boolean";
    description: string;
    minimum?: number;
    maximum?: number;
    minLength?: number;
    default?: string | number | boolean;
};

export type ToolDescriptor = {
    name: string;
    title: string;
    description: string;
    inputSchema: {
        type: "object";
        properties: Record<string, ParameterSchema>;
        required: string[];
        additionalProperties?: boolean;
    };
    annotations: {
        title: string;
        readOnlyHint: boolean;
        destructiveHint: boolean;
        idempotentHint: boolean;
        openWorldHint: boolean;
    };
};

export interface ToolCallRequest {
    name: string;
    arguments?: Record<string, unknown>;
}

export type ToolResponse = {
    content: { type: "text"; text: string }[];
    isError?: boolean;
};

export interface ToolDefinition<Args> {
    descriptor: ToolDescriptor;
    /** Parses raw arguments; must agree with descriptor.inputSchema. */
    schema: z.ZodType<Args, z.ZodTypeDef, unknown>;
    handler: (args: Args) => Promise<string>;
}

interface RegisteredTool {
    descriptor: ToolDescriptor;
    invoke: (args: Record<string, unknown>) => Promise<string>;
}

export function textResponse(text: string, isError = false): ToolResponse {
    const response: ToolResponse = { content: [{ type: "text", text }] };
    if (isError) response.isError = true;
    return response;
}

export class ToolRegistry {
    private readonly tools = new Map<string, RegisteredTool>();

    register<Args>(definition: ToolDefinition<Args>): this {
        const { descriptor, schema, handler } = definition;
        if (this.tools.has(descriptor.name)) {
            throw new Error(`Tool already registered: ${descriptor.name}`);
        }

        this.tools.set(descriptor.name, {
            descriptor,
            invoke: async (args) => {
                const parsed = schema.safeParse(args);
                if (!parsed.success) {
                    const issue = parsed.error.issues[0];
                    const parameter = issue?.code === "unrecognized_keys"
                        ? issue.keys.join(", ")
                        : issue?.path.join(".") || "arguments";
                    throw new InvalidArgumentError(parameter, issue?.message ?? "invalid value");
                }
                return handler(parsed.data);
            },
        });
        return this;
    }

    listTools(): ToolDescriptor[] {
        return [...this.tools.values()].map((tool) => structuredClone(tool.descriptor));
    }

    /**
     * Runs a tool by exact name. Recoverable failures come back as a response
     * with isError set; an unknown name throws UnknownToolError and anything
     * else propagates as a defect.
     */
    async dispatch(request: ToolCallRequest): Promise<ToolResponse> {
        const tool = this.tools.get(request.name);
        if (tool == null) {
            throw new UnknownToolError(request.name);
        }

        try {
            const text = await tool.invoke(request.arguments ?? {});
            return textResponse(text);
        } catch (error) {
            if (error instanceof ToolError) {
                logger.info(`Tool ${request.name} failed (${error.kind}): ${error.message}`);
                return textResponse(error.message, true);
            }
            throw error;
        }
    }
}
