import { CallToolResultSchema, type Tool } from "@modelcontextprotocol/sdk/types.js";
import z from "zod";

const propertySchema = z.object({
    type: z.enum(["string", "integer", "number", "boolean"]).catch("string"),
    description: z.string().optional(),
});

export type ToolParameter = {
    name: string;
    type: "string" | "integer" | "number" | "boolean";
    description?: string;
    required: boolean;
};

export function toolParameters(tool: Tool): ToolParameter[] {
    const required = new Set(tool.inputSchema.required ?? []);
    return Object.entries(tool.inputSchema.properties ?? {}).map(([name, value]) => {
        const parsed = propertySchema.safeParse(value);
        const property = parsed.success ? parsed.data : { type: "string" as const, description: undefined };
        return { name, type: property.type, description: property.description, required: required.has(name) };
    });
}

/**
 * Prompt answers are always strings; convert them to the declared JSON type
 * so the server's validation sees a number where it expects one. A blank
 * answer leaves the argument out.
 */
export function coerceArguments(parameters: ToolParameter[], answers: Record<string, string>): Record<string, unknown> {
    const args: Record<string, unknown> = {};
    for (const parameter of parameters) {
        const raw = answers[parameter.name]?.trim();
        if (raw === undefined || raw === "") continue;

        switch (parameter.type) {
            case "integer":
            case "number": {
                const value = Number(raw);
                args[parameter.name] = Number.isNaN(value) ? raw : value;
                break;
            }
            case "boolean":
                args[parameter.name] = raw.toLowerCase() === "true";
                break;
            default:
                args[parameter.name] = raw;
        }
    }
    return args;
}

export function toolResultText(result: unknown): string {
    const parsed = CallToolResultSchema.safeParse(result);
    if (!parsed.success) {
        return "Unexpected tool result";
    }
    const text = parsed.data.content
        .flatMap((block) => (block.type === "text" ? [block.text] : []))
        .join("\n");
    return parsed.data.isError ? `Error: ${text}` : text;
}

// Gemini rejects schemas without an object type, so always send one
export function toGeminiSchema(parameters: ToolParameter[]) {
    const properties: Record<string, { type: ToolParameter["type"]; description?: string }> = {};
    for (const parameter of parameters) {
        properties[parameter.name] = parameter.description === undefined
            ? { type: parameter.type }
            : { type: parameter.type, description: parameter.description };
    }
    return {
        type: "object" as const,
        properties,
        required: parameters.filter((parameter) => parameter.required).map((parameter) => parameter.name),
    };
}
