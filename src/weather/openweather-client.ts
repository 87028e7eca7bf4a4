import type z from "zod";
import type { WeatherConfig } from "../config.js";
import {
    AuthError,
    MalformedResponseError,
    NotFoundError,
    UpstreamUnavailableError,
} from "../errors.js";
import { logger } from "../logger.js";
import { errorPayloadSchema } from "./types.js";

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export type WeatherEndpoint = "weather" | "forecast";

const USER_AGENT = "weather-mcp-server/1.0";

/**
 * Single-attempt GET against the OpenWeatherMap 2.5 API. Every failure is
 * mapped onto a ToolError; the caller gets either a validated payload or one
 * of NotFound, AuthError, UpstreamUnavailable or MalformedUpstreamResponse.
 */
export class OpenWeatherClient {
    constructor(
        private readonly config: WeatherConfig,
        private readonly fetchImpl: FetchLike = fetch,
    ) {}

    async get<T>(endpoint: WeatherEndpoint, location: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
        const apiKey = this.config.apiKey;
        if (!apiKey) {
            throw new AuthError(
                "OpenWeatherMap API key not configured. Set the OPENWEATHER_API_KEY environment variable.",
            );
        }

        const url = new URL(`${this.config.baseUrl}/${endpoint}`);
        url.searchParams.set("q", location);
        url.searchParams.set("units", "metric");
        logger.debug(`GET ${url.toString()}`);
        url.searchParams.set("appid", apiKey);

        let response: Response;
        try {
            response = await this.fetchImpl(url.toString(), {
                headers: { "User-Agent": USER_AGENT, Accept: "application/json" },
                signal: AbortSignal.timeout(this.config.timeoutMs),
            });
        } catch (error) {
            throw this.transportFailure(endpoint, error);
        }

        if (!response.ok) {
            await discardBody(response);
            if (response.status === 404) {
                throw new NotFoundError(location);
            }
            if (response.status === 401) {
                throw new AuthError("the weather service rejected the API key (HTTP 401)");
            }
            logger.warn(`Weather request to /${endpoint} returned HTTP ${response.status}`);
            const statusText = response.statusText ? ` ${response.statusText}` : "";
            throw new UpstreamUnavailableError(`HTTP ${response.status}${statusText}`, response.status);
        }

        // the timeout signal also covers reading the body
        let text: string;
        try {
            text = await response.text();
        } catch (error) {
            throw this.transportFailure(endpoint, error);
        }

        let body: unknown;
        try {
            body = JSON.parse(text);
        } catch {
            throw new MalformedResponseError("body is not valid JSON");
        }

        const errorPayload = errorPayloadSchema.safeParse(body);
        if (errorPayload.success && String(errorPayload.data.cod) === "404") {
            throw new NotFoundError(location);
        }

        const parsed = schema.safeParse(body);
        if (!parsed.success) {
            const issue = parsed.error.issues[0];
            const field = issue?.path.join(".") || "body";
            logger.warn(`Unexpected /${endpoint} payload:`, parsed.error.issues);
            throw new MalformedResponseError(`${field}: ${issue?.message ?? "invalid"}`);
        }
        return parsed.data;
    }

    private transportFailure(endpoint: WeatherEndpoint, error: unknown): UpstreamUnavailableError {
        logger.warn(`Weather request to /${endpoint} failed:`, error);
        if (error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError")) {
            return new UpstreamUnavailableError(`request timed out after ${this.config.timeoutMs} ms`);
        }
        const reason = error instanceof Error ? error.message : String(error);
        return new UpstreamUnavailableError(`request failed (${reason})`);
    }
}

// releases the connection when the body is not going to be read
async function discardBody(response: Response): Promise<void> {
    try {
        await response.body?.cancel();
    } catch (error) {
        logger.debug("Could not discard response body:", error);
    }
}
