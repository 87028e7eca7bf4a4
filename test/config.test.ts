import { describe, expect, it } from "vitest";
import { DEFAULT_BASE_URL, loadConfig } from "../src/config.js";
import { ConfigError } from "../src/errors.js";

describe("loadConfig", () => {
    it("applies defaults to an empty environment", () => {
        expect(loadConfig({})).toEqual({
            apiKey: undefined,
            baseUrl: DEFAULT_BASE_URL,
            timeoutMs: 10_000,
            logLevel: "info",
        });
    });

    it("reads every variable", () => {
        const config = loadConfig({
            OPENWEATHER_API_KEY: " test-key ",
            OPENWEATHER_BASE_URL: "http://localhost:8080/owm/",
            WEATHER_HTTP_TIMEOUT_MS: "2500",
            LOG_LEVEL: "debug",
        });

        expect(config).toEqual({
            apiKey: "test-key",
            baseUrl: "http://localhost:8080/owm",
            timeoutMs: 2500,
            logLevel: "debug",
        });
    });

    it("treats blank values as unset", () => {
        expect(loadConfig({ OPENWEATHER_API_KEY: "", WEATHER_HTTP_TIMEOUT_MS: "  " }).apiKey).toBeUndefined();
    });

    it("returns a frozen value", () => {
        expect(Object.isFrozen(loadConfig({ OPENWEATHER_API_KEY: "test-key" }))).toBe(true);
    });

    it.each([
        ["WEATHER_HTTP_TIMEOUT_MS", "soon"],
        ["WEATHER_HTTP_TIMEOUT_MS", "-5"],
        ["OPENWEATHER_BASE_URL", "not a url"],
        ["LOG_LEVEL", "verbose"],
    ])("rejects %s=%s", (variable, value) => {
        expect(() => loadConfig({ [variable]: value })).toThrow(ConfigError);
        expect(() => loadConfig({ [variable]: value })).toThrow(`Invalid ${variable}:`);
    });
});
