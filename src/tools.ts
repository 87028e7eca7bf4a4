import z from "zod";
import { MAX_FORECAST_DAYS, MIN_FORECAST_DAYS, type WeatherAdapter } from "./weather/adapter.js";
import { formatCurrentWeather, formatForecast } from "./weather/format.js";
import { ToolRegistry } from "./registry.js";

const LOCATION_DESCRIPTION = "City name, optionally with a country code (e.g. 'London', 'Paris, FR', 'Jakarta')";

const locationSchema = z.string().trim().min(1, "must not be empty");

const UNKNOWN_PARAMETER = "not a recognised parameter";

const weatherArgs = z.object({
    location: locationSchema,
}).strict(UNKNOWN_PARAMETER);

const forecastArgs = z.object({
    location: locationSchema,
    days: z.number()
        .int("must be an integer")
        .min(MIN_FORECAST_DAYS, `must be between ${MIN_FORECAST_DAYS} and ${MAX_FORECAST_DAYS}`)
        .max(MAX_FORECAST_DAYS, `must be between ${MIN_FORECAST_DAYS} and ${MAX_FORECAST_DAYS}`)
        .default(MAX_FORECAST_DAYS),
}).strict(UNKNOWN_PARAMETER);

const readOnlyHints = {
    readOnlyHint: true,
    destructiveHint: false,
    idempotentHint: false, // the same city reports different weather over time
    openWorldHint: true, // calls OpenWeatherMap
};

export function createToolRegistry(adapter: WeatherAdapter): ToolRegistry {
    return new ToolRegistry()
        .register({
            descriptor: {
                name: "get_weather",
                title: "Current Weather",
                description: "Get current weather conditions for a location",
                inputSchema: {
                    type: "object",
                    properties: {
                        location: { type: "string", description: LOCATION_DESCRIPTION, minLength: 1 },
                    },
                    required: ["location"],
                    additionalProperties: false,
                },
                annotations: { title: "Current Weather", ...readOnlyHints },
            },
            schema: weatherArgs,
            handler: async ({ location }) => formatCurrentWeather(await adapter.getCurrentWeather(location)),
        })
        .register({
            descriptor: {
                name: "get_weather_forecast",
                title: "Weather Forecast",
                description: "Get a daily weather forecast (up to 5 days) for a location",
                inputSchema: {
                    type: "object",
                    properties: {
                        location: { type: "string", description: LOCATION_DESCRIPTION, minLength: 1 },
                        days: {
                            type: "integer",
                            description: `Number of days to forecast (${MIN_FORECAST_DAYS}-${MAX_FORECAST_DAYS})`,
                            minimum: MIN_FORECAST_DAYS,
                            maximum: MAX_FORECAST_DAYS,
                            default: MAX_FORECAST_DAYS,
                        },
                    },
                    required: ["location"],
                    additionalProperties: false,
                },
                annotations: { title: "Weather Forecast", ...readOnlyHints },
            },
            schema: forecastArgs,
            handler: async ({ location, days }) => formatForecast(await adapter.getForecast(location, days)),
        });
}
