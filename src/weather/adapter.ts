import { InvalidArgumentError } from "../errors.js";
import { groupByDay, summarizeDay } from "./forecast.js";
import { displayName } from "./format.js";
import type { OpenWeatherClient } from "./openweather-client.js";
import {
    currentWeatherResponseSchema,
    forecastResponseSchema,
    type CurrentWeather,
    type Forecast,
} from "./types.js";

export const MIN_FORECAST_DAYS = 1;
export const MAX_FORECAST_DAYS = 5;

export class WeatherAdapter {
    constructor(private readonly client: OpenWeatherClient) {}

    async getCurrentWeather(location: string): Promise<CurrentWeather> {
        const query = requireLocation(location);
        const data = await this.client.get("weather", query, currentWeatherResponseSchema);

        return {
            location: displayName(data.name, data.sys?.country, query),
            temperature: data.main.temp,
            feelsLike: data.main.feels_like,
            humidity: data.main.humidity,
            windSpeed: data.wind.speed,
            pressure: data.main.pressure,
            description: data.weather[0]?.description ?? "",
        };
    }

    async getForecast(location: string, days: number = MAX_FORECAST_DAYS): Promise<Forecast> {
        const query = requireLocation(location);
        if (!Number.isInteger(days) || days < MIN_FORECAST_DAYS || days > MAX_FORECAST_DAYS) {
            throw new InvalidArgumentError(
                "days",
                `must be an integer between ${MIN_FORECAST_DAYS} and ${MAX_FORECAST_DAYS}`,
            );
        }

        const data = await this.client.get("forecast", query, forecastResponseSchema);
        return {
            location: displayName(data.city.name, data.city.country, query),
            days: groupByDay(data.list, days).map(summarizeDay),
        };
    }
}

function requireLocation(location: string): string {
    const trimmed = location.trim();
    if (trimmed === "") {
        throw new InvalidArgumentError("location", "must not be empty");
    }
    return trimmed;
}
