import { vi } from "vitest";
import type { WeatherConfig } from "../src/config.js";
import type { FetchLike } from "../src/weather/openweather-client.js";
import type { ForecastEntry } from "../src/weather/types.js";

export const testConfig: WeatherConfig = {
    apiKey: "test-key",
    baseUrl: "https://weather.test/data/2.5",
    timeoutMs: 10_000,
    logLevel: "fatal",
};

export const londonNow = {
    cod: 200,
    name: "London",
    sys: { country: "GB" },
    main: { temp: 15.3, feels_like: 14.8, humidity: 82, pressure: 1012 },
    weather: [{ description: "light rain" }],
    wind: { speed: 4.1 },
};

export function jsonResponse(body: unknown, status = 200, statusText = ""): Response {
    return new Response(JSON.stringify(body), {
        status,
        statusText,
        headers: { "Content-Type": "application/json" },
    });
}

/** A fetch stand-in that answers every call with a fresh copy of the same response. */
export function stubFetch(body: unknown, status = 200, statusText = "") {
    return vi.fn<FetchLike>(async () => jsonResponse(body, status, statusText));
}

export function forecastEntry(date: string, time: string, temp: number, description = "few clouds"): ForecastEntry {
    return {
        dt: Date.parse(`${date}T${time}Z`) / 1000,
        dt_txt: `${date} ${time}`,
        main: { temp, temp_min: temp - 1, temp_max: temp + 1, humidity: 50 + Number(time.slice(0, 2)) },
        weather: [{ description }],
    };
}

/**
 * Five days of 3-hourly entries from 2024-06-01 00:00. On day N (0-based) the
 * temperature is N * 10 + hour / 3 and only the 12:00 entry is "clear sky".
 */
export function fiveDaySeries(): ForecastEntry[] {
    const entries: ForecastEntry[] = [];
    for (let day = 0; day < 5; day++) {
        const date = `2024-06-0${day + 1}`;
        for (let hour = 0; hour < 24; hour += 3) {
            const time = `${String(hour).padStart(2, "0")}:00:00`;
            entries.push(forecastEntry(date, time, day * 10 + hour / 3, hour === 12 ? "clear sky" : "few clouds"));
        }
    }
    return entries;
}

export function londonForecast(list: ForecastEntry[] = fiveDaySeries()) {
    return {
        cod: "200",
        cnt: list.length,
        list,
        city: { name: "London", country: "GB" },
    };
}
