import { describe, expect, it } from "vitest";
import { displayName, formatCurrentWeather, formatDay, formatForecast, titleCase } from "../src/weather/format.js";

describe("formatCurrentWeather", () => {
    it("prints one field per line in a fixed order", () => {
        const text = formatCurrentWeather({
            location: "London, GB",
            temperature: 15.3,
            feelsLike: 14.8,
            humidity: 82,
            windSpeed: 4.1,
            pressure: 1012,
            description: "light rain",
        });

        expect(text).toBe([
            "Current weather for London, GB",
            "Temperature: 15.3°C (feels like 14.8°C)",
            "Conditions: Light Rain",
            "Humidity: 82%",
            "Wind speed: 4.1 m/s",
            "Pressure: 1012 hPa",
        ].join("\n"));
    });

    it("leaves out feels-like when the provider has none", () => {
        const text = formatCurrentWeather({
            location: "Oslo",
            temperature: -3,
            humidity: 70,
            windSpeed: 0,
            pressure: 1030,
            description: "snow",
        });

        expect(text.split("\n")[1]).toBe("Temperature: -3°C");
    });
});

describe("formatForecast", () => {
    it("prints a header and one block per day", () => {
        const text = formatForecast({
            location: "Paris, FR",
            days: [
                { date: "2024-06-01", temperature: 21, minTemperature: 14, maxTemperature: 23, description: "clear sky", humidity: 40 },
                { date: "2024-06-02", temperature: 18.5, minTemperature: 12.2, maxTemperature: 19, description: "moderate rain", humidity: 88 },
            ],
        });

        expect(text).toBe([
            "2-day forecast for Paris, FR",
            "",
            "Saturday, June 01 (2024-06-01)",
            "  Temperature: 21°C (low 14°C, high 23°C)",
            "  Conditions: Clear Sky",
            "  Humidity: 40%",
            "",
            "Sunday, June 02 (2024-06-02)",
            "  Temperature: 18.5°C (low 12.2°C, high 19°C)",
            "  Conditions: Moderate Rain",
            "  Humidity: 88%",
        ].join("\n"));
    });

    it("says so when the series is empty", () => {
        expect(formatForecast({ location: "Paris, FR", days: [] })).toBe("No forecast data available for Paris, FR");
    });
});

describe("helpers", () => {
    it("title-cases descriptions", () => {
        expect(titleCase("overcast clouds")).toBe("Overcast Clouds");
    });

    it("names the weekday of a series date", () => {
        expect(formatDay("2024-12-31")).toBe("Tuesday, December 31");
    });

    it("falls back to the query when the provider returns no name", () => {
        expect(displayName("", "JP", "35.68,139.69")).toBe("35.68,139.69, JP");
        expect(displayName("Lyon", undefined, "lyon")).toBe("Lyon");
    });
});
