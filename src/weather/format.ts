import type { CurrentWeather, Forecast } from "./types.js";

const WEEKDAYS = ["Sunday", "Monday", "Tuesday", "Wednesday", "Thursday", "Friday", "Saturday"];
const MONTHS = [
    "January", "February", "March", "April", "May", "June",
    "July", "August", "September", "October", "November", "December",
];

export function titleCase(text: string): string {
    return text.replace(/\b\w/g, (letter) => letter.toUpperCase());
}

export function displayName(name: string, country: string | undefined, fallback: string): string {
    const city = name.trim() || fallback;
    return country ? `${city}, ${country}` : city;
}

// "2024-06-01" -> "Saturday, June 01"
export function formatDay(date: string): string {
    const [year = 0, month = 1, day = 1] = date.split("-").map(Number);
    const weekday = new Date(Date.UTC(year, month - 1, day)).getUTCDay();
    return `${WEEKDAYS[weekday]}, ${MONTHS[month - 1]} ${String(day).padStart(2, "0")}`;
}

export function formatCurrentWeather(weather: CurrentWeather): string {
    const feelsLike = weather.feelsLike === undefined ? "" : ` (feels like ${weather.feelsLike}°C)`;
    return [
        `Current weather for ${weather.location}`,
        `Temperature: ${weather.temperature}°C${feelsLike}`,
        `Conditions: ${titleCase(weather.description)}`,
        `Humidity: ${weather.humidity}%`,
        `Wind speed: ${weather.windSpeed} m/s`,
        `Pressure: ${weather.pressure} hPa`,
    ].join("\n");
}

export function formatForecast(forecast: Forecast): string {
    if (forecast.days.length === 0) {
        return `No forecast data available for ${forecast.location}`;
    }

    const formattedDays = forecast.days.map((day) => [
        `${formatDay(day.date)} (${day.date})`,
        `  Temperature: ${day.temperature}°C (low ${day.minTemperature}°C, high ${day.maxTemperature}°C)`,
        `  Conditions: ${titleCase(day.description)}`,
        `  Humidity: ${day.humidity}%`,
    ].join("\n"));

    return `${forecast.days.length}-day forecast for ${forecast.location}\n\n${formattedDays.join("\n\n")}`;
}
