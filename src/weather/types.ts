import z from "zod";

// Only the fields the adapter reads; OpenWeatherMap sends many more.
export const currentWeatherResponseSchema = z.object({
    name: z.string(),
    sys: z.object({ country: z.string().optional() }).optional(),
    main: z.object({
        temp: z.number(),
        feels_like: z.number().optional(),
        humidity: z.number(),
        pressure: z.number(),
    }),
    weather: z.array(z.object({ description: z.string() })).min(1),
    wind: z.object({ speed: z.number() }),
});

export const forecastEntrySchema = z.object({
    dt: z.number(),
    dt_txt: z.string().regex(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}(:\d{2})?$/, "expected \"YYYY-MM-DD HH:MM:SS\""),
    main: z.object({
        temp: z.number(),
        temp_min: z.number(),
        temp_max: z.number(),
        humidity: z.number(),
    }),
    weather: z.array(z.object({ description: z.string() })).min(1),
});

export const forecastResponseSchema = z.object({
    city: z.object({
        name: z.string(),
        country: z.string().optional(),
    }),
    list: z.array(forecastEntrySchema),
});

// OpenWeatherMap reports errors in the body as well as the status line
export const errorPayloadSchema = z.object({
    cod: z.union([z.string(), z.number()]),
    message: z.string().optional(),
});

export type ForecastEntry = z.infer<typeof forecastEntrySchema>;

export interface CurrentWeather {
    location: string;
    temperature: number;
    feelsLike?: number;
    humidity: number;
    windSpeed: number;
    pressure: number;
    description: string;
}

export interface DailyForecast {
    /** Calendar date of the series, YYYY-MM-DD. */
    date: string;
    temperature: number;
    minTemperature: number;
    maxTemperature: number;
    description: string;
    humidity: number;
}

export interface Forecast {
    location: string;
    days: DailyForecast[];
}
