import type { DailyForecast, ForecastEntry } from "./types.js";

const MIDDAY_MINUTES = 12 * 60;

export interface DailyGroup {
    date: string;
    midday: ForecastEntry;
    entries: ForecastEntry[];
}

function minutesOfDay(entry: ForecastEntry): number {
    const [hours = "0", minutes = "0"] = entry.dt_txt.slice(11).split(":");
    return Number(hours) * 60 + Number(minutes);
}

/**
 * Collapses a 3-hourly series into one representative entry per calendar day:
 * the entry nearest 12:00 of the series' own clock, earlier timestamp on a tie.
 * Only the first `days` dates are kept, in chronological order.
 */
export function groupByDay(entries: readonly ForecastEntry[], days: number): DailyGroup[] {
    const sorted = [...entries].sort((a, b) => a.dt - b.dt);
    const groups: DailyGroup[] = [];

    for (const entry of sorted) {
        const date = entry.dt_txt.slice(0, 10);
        let group = groups.at(-1);
        if (group?.date !== date) {
            if (groups.length === days) break;
            group = { date, midday: entry, entries: [] };
            groups.push(group);
        }
        group.entries.push(entry);

        const distance = Math.abs(minutesOfDay(entry) - MIDDAY_MINUTES);
        const best = Math.abs(minutesOfDay(group.midday) - MIDDAY_MINUTES);
        // strict: equidistant entries keep the earlier one
        if (distance < best) {
            group.midday = entry;
        }
    }
    return groups;
}

export function summarizeDay(group: DailyGroup): DailyForecast {
    const { midday, entries } = group;
    return {
        date: group.date,
        temperature: midday.main.temp,
        minTemperature: Math.min(...entries.map((entry) => entry.main.temp_min)),
        maxTemperature: Math.max(...entries.map((entry) => entry.main.temp_max)),
        description: midday.weather[0]?.description ?? "",
        humidity: midday.main.humidity,
    };
}
