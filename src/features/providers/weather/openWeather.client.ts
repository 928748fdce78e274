import round from "lodash/round";
import { buildURL, request, type FetchFn } from "../../../lib/http";
import { isApiError } from "../../../lib/errors";
import {
    found,
    notFound,
    type ProviderClient,
    type ProviderResult,
    type WeatherLocation,
    type WeatherReport,
    type WeatherUnits,
} from "../providers.types";
import { CurrentWeatherSchema, type CurrentWeather } from "./openWeather.schemas";

export const OPENWEATHER_BASE_URL = "https://api.openweathermap.org";

type OpenWeatherOptions = {
    apiKey: string;
    units?: WeatherUnits;
    baseUrl?: string;
    fetchFn?: FetchFn;
};

export function toWeatherReport(w: CurrentWeather, units: WeatherUnits): WeatherReport {
    const [first] = w.weather;
    return {
        condition: first.main,
        description: first.description ?? null,
        temperature: round(w.main.temp),
        units,
        locationName: w.name ? w.name : null,
    };
}

export class OpenWeatherClient implements ProviderClient<WeatherLocation, WeatherReport> {
    readonly id = "weather" as const;
    readonly name = "OpenWeatherMap";

    private readonly apiKey: string;
    private readonly units: WeatherUnits;
    private readonly baseUrl: string;
    private readonly fetchFn?: FetchFn;

    constructor(options: OpenWeatherOptions) {
        this.apiKey = options.apiKey;
        this.units = options.units ?? "imperial";
        this.baseUrl = options.baseUrl ?? OPENWEATHER_BASE_URL;
        this.fetchFn = options.fetchFn;
    }

    async query(location: WeatherLocation, timeoutMs: number): Promise<ProviderResult<WeatherReport>> {
        const place =
            location.kind === "city"
                ? { q: location.city }
                : { lat: location.latitude, lon: location.longitude };
        const url = buildURL(this.baseUrl, "/data/2.5/weather", {
            ...place,
            units: this.units,
            appid: this.apiKey,
        });

        try {
            const res = await request(url, {
                method: "GET",
                timeoutMs,
                schema: CurrentWeatherSchema,
                fetchFn: this.fetchFn,
            });
            return found(toWeatherReport(res, this.units));
        } catch (e) {
            if (isApiError(e) && e.status === 404) return notFound();
            throw e;
        }
    }
}
