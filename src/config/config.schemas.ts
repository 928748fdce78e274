import { z } from "zod";

export const WEEKDAYS = ["sun", "mon", "tue", "wed", "thu", "fri", "sat"] as const;

const TimeOfDaySchema = z
    .string()
    .regex(/^([01]\d|2[0-3]):[0-5]\d$/, "expected HH:MM (00:00-23:59)")
    .transform((v) => {
        const [hh, mm] = v.split(":");
        return Number(hh) * 60 + Number(mm);
    });

const WeekdaySchema = z
    .enum(WEEKDAYS)
    .transform((day) => WEEKDAYS.indexOf(day));

export const OperationalWindowSchema = z.object({
    start: TimeOfDaySchema,
    end: TimeOfDaySchema,
    days: z.array(WeekdaySchema).default([...WEEKDAYS]),
});

export const BudgetLimitSchema = z
    .object({
        quota: z.number().int().nonnegative(),
        windowSeconds: z.number().int().positive(),
    })
    .transform(({ quota, windowSeconds }) => ({ quota, windowMs: windowSeconds * 1000 }));

const ProviderLimitsSchema = z.array(BudgetLimitSchema).default([]);

export const FlightQuerySchema = z
    .object({
        number: z
            .string()
            .trim()
            .toUpperCase()
            .regex(/^[A-Z]{3}\d{1,4}[A-Z]?$/, "expected an ICAO callsign such as AAL123"),
        date: z
            .string()
            .regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD")
            .optional(),
    })
    .transform(({ number, date }) => ({ flightNumber: number, date }));

export const TrackerConfigSchema = z.object({
    flight: FlightQuerySchema,
    window: OperationalWindowSchema,
    budgets: z.object({
        position: ProviderLimitsSchema,
        schedule: ProviderLimitsSchema,
        weather: ProviderLimitsSchema,
    }),
    pollIntervalSeconds: z.number().int().positive().default(60),
    timeoutsSeconds: z
        .object({
            position: z.number().positive().default(10),
            schedule: z.number().positive().default(10),
            weather: z.number().positive().default(5),
        })
        .default({}),
    scheduleCacheMinutes: z.number().nonnegative().default(60),
    weatherUnits: z.enum(["imperial", "metric"]).default("imperial"),
    display: z
        .object({
            timeFormat: z.enum(["12H", "24H"]).default("24H"),
        })
        .default({}),
    usageFile: z.string().min(1).optional(),
    logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

const optionalSecret = z
    .string()
    .trim()
    .optional()
    .transform((v) => (v ? v : undefined));

export const CredentialsSchema = z
    .object({
        OPENSKY_CLIENT_ID: optionalSecret,
        OPENSKY_CLIENT_SECRET: optionalSecret,
        AEROAPI_KEY: z.string().trim().min(1, "AEROAPI_KEY is required"),
        OPENWEATHERMAP_API_KEY: z.string().trim().min(1, "OPENWEATHERMAP_API_KEY is required"),
    })
    .refine(
        (env) => Boolean(env.OPENSKY_CLIENT_ID) === Boolean(env.OPENSKY_CLIENT_SECRET),
        { message: "OPENSKY_CLIENT_ID and OPENSKY_CLIENT_SECRET must be set together" }
    )
    .transform((env) => ({
        openSky:
            env.OPENSKY_CLIENT_ID && env.OPENSKY_CLIENT_SECRET
                ? { clientId: env.OPENSKY_CLIENT_ID, clientSecret: env.OPENSKY_CLIENT_SECRET }
                : null,
        aeroApiKey: env.AEROAPI_KEY,
        openWeatherMapKey: env.OPENWEATHERMAP_API_KEY,
    }));

export type TrackerConfigInput = z.input<typeof TrackerConfigSchema>;
export type TrackerConfig = z.infer<typeof TrackerConfigSchema>;
export type Credentials = z.infer<typeof CredentialsSchema>;
