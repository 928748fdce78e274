import { z } from "zod";

const optionalText = z.string().nullish().transform((v) => v ?? null);

const IsoDateSchema = z
    .string()
    .datetime({ offset: true })
    .nullish()
    .transform((v) => (v ? new Date(v) : null));

export const AeroAirportSchema = z
    .object({
        code: optionalText,
        code_icao: optionalText,
        code_iata: optionalText,
        name: optionalText,
        city: optionalText,
        timezone: optionalText,
    })
    .nullish()
    .transform((v) => v ?? null);

export const AeroFlightSchema = z.object({
    ident: z.string(),
    fa_flight_id: optionalText,
    status: optionalText,
    aircraft_type: optionalText,
    cancelled: z.boolean().nullish(),
    origin: AeroAirportSchema,
    destination: AeroAirportSchema,
    scheduled_out: IsoDateSchema,
    estimated_out: IsoDateSchema,
    actual_out: IsoDateSchema,
    actual_off: IsoDateSchema,
    actual_on: IsoDateSchema,
    scheduled_in: IsoDateSchema,
    estimated_in: IsoDateSchema,
    actual_in: IsoDateSchema,
    gate_origin: optionalText,
    gate_destination: optionalText,
    terminal_origin: optionalText,
    terminal_destination: optionalText,
});

export const AeroFlightsResponseSchema = z.object({
    flights: z.array(AeroFlightSchema),
});

export type AeroFlight = z.infer<typeof AeroFlightSchema>;
export type AeroAirport = z.infer<typeof AeroAirportSchema>;
