import { z } from "zod";

/**
 * OpenSky state vector. Only the leading fields are typed; later positions
 * (sensors, squawk, spi, position source, category) pass through untyped.
 */
export const StateVectorSchema = z
    .tuple([
        z.string(), // icao24
        z.string().nullable(), // callsign
        z.string(), // origin_country
        z.number().nullable(), // time_position
        z.number(), // last_contact
        z.number().nullable(), // longitude
        z.number().nullable(), // latitude
        z.number().nullable(), // baro_altitude (m)
        z.boolean(), // on_ground
        z.number().nullable(), // velocity (m/s)
        z.number().nullable(), // true_track (deg)
        z.number().nullable(), // vertical_rate (m/s)
        z.unknown(), // sensors
        z.number().nullable(), // geo_altitude (m)
    ])
    .rest(z.unknown());

export const StatesResponseSchema = z.object({
    time: z.number(),
    states: z.array(z.array(z.unknown())).nullable(),
});

export const TokenResponseSchema = z.object({
    access_token: z.string().min(1),
    expires_in: z.number().positive(),
});

export type StateVector = z.infer<typeof StateVectorSchema>;
export type StatesResponse = z.infer<typeof StatesResponseSchema>;
