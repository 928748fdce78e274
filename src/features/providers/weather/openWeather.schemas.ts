import { z } from "zod";

export const CurrentWeatherSchema = z.object({
    weather: z
        .array(
            z.object({
                main: z.string(),
                description: z.string().optional(),
            })
        )
        .min(1),
    main: z.object({
        temp: z.number(),
    }),
    name: z.string().optional(),
});

export type CurrentWeather = z.infer<typeof CurrentWeatherSchema>;
