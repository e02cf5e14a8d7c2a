import { z } from "zod";

export const coordSchema = z.object({
  lon: z.number(),
  lat: z.number()
});

export const conditionSchema = z.object({
  id: z.number().int(),
  main: z.string(),
  description: z.string(),
  icon: z.string()
});

export const mainSchema = z.object({
  temp: z.number(),
  feels_like: z.number().optional(),
  pressure: z.number(),
  humidity: z.number(),
  temp_min: z.number(),
  temp_max: z.number()
});

export const windSchema = z.object({
  speed: z.number(),
  // Absent in calm conditions.
  deg: z.number().optional()
});

export const cloudsSchema = z.object({
  all: z.number()
});

// Accumulated precipitation (mm) over the last hour / three hours.
export const rainSchema = z.object({
  "1h": z.number().optional(),
  "3h": z.number().optional()
});

export const sysSchema = z.object({
  type: z.number().int().optional(),
  id: z.number().int().optional(),
  // Numeric in the provider's documents despite the name.
  message: z.number().optional(),
  // Absent for coordinates outside any country, e.g. open ocean.
  country: z.string().optional(),
  sunrise: z.number().int(),
  sunset: z.number().int()
});

export const currentWeatherResponseSchema = z.object({
  coord: coordSchema,
  weather: z.array(conditionSchema),
  main: mainSchema,
  wind: windSchema,
  rain: rainSchema.optional(),
  clouds: cloudsSchema,
  base: z.string().optional(),
  visibility: z.number().int().optional(),
  dt: z.number().int(),
  id: z.number().int(),
  name: z.string().optional(),
  sys: sysSchema
});

export const citySchema = z.object({
  id: z.number().int(),
  name: z.string()
});

export const forecastEntrySchema = z.object({
  dt: z.number().int(),
  main: mainSchema,
  weather: z.array(conditionSchema),
  clouds: cloudsSchema,
  wind: windSchema
});

export const forecastResponseSchema = z.object({
  city: citySchema,
  coord: coordSchema.optional(),
  country: z.string().optional(),
  list: z.array(forecastEntrySchema)
});

/** Shape of the document the provider returns instead of data, e.g. for a bad key. */
export const providerErrorSchema = z.object({
  cod: z.union([z.string(), z.number()]),
  message: z.string()
});

export type Coord = z.infer<typeof coordSchema>;
export type Condition = z.infer<typeof conditionSchema>;
export type MainMeasurements = z.infer<typeof mainSchema>;
export type Wind = z.infer<typeof windSchema>;
export type Clouds = z.infer<typeof cloudsSchema>;
export type Rain = z.infer<typeof rainSchema>;
export type Sys = z.infer<typeof sysSchema>;
export type CurrentWeatherResponse = z.infer<typeof currentWeatherResponseSchema>;
export type City = z.infer<typeof citySchema>;
export type ForecastEntry = z.infer<typeof forecastEntrySchema>;
export type ForecastResponse = z.infer<typeof forecastResponseSchema>;
