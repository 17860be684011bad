import { z } from "zod";

export const ParameterInfoSchema = z.object({
  description: z.string(),
  unit: z.string(),
  /** Plausible operating range; readings outside it are flagged for a check. */
  range: z.object({ min: z.number(), max: z.number() }).optional()
});

export type ParameterInfo = z.infer<typeof ParameterInfoSchema>;

const SPEED_RANGE = { min: 0, max: 50 };
const TEMPERATURE_RANGE = { min: -40, max: 60 };

// Tags the anemometer is known to emit. Anything else is still logged, just undescribed.
export const PARAMETER_CATALOG: Readonly<Record<string, ParameterInfo>> = {
  S: { description: "3D Wind Speed", unit: "m/s", range: SPEED_RANGE },
  S1: { description: "Sonic Speed 1", unit: "m/s", range: SPEED_RANGE },
  S2: { description: "2D Wind Speed", unit: "m/s", range: SPEED_RANGE },
  S3: { description: "Sonic Speed 3", unit: "m/s", range: SPEED_RANGE },
  D: { description: "Wind Direction", unit: "°" },
  U: { description: "U-Vector (Zonal Wind)", unit: "m/s" },
  V: { description: "V-Vector (Meridional Wind)", unit: "m/s" },
  W: { description: "W-Vector (Vertical Wind)", unit: "m/s" },
  T: { description: "Air Temperature", unit: "°C", range: TEMPERATURE_RANGE },
  T1: { description: "Temperature 1", unit: "°C", range: TEMPERATURE_RANGE },
  T2: { description: "Temperature 2", unit: "°C", range: TEMPERATURE_RANGE },
  H: { description: "Relative Humidity", unit: "%" },
  P: { description: "Atmospheric Pressure", unit: "hPa" },
  PI: { description: "Pitch Angle", unit: "°" },
  RO: { description: "Roll Angle", unit: "°" },
  MD: { description: "Magnetic Heading", unit: "°" },
  TD: { description: "True Heading", unit: "°" }
};

export function describeParameter(name: string): ParameterInfo | undefined {
  return Object.prototype.hasOwnProperty.call(PARAMETER_CATALOG, name) ? PARAMETER_CATALOG[name] : undefined;
}

export const ReadingQualitySchema = z.enum(["Good", "Check Range", "Unknown", "Invalid"]);

export type ReadingQuality = z.infer<typeof ReadingQualitySchema>;

export const AnnotatedFieldSchema = z.object({
  name: z.string(),
  value: z.string(),
  numeric: z.number().nullable(),
  description: z.string().nullable(),
  unit: z.string(),
  quality: ReadingQualitySchema
});

export type AnnotatedField = z.infer<typeof AnnotatedFieldSchema>;

export const COMPASS_POINTS = ["N", "NE", "E", "SE", "S", "SW", "W", "NW"] as const;

export type CompassPoint = (typeof COMPASS_POINTS)[number];
