import { z } from "zod";

export const NonEmptyStringSchema = z.string().min(1);
export const IsoDateTimeSchema = z.string().datetime({ offset: true });
export const NonNegativeNumberSchema = z.number().nonnegative();
export const NonNegativeIntSchema = z.number().int().nonnegative();
export const PositiveIntSchema = z.number().int().positive();
