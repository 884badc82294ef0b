import { z } from "zod";

export const NonEmptyStringSchema = z.string().min(1);
export const IsoDateTimeSchema = z.string().datetime({ offset: true });
export const NonNegativeNumberSchema = z.number().nonnegative();
export const PositiveIntegerSchema = z.number().int().positive();
export const JsonRecordSchema = z.record(z.string(), z.unknown());

/**
 * Unix permission bits. JSON has no octal literals, so "0640" / "640" strings
 * are read as octal; plain numbers are taken as-is.
 */
export const FileModeSchema = z
  .union([z.number().int(), z.string().regex(/^0?[0-7]{3,4}$/, "expected an octal mode such as \"0640\"")])
  .transform((value) => (typeof value === "number" ? value : Number.parseInt(value, 8)))
  .pipe(z.number().int().min(0).max(0o7777));
