/**
 * @module validation
 * @description Zod schemas for every value a caller hands the library.
 *
 * Producer-supplied values (option objects, hex strings, raw numbers)
 * can fail these checks. Decoded header fields pass through the same
 * branding constructors, but their byte width already keeps them in
 * range, so on the decode path the parse always succeeds.
 */

import { z } from "zod";
import { PacketError } from "./interfaces/codec.js";

// ─── Scalars ────────────────────────────────────────────────────────

export const ByteSchema = z.number().int().min(0).max(0xff);

export const PrioritySchema = ByteSchema;

export const SequenceSchema = z.number().int().min(0).max(0xffffffff);

export const TimestampSchema = z.union([
  z.number().int().min(0).max(Number.MAX_SAFE_INTEGER),
  z.bigint().min(0n).max(0xffffffffffffffffn),
]);

export const SessionIdHexSchema = z
  .string()
  .regex(/^[0-9a-fA-F]{32}$/, "expected 32 hex characters");

// ─── Option Objects ─────────────────────────────────────────────────

export const PacketOptionsSchema = z.object({
  priority: PrioritySchema.optional(),
  sequence: SequenceSchema.optional(),
  timestamp: TimestampSchema.optional(),
});

export const LogLevelSchema = z.enum(["debug", "info", "warn", "error", "silent"]);

/** A clock reading in ms; fractional readings such as performance.now() are allowed. */
export const ClockReadingSchema = z
  .number()
  .finite()
  .min(0)
  .max(Number.MAX_SAFE_INTEGER);

export const DispatcherConfigSchema = z.object({
  logLevel: LogLevelSchema.optional(),
  logTag: z.string().min(1).optional(),
  json: z.boolean().optional(),
});

// ─── Helpers ────────────────────────────────────────────────────────

/**
 * Parses `value` against `schema`.
 *
 * @throws {PacketError} code=INVALID_FIELD naming `field` and every issue.
 */
export function parseField<T>(
  schema: z.ZodType<T>,
  value: unknown,
  field: string
): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) =>
        issue.path.length > 0
          ? `${issue.path.join(".")}: ${issue.message}`
          : issue.message
      )
      .join("; ");
    throw new PacketError(`Invalid ${field}: ${issues}`, "INVALID_FIELD");
  }
  return result.data;
}
