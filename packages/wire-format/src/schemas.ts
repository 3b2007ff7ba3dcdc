/**
 * Zod schemas for the shapes that arrive on the wire.
 *
 * Decoded MessagePack is untyped; every decoder runs its mapping through one
 * of these before any message factory sees it.
 */

import { EID, EIDError } from "@dtnclient/eid"
import { z } from "zod"
import { InvalidMessageError } from "./errors.js"
import type { ArgValue } from "./message-types.js"

/** An EID in its canonical text form, converted to a validated EID */
export const eidSchema = z.string().transform((text, ctx) => {
  try {
    return EID.parse(text)
  } catch (error) {
    if (error instanceof EIDError) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: error.message })
      return z.NEVER
    }
    throw error
  }
})

/** Go encodes nil byte slices and nil slices as msgpack nil */
export const bytesSchema = z
  .instanceof(Uint8Array)
  .nullish()
  .transform(bytes => bytes ?? new Uint8Array(0))

export const argValueSchema: z.ZodType<ArgValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.bigint(),
    z.boolean(),
    z.null(),
    z.instanceof(Uint8Array),
    z.array(argValueSchema),
    z.record(z.string(), argValueSchema),
  ]),
)

/** The discriminant; 64-bit integers decode as bigint */
export const typeSchema = z
  .union([z.number().int(), z.bigint()])
  .transform(value => Number(value))

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue =>
      issue.path.length > 0
        ? `${issue.path.join(".")}: ${issue.message}`
        : issue.message,
    )
    .join("; ")
}

/**
 * Validate a decoded mapping against a schema.
 *
 * @throws InvalidMessageError naming the offending fields
 */
export function parseMapping<T extends z.ZodTypeAny>(
  variant: string,
  schema: T,
  mapping: unknown,
): z.output<T> {
  const result = schema.safeParse(mapping)
  if (!result.success) {
    throw new InvalidMessageError(
      "invalid_field",
      `Invalid ${variant} message: ${formatIssues(result.error)}`,
      { cause: result.error },
    )
  }
  return result.data
}
