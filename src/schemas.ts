/**
 * Zod schemas for the serialized interval forms.
 *
 * An interval travels as a `[start, end]` pair of `YYYY-MM-DD` strings where
 * `null` (or an empty string) stands for an unbounded side. A set travels as
 * a list of such pairs.
 */

import { z } from 'zod'

export const SerializedBoundSchema = z.string().nullish()

export const BoundPairSchema = z.tuple([SerializedBoundSchema, SerializedBoundSchema])

export const IntervalSetArraySchema = z.array(BoundPairSchema)

/** Wire form produced by `toArray()`. */
export type SerializedInterval = [string | null, string | null]

export type SerializedIntervalSet = SerializedInterval[]

/** Accepted by `fromArray()`: empty strings and missing values read as unbounded. */
export type BoundPairInput = z.input<typeof BoundPairSchema>

/** Joins zod issues into a single line for error messages. */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ')
}
