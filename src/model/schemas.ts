/**
 * Zod runtime validation for situation documents.
 *
 * A situation lists persons and households; each entity maps variable
 * names to `{ period: value }`. A `null` value asks for the variable to be
 * computed. Households also carry their ordered `members`.
 *
 *   {
 *     "persons": { "anna": { "salary": { "2025-01": 3000 } } },
 *     "households": { "home": { "members": ["anna"], "disposable_income": { "2025-01": null } } }
 *   }
 */

import { z } from 'zod'
import { InvalidPeriodError, Period } from '../engine'

// ── Reusable validators ──────────────────────────────────────────

/** `YYYY` or `YYYY-MM` with a real month. */
const periodKeySchema = z.string().superRefine((key, ctx) => {
  try {
    Period.parse(key)
  } catch (err) {
    if (!(err instanceof InvalidPeriodError)) throw err
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: err.message })
  }
})

const situationValueSchema = z.union([z.number().finite(), z.boolean(), z.string(), z.null()])

const periodValuesSchema = z.record(periodKeySchema, situationValueSchema)

const entityIdSchema = z.string().min(1, 'Entity ids must not be empty')

const memberListSchema = z.array(entityIdSchema)

// ── Entities ─────────────────────────────────────────────────────

const personSchema = z.record(z.string(), periodValuesSchema)

/**
 * `members` sits beside the variables in the document; it is split out so
 * the rest of the record is uniformly variables.
 */
const householdSchema = z
  .record(z.string(), z.union([memberListSchema, periodValuesSchema]))
  .transform((entry, ctx) => {
    const members = entry.members
    if (!Array.isArray(members)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['members'],
        message: 'A household must list its members',
      })
      return z.NEVER
    }

    const variables: Record<string, PeriodValues> = {}
    for (const [name, values] of Object.entries(entry)) {
      if (name === 'members') continue
      if (Array.isArray(values)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [name],
          message: `"${name}" must map periods to values`,
        })
        return z.NEVER
      }
      variables[name] = values
    }
    return { members, variables }
  })

// ── Situation ────────────────────────────────────────────────────

export const situationSchema = z.object({
  persons: z.record(entityIdSchema, personSchema),
  households: z.record(entityIdSchema, householdSchema),
})

export type SituationValue = z.infer<typeof situationValueSchema>
export type PeriodValues = z.infer<typeof periodValuesSchema>
export type EntityVariables = Record<string, PeriodValues>
export type HouseholdEntry = z.infer<typeof householdSchema>
export type Situation = z.infer<typeof situationSchema>
/** The document shape, before `members` is split from the variables. */
export type SituationDocument = z.input<typeof situationSchema>

export function parseSituation(input: unknown): Situation {
  return situationSchema.parse(input)
}
