/**
 * Validation schemas for the exercise catalog file
 */

import { z } from "zod"
import type { ViolationKind } from "../query/error.js"
import type { ExerciseCategory } from "./types.js"

export const EXERCISE_CATEGORIES = [
  "constraint",
  "index",
  "procedure",
  "function",
  "view",
  "trigger",
  "query",
] as const satisfies readonly ExerciseCategory[]

const VIOLATION_KINDS = [
  "not_null",
  "unique",
  "foreign_key",
  "check",
  "exclusion",
  "check_option",
  "integrity",
] as const satisfies readonly ViolationKind[]

// JSON can only carry these; dates are written as ISO strings
const CellSchema = z.union([z.string(), z.number(), z.boolean(), z.null()])

const RowsSchema = z.array(z.array(CellSchema))

const Statement = z.string().trim().min(1)

const Identifier = z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, {
  message: "must be a plain identifier",
})

const Described = { description: z.string().min(1) }

export const CheckSchema = z.discriminatedUnion("kind", [
  z.object({ ...Described, kind: z.literal("accepts"), sql: Statement }),
  z.object({
    ...Described,
    kind: z.literal("rejects"),
    sql: Statement,
    violation: z.enum(VIOLATION_KINDS).optional(),
  }),
  z.object({
    ...Described,
    kind: z.literal("rows"),
    sql: Statement,
    expected: RowsSchema,
    ordered: z.boolean().optional(),
  }),
  z.object({
    ...Described,
    kind: z.literal("scalar"),
    sql: Statement,
    expected: CellSchema,
  }),
  z.object({
    ...Described,
    kind: z.literal("result"),
    expected: RowsSchema,
    columns: z.array(z.string().min(1)).optional(),
    ordered: z.boolean().optional(),
  }),
  z.object({
    ...Described,
    kind: z.literal("index"),
    table: Identifier,
    index: Identifier.optional(),
    columns: z.array(z.string().min(1)).min(1),
  }),
  z.object({
    ...Described,
    kind: z.literal("constraint"),
    table: Identifier,
    type: z.enum(["PRIMARY KEY", "UNIQUE", "CHECK", "FOREIGN KEY"]),
    columns: z.array(Identifier),
  }),
  z.object({
    ...Described,
    kind: z.literal("view"),
    view: Identifier,
    checkOption: z.enum(["NONE", "LOCAL", "CASCADED"]).optional(),
  }),
  z.object({
    ...Described,
    kind: z.literal("trigger"),
    table: Identifier,
    trigger: Identifier,
    timing: z.enum(["BEFORE", "AFTER", "INSTEAD OF"]),
    events: z.array(z.enum(["INSERT", "UPDATE", "DELETE", "TRUNCATE"])).min(1),
  }),
  z.object({
    ...Described,
    kind: z.literal("routine"),
    routine: Identifier,
    type: z.enum(["FUNCTION", "PROCEDURE"]),
  }),
])

export const CatalogEntrySchema = z.object({
  name: z.string().regex(/^[a-z][a-z0-9_]*$/, {
    message: "must be lower case letters, digits and underscores",
  }),
  category: z.enum(EXERCISE_CATEGORIES),
  /** The SQL file, relative to the catalog directory */
  file: z.string().min(1),
  /** Optional fixture run before the exercise, relative to the catalog */
  setup: z.string().min(1).optional(),
  expectedEffect: z.string().min(1),
  checks: z.array(CheckSchema).default([]),
})

export type CatalogEntry = z.infer<typeof CatalogEntrySchema>

export const CatalogSchema = z.object({
  exercises: z.array(CatalogEntrySchema),
})
