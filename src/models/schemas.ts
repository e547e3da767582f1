/**
 * Record Schemas
 *
 * Zod schemas for the JSON records the API returns. Only the keys the models
 * rely on are declared; everything else passes through untouched so it stays
 * reachable via `model.get(key)`.
 */

import { z } from 'zod'

const id = z.union([z.string(), z.number()]).transform(String)

export const organizationSummarySchema = z
  .object({
    id: id.optional(),
    slug: z.string(),
    name: z.string().optional(),
  })
  .passthrough()

export const organizationSchema = z
  .object({
    id,
    slug: z.string(),
    name: z.string(),
    dateCreated: z.string().optional(),
  })
  .passthrough()

export const teamSchema = z
  .object({
    id,
    slug: z.string(),
    name: z.string(),
    memberCount: z.number().optional(),
    organization: organizationSummarySchema.optional(),
  })
  .passthrough()

export const projectSchema = z
  .object({
    id,
    slug: z.string(),
    name: z.string(),
    platform: z.string().nullable().optional(),
    organization: organizationSummarySchema.optional(),
  })
  .passthrough()

export const issueStatusSchema = z.enum(['resolved', 'unresolved', 'ignored', 'resolvedInNextRelease'])

export const issueSchema = z
  .object({
    id,
    shortId: z.string().optional(),
    title: z.string(),
    culprit: z.string().nullable().optional(),
    status: z.string(),
    level: z.string().optional(),
    count: z.union([z.string(), z.number()]).optional(),
    userCount: z.number().optional(),
    firstSeen: z.string().nullable().optional(),
    lastSeen: z.string().nullable().optional(),
    permalink: z.string().optional(),
    project: z
      .object({ id: id.optional(), slug: z.string(), name: z.string().optional() })
      .passthrough()
      .optional(),
  })
  .passthrough()

export const tagSchema = z
  .object({
    key: z.string(),
    value: z.string().nullable(),
  })
  .passthrough()

export const eventSchema = z
  .object({
    id,
    eventID: z.string().optional(),
    groupID: z.string().nullable().optional(),
    title: z.string().optional(),
    message: z.string().nullable().optional(),
    dateCreated: z.string().optional(),
    platform: z.string().nullable().optional(),
    tags: z.array(tagSchema).default([]),
  })
  .passthrough()

export const integrationSchema = z
  .object({
    id,
    name: z.string(),
    domainName: z.string().nullable().optional(),
    status: z.string().optional(),
    provider: z
      .object({
        key: z.string(),
        slug: z.string().optional(),
        name: z.string(),
      })
      .passthrough(),
  })
  .passthrough()

/** `[epochSeconds, count]` pairs from the project stats endpoint */
export const eventCountsSchema = z.array(z.tuple([z.number(), z.number()]))

/**
 * Fields an update response reports back. Some endpoints answer with a
 * partial record or with no body at all; both merge into the current record.
 */
export const changesSchema = z.record(z.unknown()).nullish().transform((value) => value ?? {})

/** Summary of the fields a bulk issue update changed */
export const issueChangesSchema = changesSchema

export type OrganizationRecord = z.infer<typeof organizationSchema>
export type TeamRecord = z.infer<typeof teamSchema>
export type ProjectRecord = z.infer<typeof projectSchema>
export type IssueRecord = z.infer<typeof issueSchema>
export type IssueStatus = z.infer<typeof issueStatusSchema>
export type EventRecord = z.infer<typeof eventSchema>
export type IntegrationRecord = z.infer<typeof integrationSchema>
export type IssueChanges = z.infer<typeof issueChangesSchema>
