import { z } from 'zod';
import { FIELD_LIMITS, JOB_STATUSES, SOURCE_IDS } from './job';

/**
 * Shape check applied to every record a parser or the capture endpoint builds.
 * A candidate failing it is dropped as a malformed item.
 */
export const canonicalJobSchema = z.object({
  id: z.string().regex(/^[0-9a-f]{16}$/),
  title: z.string().min(1).max(FIELD_LIMITS.title),
  company: z.string().min(1).max(FIELD_LIMITS.company),
  location: z.string().max(FIELD_LIMITS.location),
  url: z.string().min(1),
  source: z.enum(SOURCE_IDS),
  rawText: z.string().max(FIELD_LIMITS.rawText),
  description: z.string().max(FIELD_LIMITS.captureDescription).optional(),
  receivedAt: z.date().refine(date => !isNaN(date.getTime()), 'invalid date'),
});

const optionalText = z.string().trim().optional();

/**
 * Payload posted by the browser capture extension
 */
export const captureSubmissionSchema = z.object({
  url: z.string().trim().min(1, 'url is required'),
  title: z.string().trim().min(1, 'title is required'),
  company: optionalText,
  location: optionalText,
  description: optionalText,
  source: optionalText,
});

export type CaptureSubmission = z.infer<typeof captureSubmissionSchema>;

/**
 * Scoring output; unknown keys written by the scoring stage are kept
 */
export const jobAnalysisSchema = z
  .object({
    qualificationScore: z.number().optional(),
    shouldApply: z.boolean().optional(),
    strengths: z.array(z.string()).optional(),
    gaps: z.array(z.string()).optional(),
    recommendation: z.string().optional(),
  })
  .passthrough();

/**
 * A row of the jobs table as returned by pg
 */
export const jobRowSchema = z.object({
  id: z.string(),
  title: z.string(),
  company: z.string(),
  location: z.string(),
  url: z.string(),
  source: z.enum(SOURCE_IDS),
  raw_text: z.string(),
  description: z.string().nullable(),
  received_at: z.coerce.date(),
  status: z.enum(JOB_STATUSES),
  score: z.number().int(),
  analysis: jobAnalysisSchema.nullable(),
  cover_letter: z.string().nullable(),
  created_at: z.coerce.date(),
  updated_at: z.coerce.date(),
});

export type JobRow = z.infer<typeof jobRowSchema>;
