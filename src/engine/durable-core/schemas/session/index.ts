import { z } from 'zod';
import { SESSION_RECORD_SCHEMA_VERSION } from '../../constants.js';
import { asSessionId, asSha256Digest } from '../../ids/index.js';
import { PIPELINE_STEPS, type StepMarkers } from '../../domain/resume-resolver.js';

const sha256DigestSchema = z
  .string()
  .regex(/^sha256:[0-9a-f]{64}$/, 'Expected sha256:<64 hex chars>')
  .transform(asSha256Digest);

const absolutePathSchema = z
  .string()
  .min(1)
  .refine((p) => p.startsWith('/') || /^[A-Za-z]:[\\/]/.test(p), 'Path must be absolute');

/**
 * Stored copy of the step markers. A hint for humans reading the record;
 * `load` always replaces it with a fresh probe.
 */
export const StoredStepMarkersSchema = z.object({
  interviewComplete: z.boolean(),
  manifestValid: z.boolean(),
  splitDirs: z.array(z.string()),
  splitsWithSpecs: z.array(z.string()),
});

export type StoredStepMarkers = z.infer<typeof StoredStepMarkersSchema>;

export function toStoredMarkers(markers: StepMarkers): StoredStepMarkers {
  return {
    interviewComplete: markers.interviewComplete,
    manifestValid: markers.manifest.kind === 'present',
    splitDirs: [...markers.splitDirs],
    splitsWithSpecs: [...markers.splitsWithSpecs],
  };
}

/**
 * Session record, one file per (sessionId, inputPath).
 */
export const SessionRecordV1Schema = z.object({
  v: z.literal(SESSION_RECORD_SCHEMA_VERSION),
  sessionId: z.string().min(1).transform(asSessionId),
  inputPath: absolutePathSchema,
  inputFingerprint: sha256DigestSchema,
  planningDir: absolutePathSchema,
  createdAt: z.string().datetime(),
  updatedAt: z.string().datetime(),
  lastResolvedStep: z.enum(PIPELINE_STEPS),
  stepMarkers: StoredStepMarkersSchema,
});

export type SessionRecord = z.output<typeof SessionRecordV1Schema>;
