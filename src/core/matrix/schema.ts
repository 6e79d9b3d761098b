/**
 * On-disk formats: the per-matrix manifest and the per-project marker.
 */
import { z } from 'zod';

export const ProjectEntrySchema = z.object({
  /** Absolute path of the project root */
  path: z.string().min(1),
  /** ISO-8601 registration time */
  registered: z.string(),
});

export const ManifestSchema = z.object({
  name: z.string().min(1),
  /** ISO-8601 creation time */
  created: z.string(),
  /** Keyed by project name, which keeps names unique within the matrix */
  projects: z.record(z.string(), ProjectEntrySchema).default({}),
  verticals: z.array(z.string()).default([]),
});

export const ProjectMarkerSchema = z.object({
  matrix: z.string().min(1),
  project: z.string().min(1),
  registered: z.string().optional(),
});

export type ProjectEntry = z.infer<typeof ProjectEntrySchema>;
export type Manifest = z.infer<typeof ManifestSchema>;
export type ProjectMarker = z.infer<typeof ProjectMarkerSchema>;
