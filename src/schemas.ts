import { z } from "zod";
import { getConfig, type OrchestratorConfig } from "./config.js";
import { ValidationError } from "./errors.js";

// ---------------------------------------------------------------------------
// Requests
// ---------------------------------------------------------------------------

const shortText = z.string().trim().min(1).max(64);

export const TaskConfigSchema = z.object({
  templateKind: shortText,
  maxSections: z.number().int().min(1),
  concurrency: z.number().int().min(1),
  includeImages: z.boolean(),
  imageStyle: shortText,
});

/** Submit request schema bounded by the given (or current) limits. */
export function submitRequestSchema(limits: OrchestratorConfig["limits"] = getConfig().limits) {
  return z
    .object({
      topic: z
        .string({ required_error: "topic is required" })
        .trim()
        .min(1, "topic must not be empty")
        .max(limits.maxTopicLength, `topic must be at most ${limits.maxTopicLength} characters`),
      config: z
        .object({
          templateKind: shortText.optional(),
          maxSections: z.number().int().min(1).max(limits.maxSectionsCeiling).optional(),
          concurrency: z.number().int().min(1).max(limits.maxConcurrencyPerTask).optional(),
          includeImages: z.boolean().optional(),
          imageStyle: shortText.optional(),
        })
        .strict()
        .optional(),
    })
    .strict();
}

// ---------------------------------------------------------------------------
// Role payloads
// ---------------------------------------------------------------------------

export const FindingSchema = z.object({
  source: z.string(),
  content: z.string(),
  credibility: z.number().min(0).max(1),
});

export const FindingsSchema = z.object({
  topic: z.string(),
  items: z.array(FindingSchema),
});

export const OutlineSectionSchema = z.object({
  id: z.string().min(1),
  title: z.string().min(1),
  summary: z.string().optional(),
  imagePrompt: z.string().min(1).optional(),
});

export const OutlineSchema = z.object({
  title: z.string().min(1),
  sections: z.array(OutlineSectionSchema).min(1),
});

export const ContentBlockSchema = z.object({
  sectionId: z.string().min(1),
  title: z.string(),
  markdown: z.string(),
});

export const ImageRefSchema = z.object({
  sectionId: z.string().min(1),
  uri: z.string().min(1),
  caption: z.string().optional(),
});

export const ArtifactHandleSchema = z.object({
  uri: z.string().min(1),
  mediaType: z.string().optional(),
  bytes: z.number().int().nonnegative().optional(),
});

// ---------------------------------------------------------------------------
// Task snapshots
// ---------------------------------------------------------------------------

export const TaskStatusSchema = z.enum(["pending", "running", "completed", "failed"]);
export const StageStatusSchema = z.enum(["pending", "running", "done", "failed", "skipped"]);

export const TaskErrorSchema = z.object({
  stage: z.string(),
  errorClass: z.string(),
  code: z.string(),
  message: z.string(),
});

export const UnitTelemetrySchema = z.object({
  index: z.number().int().nonnegative(),
  status: z.enum(["ok", "failed", "cancelled"]),
  attempts: z.number().int().nonnegative(),
  delaysMs: z.array(z.number().nonnegative()),
  durationMs: z.number().nonnegative(),
  error: TaskErrorSchema.omit({ stage: true }).optional(),
});

export const StageStateSchema = z.object({
  status: StageStatusSchema,
  required: z.boolean(),
  weight: z.number().positive(),
  startedAt: z.number().optional(),
  finishedAt: z.number().optional(),
  units: z.array(UnitTelemetrySchema),
  error: TaskErrorSchema.optional(),
  reason: z.string().optional(),
});

export const PipelineOutputsSchema = z.object({
  findings: FindingsSchema.optional(),
  outline: OutlineSchema.optional(),
  contentBlocks: z.array(ContentBlockSchema).optional(),
  imageRefs: z.array(ImageRefSchema).optional(),
});

export const TaskSnapshotSchema = z.object({
  id: z.string().min(1),
  topic: z.string(),
  /** `host:pid` of the process driving the task. */
  owner: z.string().optional(),
  config: TaskConfigSchema,
  status: TaskStatusSchema,
  progress: z.number().min(0).max(1),
  stages: z.record(StageStateSchema),
  outputs: PipelineOutputsSchema,
  error: TaskErrorSchema.optional(),
  artifact: ArtifactHandleSchema.optional(),
  createdAt: z.number(),
  updatedAt: z.number(),
  startedAt: z.number().optional(),
  finishedAt: z.number().optional(),
});

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Format zod issues as `path: message` joined by "; ". */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

/** Parse `data` or throw a ValidationError naming every issue. */
export function parseOrThrow<S extends z.ZodTypeAny>(schema: S, data: unknown, label?: string): z.infer<S> {
  const result = schema.safeParse(data);
  if (!result.success) {
    const msg = formatIssues(result.error);
    throw new ValidationError("VALIDATION_FAILED", label ? `${label}: ${msg}` : msg, { cause: result.error });
  }
  return result.data;
}
