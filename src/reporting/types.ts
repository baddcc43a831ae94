import { z } from 'zod';

export const RunCommandSummarySchema = z.object({
  index: z.number().int(),
  list: z.enum(['pre', 'override', 'post']),
  command: z.string(),
  exitCode: z.number().int().nullable(),
  signal: z.string().nullable(),
  duration: z.number(),
});

export const RunPhaseSummarySchema = z.object({
  name: z.string(),
  status: z.enum(['passed', 'failed', 'skipped']),
  duration: z.number(),
  commands: z.array(RunCommandSummarySchema),
  error: z.string().optional(),
  /** Last output lines of the failed command. */
  outputTail: z.array(z.string()).optional(),
});

export const RunCacheDirectorySchema = z.object({
  phase: z.string(),
  path: z.string(),
  resolved: z.string(),
  exists: z.boolean(),
});

const ReportBaseSchema = z.object({
  runId: z.string(),
  project: z.string(),
  manifest: z.string(),
  /** HEAD commit of the working directory, when it is a git repository. */
  revision: z.string().optional(),
  startTime: z.string(),
  endTime: z.string(),
  duration: z.number(),
  success: z.boolean(),
  exitCode: z.number().int(),
});

export const RunReportSchema = ReportBaseSchema.extend({
  kind: z.literal('run'),
  channel: z.string().optional(),
  interrupted: z.boolean(),
  phases: z.array(RunPhaseSummarySchema),
  cacheDirectories: z.array(RunCacheDirectorySchema),
});

export const MatrixReportSchema = ReportBaseSchema.extend({
  kind: z.literal('matrix'),
  channels: z.array(z.string()),
  runs: z.array(RunReportSchema),
});

export const ReportSchema = z.discriminatedUnion('kind', [RunReportSchema, MatrixReportSchema]);

export type RunCommandSummary = z.infer<typeof RunCommandSummarySchema>;
export type RunPhaseSummary = z.infer<typeof RunPhaseSummarySchema>;
export type RunCacheDirectory = z.infer<typeof RunCacheDirectorySchema>;
export type RunReport = z.infer<typeof RunReportSchema>;
export type MatrixReport = z.infer<typeof MatrixReportSchema>;
export type Report = z.infer<typeof ReportSchema>;
