import { z } from 'zod';
import type { Template } from './types';

// ============================================================
// Template
// ============================================================

const positiveInt = z.number().int().positive();

const FieldValidationSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('checkbox') }),
  z.object({ type: z.literal('dropdown'), values: z.array(z.string()).min(1) }),
]);

export const TemplateSchema: z.ZodType<Template> = z
  .object({
    metaDataFields: z.record(z.string()),
    commentFields: z.object({
      comments: z.string(),
      summary: z.string(),
      notes: z.string(),
    }),
    values: z.object({
      defaultBarCount: positiveInt,
      commentsRowHeight: positiveInt,
    }),
    validation: z.record(FieldValidationSchema),
  })
  .superRefine((template, ctx) => {
    for (const key of Object.keys(template.validation)) {
      if (!(key in template.metaDataFields)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['validation', key],
          message: `"${key}" is not a metaDataFields key`,
        });
      }
    }
  });

export class TemplateError extends Error {
  constructor(
    public readonly issues: z.ZodIssue[],
    message: string
  ) {
    super(message);
    this.name = 'TemplateError';
  }
}

/**
 * Validate a parsed template JSON value
 * @throws TemplateError listing every problem found
 */
export function parseTemplate(value: unknown): Template {
  const result = TemplateSchema.safeParse(value);
  if (!result.success) {
    const lines = result.error.issues.map(issue =>
      `${issue.path.join('.') || '(root)'}: ${issue.message}`
    );
    throw new TemplateError(result.error.issues, `Invalid template:\n${lines.join('\n')}`);
  }
  return result.data;
}

// ============================================================
// Runtime settings
// ============================================================

const RuntimeConfigSchema = z.object({
  SCORE_SHEETS_LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
  GOOGLE_APPLICATION_CREDENTIALS: z.string().min(1).optional(),
});

export interface RuntimeConfig {
  logLevel: string;
  /** Service account key file; application default credentials when unset */
  credentialsPath?: string;
}

export function loadRuntimeConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const parsed = RuntimeConfigSchema.parse(env);
  return {
    logLevel: parsed.SCORE_SHEETS_LOG_LEVEL,
    credentialsPath: parsed.GOOGLE_APPLICATION_CREDENTIALS,
  };
}
