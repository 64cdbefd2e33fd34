import { z } from 'zod';

import { SEVERITIES } from './types.js';

/**
 * The contract the analysis capability must meet: exactly these four
 * fields, all strings, severity from the fixed set. Nothing is defaulted.
 */
export const AnalysisRecordSchema = z
  .object({
    severity: z.enum(SEVERITIES),
    root_cause: z.string(),
    summary: z.string(),
    recommended_action: z.string(),
  })
  .strict();

export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((i) => {
      const where = i.path.length ? i.path.join('.') : '(root)';
      return `${where}: ${i.message}`;
    })
    .join('; ');
}
