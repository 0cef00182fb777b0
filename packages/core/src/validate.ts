import type { z } from 'zod';

import { ValidationError } from './errors.js';
import { NotebookResourceSchema } from './schemas.js';
import type { NotebookResource } from './types.js';

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
  );
}

/**
 * Validate a MarimoNotebook object read from the API server and apply the
 * CRD defaults. Throws ValidationError listing every failing field.
 */
export function parseNotebookResource(obj: unknown): NotebookResource {
  const result = NotebookResourceSchema.safeParse(obj);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ValidationError(`invalid MarimoNotebook: ${issues.join('; ')}`, issues);
  }
  return result.data;
}
