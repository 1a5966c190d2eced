import type { Request, Response, NextFunction } from 'express';
import type { ZodError, ZodSchema } from 'zod';

export interface ValidationIssue {
  path: string;
  message: string;
}

export function formatIssues(error: ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}

/**
 * Generic Zod validation middleware.
 * Validates request body against the provided schema.
 */
export function validate(schema: ZodSchema) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const result = schema.safeParse(req.body ?? {});

    if (!result.success) {
      res.status(400).json({
        success: false,
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Validation failed',
          details: { issues: formatIssues(result.error) },
        },
      });
      return;
    }

    // Replace body with parsed/validated data
    req.body = result.data;
    next();
  };
}
