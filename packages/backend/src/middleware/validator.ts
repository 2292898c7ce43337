import type { RequestHandler } from "express";
import type { ApiErrorResponse } from "@graphqa/shared";
import type { ZodIssue, ZodTypeAny } from "zod";

interface ValidationSchemas {
  body?: ZodTypeAny;
  params?: ZodTypeAny;
}

interface ValidationIssue {
  path: string;
  message: string;
}

function toIssues(issues: ZodIssue[]): ValidationIssue[] {
  return issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message
  }));
}

/**
 * Replaces `req.body` and `req.params` with their parsed values. Issues from
 * every part are reported together.
 */
export const validate = (schemas: ValidationSchemas): RequestHandler => {
  return (req, res, next) => {
    const issues: ValidationIssue[] = [];

    if (schemas.body) {
      const parsed = schemas.body.safeParse(req.body);
      if (parsed.success) {
        req.body = parsed.data;
      } else {
        issues.push(...toIssues(parsed.error.issues));
      }
    }

    if (schemas.params) {
      const parsed = schemas.params.safeParse(req.params);
      if (parsed.success) {
        req.params = parsed.data;
      } else {
        issues.push(...toIssues(parsed.error.issues));
      }
    }

    if (issues.length > 0) {
      const response: ApiErrorResponse = { error: "Validation failed", details: issues };
      res.status(400).json(response);
      return;
    }

    next();
  };
};
