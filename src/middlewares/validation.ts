/**
 * Validation Middleware
 * Validates request bodies against Zod schemas.
 */

import type { Request, Response, NextFunction } from "express";
import { ZodError, type ZodTypeAny } from "zod";

/**
 * Validates request body against a Zod schema.
 * Returns 400 with validation errors if invalid.
 */
export function validateBody(schema: ZodTypeAny) {
  return (req: Request, res: Response, next: NextFunction) => {
    try {
      req.body = schema.parse(req.body ?? {});
      next();
    } catch (error) {
      if (error instanceof ZodError) {
        res.status(400).json({
          error: error.issues[0]?.message ?? "Validation failed",
          kind: "validation",
          details: error.issues.map((e) => ({
            path: e.path.join("."),
            message: e.message,
          })),
        });
      } else {
        next(error);
      }
    }
  };
}
