import { Request, Response, NextFunction } from "express";
import { z, ZodType } from "zod";

type Middleware = (req: Request, res: Response, next: NextFunction) => void;

const sendValidationError = (res: Response, error: z.ZodError): void => {
  const errors = error.issues.map((issue) => ({
    field: issue.path.map(String).join("."),
    message: issue.message,
  }));

  res.status(400).json({
    error: "validation_error",
    details: errors,
  });
};

const sendUnexpectedError = (res: Response): void => {
  res.status(500).json({
    error: "internal_error",
    message: "Validation failed unexpectedly",
  });
};

/**
 * Validation middleware factory
 * Creates middleware that validates request body against a Zod schema
 */
export const validateBody = <T extends ZodType>(schema: T): Middleware => {
  return (req: Request, res: Response, next: NextFunction): void => {
    try {
      // Replace req.body with validated data (ensures type safety)
      req.body = schema.parse(req.body);
      next();
    } catch (error) {
      if (error instanceof z.ZodError) {
        sendValidationError(res, error);
      } else {
        sendUnexpectedError(res);
      }
    }
  };
};

/**
 * Validation middleware factory for query strings
 * Replaces req.query with the parsed (and coerced) values
 */
export const validateQuery = <T extends ZodType>(schema: T): Middleware => {
  return (req: Request, res: Response, next: NextFunction): void => {
    try {
      const validated = schema.parse(req.query);
      // req.query is a getter on newer express releases, so redefine instead of assigning
      Object.defineProperty(req, "query", { value: validated, writable: true, configurable: true });
      next();
    } catch (error) {
      if (error instanceof z.ZodError) {
        sendValidationError(res, error);
      } else {
        sendUnexpectedError(res);
      }
    }
  };
};
