import type { Request, Response, NextFunction } from "express";
import { MapNotFoundError } from "@roadsearch/search";
import { RequestValidationError } from "../errors.js";
import type { ErrorBody } from "../models/responses.js";

export interface ErrorResponse {
  status: number;
  body: ErrorBody;
}

/** HTTP status and body for a thrown value, or undefined for non-errors */
export function toErrorResponse(err: unknown): ErrorResponse | undefined {
  if (err instanceof RequestValidationError) {
    return { status: err.status, body: { message: err.message, details: err.fields } };
  }

  if (err instanceof MapNotFoundError) {
    return { status: 404, body: { message: err.message } };
  }

  if (err instanceof Error) {
    const status = "status" in err && typeof err.status === "number" ? err.status : 500;
    return { status, body: { message: err.message } };
  }

  return undefined;
}

export function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  next: NextFunction,
): void {
  const response = toErrorResponse(err);
  if (!response) {
    next(err);
    return;
  }

  if (err instanceof RequestValidationError) {
    console.warn(`[validation] ${JSON.stringify(err.fields)}`);
  } else {
    console.error(`[error] ${response.body.message}`);
  }
  res.status(response.status).json(response.body);
}
