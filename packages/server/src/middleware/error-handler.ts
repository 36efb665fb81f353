import type { Request, Response, NextFunction } from "express";
import type { ZodIssue } from "zod";
import { describeQueryError, type QueryError } from "@streetwise/types";

/** An error that carries its HTTP status */
export class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string,
  ) {
    super(message);
    this.name = "HttpError";
  }
}

/** Request parameters failed schema validation */
export class ValidationError extends Error {
  constructor(readonly issues: ZodIssue[]) {
    super("Validation failed");
    this.name = "ValidationError";
  }
}

const QUERY_ERROR_STATUS: Record<QueryError["kind"], number> = {
  "unknown-vertex": 422,
  "parse-failure": 422,
  "no-route": 404,
  "empty-graph": 503,
};

/** Map a query error value to the HTTP error the API reports for it. */
export function httpErrorFor(error: QueryError): HttpError {
  return new HttpError(QUERY_ERROR_STATUS[error.kind], describeQueryError(error));
}

export interface ErrorResponse {
  status: number;
  body: { message: string; details?: unknown };
}

/** Status and JSON body for anything thrown by a route. */
export function toErrorResponse(err: unknown): ErrorResponse {
  if (err instanceof ValidationError) {
    console.warn(`[validation] ${JSON.stringify(err.issues)}`);
    return {
      status: 422,
      body: {
        message: err.message,
        details: err.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message })),
      },
    };
  }

  if (err instanceof HttpError) {
    if (err.status >= 500) console.error(`[error] ${err.message}`);
    return { status: err.status, body: { message: err.message } };
  }

  const message = err instanceof Error ? err.message : String(err);
  console.error(`[error] ${message}`);
  return { status: 500, body: { message } };
}

export function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  next: NextFunction,
): void {
  if (res.headersSent) {
    next(err);
    return;
  }
  const { status, body } = toErrorResponse(err);
  res.status(status).json(body);
}
