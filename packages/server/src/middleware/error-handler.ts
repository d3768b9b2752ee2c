import type { Request, Response, NextFunction } from "express";
import { RequestValidationError } from "../errors.js";

function statusOf(err: Error): number {
  if ("status" in err && typeof err.status === "number") return err.status;
  return 500;
}

export function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  next: NextFunction,
): void {
  if (err instanceof RequestValidationError) {
    console.warn(`[validation] ${JSON.stringify(err.details)}`);
    res.status(422).json({
      message: err.message,
      details: err.details,
    });
    return;
  }

  if (err instanceof Error) {
    const status = statusOf(err);
    if (status >= 500) {
      console.error(`[error] ${err.stack ?? err.message}`);
      res.status(status).json({ message: "Internal server error" });
    } else {
      console.warn(`[error] ${status} ${err.message}`);
      res.status(status).json({ message: err.message });
    }
    return;
  }

  next(err);
}
