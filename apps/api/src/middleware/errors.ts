import type { NextFunction, Request, Response } from "express";
import { AppError } from "../lib/errors.js";

export function notFoundHandler(req: Request, res: Response) {
  res.status(404).json({ message: `No route for ${req.method} ${req.path}` });
}

export function errorHandler(err: Error, _req: Request, res: Response, _next: NextFunction) {
  if (err instanceof AppError) {
    res.status(err.statusCode).json(err.toJSON());
    return;
  }

  // body-parser marks malformed JSON and oversized payloads with a 4xx status.
  const status = "status" in err && typeof err.status === "number" ? err.status : 500;
  if (status < 500) {
    res.status(status).json({ message: err.message });
    return;
  }

  res.status(500).json({ message: "Internal server error", detail: err.message });
}
