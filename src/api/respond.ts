import type { Response } from "express";
import type { ErrorKind, Failure } from "../types/contracts.js";

const STATUS: Record<ErrorKind, number> = {
  invalid_payload: 400,
  not_found: 404,
  conflict: 409,
  internal: 500
};

export function sendFailure(res: Response, f: Failure) {
  res.status(STATUS[f.error]).json(f);
}
