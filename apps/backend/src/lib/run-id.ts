import { NextFunction, Request, Response } from 'express';
import { v4 as uuidv4 } from 'uuid';

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** `YYYYMMDDHHmmss_xxxxxxxx`: local timestamp plus the head of a v4 uuid. */
export function createRunId(now: Date = new Date()): string {
  const stamp =
    `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}` +
    `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `${stamp}_${uuidv4().slice(0, 8)}`;
}

export function attachRunId(_req: Request, res: Response, next: NextFunction): void {
  res.locals.runId = createRunId();
  next();
}

export function getRunId(res: Response): string {
  const runId: unknown = res.locals.runId;
  return typeof runId === 'string' ? runId : 'unknown';
}
