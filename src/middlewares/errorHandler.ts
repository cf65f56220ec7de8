import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { HttpError } from '../utils/httpErrors';
import { sendError, sendServerError, sendValidationError } from '../middleware/responseHelper';

function formatZodIssues(err: ZodError): string[] {
  return err.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}

export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  if (err instanceof ZodError) {
    sendValidationError(res, formatZodIssues(err));
    return;
  }

  if (err instanceof HttpError) {
    sendError(res, err.message, err.statusCode, err.meta);
    return;
  }

  // body-parser marks malformed JSON with a 400 status
  if (err instanceof SyntaxError && 'status' in err && err.status === 400) {
    sendValidationError(res, 'Malformed JSON body');
    return;
  }

  console.error(`❌ SERVER ERROR on ${req.method} ${req.originalUrl}:`, err);
  sendServerError(res);
}

export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({
    ok: false,
    error: 'Not Found',
    path: req.originalUrl,
    method: req.method,
  });
}
