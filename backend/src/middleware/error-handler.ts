import type { ErrorRequestHandler } from 'express';
import multer from 'multer';
import { ZodError } from 'zod';
import {
  ConstraintViolationError,
  HttpError,
  SourceReadError,
  StorageUnavailableError,
  isPgError,
} from '../errors.js';

export const errorHandler: ErrorRequestHandler = (err, _req, res, _next) => {
  if (err instanceof ZodError) {
    return res.status(400).json({
      message: 'validation_failed',
      issues: err.issues,
    });
  }

  if (err instanceof multer.MulterError) {
    return res.status(400).json({
      message: err.code.toLowerCase(),
      field: err.field,
    });
  }

  if (err instanceof HttpError) {
    return res.status(err.statusCode).json({
      message: err.message,
      details: err.details,
    });
  }

  if (err instanceof StorageUnavailableError) {
    console.error('[api] storage unavailable:', err.cause ?? err.message);
    return res.status(503).json({
      message: 'storage_unavailable',
    });
  }

  if (err instanceof SourceReadError) {
    return res.status(422).json({
      message: err.message,
    });
  }

  if (err instanceof ConstraintViolationError) {
    return res.status(400).json({
      message: 'constraint_violation',
      issues: err.issues,
    });
  }

  if (isPgError(err)) {
    console.error(`[api] database error ${err.code}:`, err.message);
    return res.status(500).json({
      message: 'database_error',
      code: err.code,
    });
  }

  if (err instanceof Error) {
    return res.status(500).json({
      message: err.message,
    });
  }

  return res.status(500).json({
    message: 'internal_error',
  });
};
