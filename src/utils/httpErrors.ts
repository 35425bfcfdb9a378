import { Response } from 'express';
import { InvalidInputError, RecorderFailureError, isConfigurationError } from '../services/presence';

/**
 * Maps presence errors to HTTP responses:
 * InvalidInput 400, InvalidGeometry/InvalidTimeWindow 500, RecorderFailure 503.
 * Anything else is logged and answered with 500 and `failureMessage`.
 */
export function sendError(res: Response, error: unknown, failureMessage: string): void {
  if (error instanceof InvalidInputError) {
    res.status(400).json({ error: error.kind, message: error.message, issues: error.issues });
    return;
  }

  if (isConfigurationError(error)) {
    res.status(500).json({ error: error.kind, message: error.message });
    return;
  }

  if (error instanceof RecorderFailureError) {
    res.status(503).json({
      error: error.kind,
      message: error.message,
      identity: error.request.identity,
      timestamp: error.request.timestamp.toISOString(),
      decision: error.decision,
    });
    return;
  }

  console.error(`${failureMessage}:`, error);
  res.status(500).json({ error: failureMessage });
}
