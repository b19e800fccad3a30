// controllers/httpHelpers.ts
import { Response } from 'express';
import { FailureKind, IDateRange, IFetchFailureOutcome, IOrchestratorError } from '../types';
import { DatePeriod } from '../utils/constants';
import { getDateRangeForPeriod } from '../utils/helpers';

const FAILURE_STATUS: Record<FailureKind, number> = {
  NotFound: 404,
  OutOfRange: 400,
  ClientError: 400,
  AuthFailure: 502,
  Transient: 503,
  InvalidResponse: 502,
  Unexpected: 502,
};

export const statusForFailure = (kind: FailureKind): number => FAILURE_STATUS[kind];

export const sendFailure = (res: Response, outcome: IFetchFailureOutcome) =>
  res.status(statusForFailure(outcome.error.kind)).json({
    success: false,
    kind: outcome.error.kind,
    message: outcome.error.message,
    attempts: outcome.attempts,
  });

export const sendConflict = (res: Response, error: IOrchestratorError) =>
  res.status(409).json({ success: false, kind: error.kind, message: error.message });

/**
 * Explicit dates win; otherwise the period counts back from endDate (or the latest available date).
 */
export const resolveDateRange = (
  query: { startDate?: string; endDate?: string; period: DatePeriod },
  latestDate: string
): IDateRange => {
  const endDate = query.endDate ?? latestDate;
  const startDate = query.startDate ?? getDateRangeForPeriod(query.period, endDate).startDate;
  return { startDate, endDate };
};
