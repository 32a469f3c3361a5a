export type InsightErrorKind =
  | 'MalformedCurrency'
  | 'MalformedWasteField'
  | 'MalformedPercentage'
  | 'DivisionByZero'
  | 'EmptyTable'
  | 'InvalidRow'
  | 'InvalidPeriod'
  | 'SourceUnavailable'
  | 'InvalidConfig';

export interface InsightErrorContext {
  table?: string;
  row?: number;
  cause?: unknown;
}

export class InsightDataError extends Error {
  readonly kind: InsightErrorKind;
  readonly table?: string;
  readonly row?: number;

  constructor(kind: InsightErrorKind, message: string, context: InsightErrorContext = {}) {
    super(message, context.cause !== undefined ? { cause: context.cause } : undefined);
    this.name = 'InsightDataError';
    this.kind = kind;
    this.table = context.table;
    this.row = context.row;
  }
}

export const isInsightDataError = (error: unknown): error is InsightDataError =>
  error instanceof InsightDataError;
