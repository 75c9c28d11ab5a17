/**
 * Evaluation errors
 *
 * Returned as values (neverthrow), never thrown.
 */

/** alpha or horizon outside its valid range */
export interface InvalidParameterError {
  type: "invalid_parameter";
  message: string;
  param?: string;
}

/** Missing, negative or non-numeric quote field */
export interface MalformedQuoteError {
  type: "malformed_quote";
  message: string;
  instrumentId?: string;
}

export interface UnknownOptionTypeError {
  type: "unknown_option_type";
  message: string;
  instrumentId?: string;
}

export type QuoteError = MalformedQuoteError | UnknownOptionTypeError;

export type EvaluationError = InvalidParameterError | QuoteError;

export function invalidParameter(message: string, param?: string): InvalidParameterError {
  return { type: "invalid_parameter", message, param };
}

export function malformedQuote(message: string, instrumentId?: string): MalformedQuoteError {
  return { type: "malformed_quote", message, instrumentId };
}

export function unknownOptionType(value: unknown, instrumentId?: string): UnknownOptionTypeError {
  return {
    type: "unknown_option_type",
    message: `Unknown option type: ${String(value)}`,
    instrumentId,
  };
}
