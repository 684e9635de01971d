import { symbolError } from "./symbols";
import type { IValidationSchema } from "./utilities";

export type DefaultErrorType = Record<string, unknown>;

export interface IErrorDefinition<
  TData extends DefaultErrorType = DefaultErrorType,
> {
  id: string;
  format?: (data: TData) => string;
  /**
   * Advice appended by toString() after the main message.
   */
  remediation?: string | ((data: TData) => string);
  /**
   * Validate error data on throw(). If provided, data is parsed first.
   */
  dataSchema?: IValidationSchema<TData>;
}

/**
 * Error instances thrown by every helper. `name` carries the helper id so
 * callers can branch on the cause without instanceof checks per kind.
 */
export interface ICodecError<TData extends DefaultErrorType = DefaultErrorType>
  extends Error {
  readonly id: string;
  readonly data: TData;
  readonly remediation?: string;
}

/**
 * Runtime helper returned by error().build().
 * Contains helpers to throw typed errors and perform type-safe checks.
 */
export interface IErrorHelper<
  TData extends DefaultErrorType = DefaultErrorType,
> {
  /** Unique id, also used as the thrown error's name */
  id: string;
  /** Build the error without throwing it */
  create(data: TData): ICodecError<TData>;
  /** Throw a typed error with the given data */
  throw(data: TData): never;
  /** Type guard for checking if an unknown error is this error */
  is(error: unknown): error is ICodecError<TData>;
  /** Message plus remediation advice */
  toString(error: ICodecError<TData>): string;
  /** Brand symbol for runtime detection */
  [symbolError]: true;
}
