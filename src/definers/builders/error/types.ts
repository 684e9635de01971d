import type {
  DefaultErrorType,
  IValidationSchema,
} from "../../../defs";

/**
 * Internal state for the ErrorFluentBuilder.
 * Kept immutable and frozen.
 */
export type BuilderState<TData extends DefaultErrorType> = Readonly<{
  id: string;
  format?: (data: TData) => string;
  remediation?: string | ((data: TData) => string);
  dataSchema?: IValidationSchema<TData>;
}>;
