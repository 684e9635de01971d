import type {
  DefaultErrorType,
  ICodecError,
  IErrorDefinition,
  IErrorHelper,
} from "../types/error";
import { symbolError } from "../types/symbols";

export class CodecError<TData extends DefaultErrorType = DefaultErrorType>
  extends Error
  implements ICodecError<TData>
{
  public readonly data: TData;
  public readonly remediation?: string;

  constructor(
    public readonly id: string,
    message: string,
    data: TData,
    remediation?: string,
  ) {
    super(message, "cause" in data ? { cause: data.cause } : undefined);
    this.data = data;
    this.name = id;
    this.remediation = remediation;
  }
}

export class ErrorHelper<TData extends DefaultErrorType = DefaultErrorType>
  implements IErrorHelper<TData>
{
  [symbolError] = true as const;
  constructor(private readonly definition: IErrorDefinition<TData>) {}

  get id(): string {
    return this.definition.id;
  }

  create(data: TData): CodecError<TData> {
    const parsed = this.definition.dataSchema
      ? this.definition.dataSchema.parse(data)
      : data;
    const message = this.definition.format
      ? this.definition.format(parsed)
      : this.definition.id;
    const { remediation } = this.definition;
    const advice =
      typeof remediation === "function" ? remediation(parsed) : remediation;
    return new CodecError(this.definition.id, message, parsed, advice);
  }

  throw(data: TData): never {
    throw this.create(data);
  }

  is(error: unknown): error is CodecError<TData> {
    return error instanceof CodecError && error.name === this.definition.id;
  }

  toString(error: ICodecError<TData>): string {
    return error.remediation
      ? `${error.message}\n\nRemediation: ${error.remediation}`
      : error.message;
  }
}

/**
 * Create a new error helper from a plain definition.
 */
export function defineError<TData extends DefaultErrorType = DefaultErrorType>(
  definition: IErrorDefinition<TData>,
): ErrorHelper<TData> {
  return new ErrorHelper<TData>(definition);
}
