import { error } from "./definers/builders/error";
import type { DefaultErrorType } from "./types/error";

export enum CodecErrorId {
  UnsupportedType = "codec.errors.unsupportedType",
  DanglingReference = "codec.errors.danglingReference",
  MalformedNumber = "codec.errors.malformedNumber",
  UnsupportedKeyType = "codec.errors.unsupportedKeyType",
  ConstructorArity = "codec.errors.constructorArity",
  TypeMismatch = "codec.errors.typeMismatch",
  InvalidJson = "codec.errors.invalidJson",
  ReferenceMetadata = "codec.errors.referenceMetadata",
  CycleDetected = "codec.errors.cycleDetected",
  MaxDepthExceeded = "codec.errors.maxDepthExceeded",
  InvalidTypeDefinition = "codec.errors.invalidTypeDefinition",
  ConverterRegistry = "codec.errors.converterRegistry",
  InvalidOptions = "codec.errors.invalidOptions",
  LockedMapMutation = "codec.errors.lockedMapMutation",
  HttpBaseUrlRequired = "codec.errors.httpBaseUrlRequired",
  HttpStatus = "codec.errors.httpStatus",
  HttpTimeout = "codec.errors.httpTimeout",
}

// Type model

export const unsupportedTypeError = error<
  { typeName: string; path: string } & DefaultErrorType
>(CodecErrorId.UnsupportedType)
  .format(
    ({ typeName, path }) =>
      `Type "${typeName}" is not supported at ${path}`,
  )
  .remediation(
    "Register the class with defineType(...).build() on the codec's type model, or register a converter for it.",
  )
  .build();

export const invalidTypeDefinitionError = error<
  { typeName: string; message: string } & DefaultErrorType
>(CodecErrorId.InvalidTypeDefinition)
  .format(
    ({ typeName, message }) => `Invalid type definition for ${typeName}: ${message}`,
  )
  .remediation(
    "Declare every member once and make constructor parameters name declared, non-ignored members.",
  )
  .build();

// References

export const danglingReferenceError = error<
  { id: string; path: string } & DefaultErrorType
>(CodecErrorId.DanglingReference)
  .format(
    ({ id, path }) =>
      `Reference "${id}" at ${path} does not resolve to an object with that $id`,
  )
  .remediation(
    "Ensure every $ref names an $id present in the same document, and that constructor arguments do not reference the object being constructed.",
  )
  .build();

export const referenceMetadataError = error<
  { message: string; path: string } & DefaultErrorType
>(CodecErrorId.ReferenceMetadata)
  .format(({ message, path }) => `${message} at ${path}`)
  .remediation(
    "A $ref object must contain only $ref; $id values must be unique strings; preserved arrays must carry $values.",
  )
  .build();

export const cycleDetectedError = error<
  { typeName: string; path: string } & DefaultErrorType
>(CodecErrorId.CycleDetected)
  .format(
    ({ typeName, path }) =>
      `A cycle was detected at ${path}: the ${typeName} is already being encoded`,
  )
  .remediation(
    "Enable referenceHandling: ReferenceHandling.Preserve to encode shared and cyclic graphs.",
  )
  .build();

export const maxDepthExceededError = error<
  { maxDepth: number } & DefaultErrorType
>(CodecErrorId.MaxDepthExceeded)
  .format(({ maxDepth }) => `Maximum depth exceeded (${maxDepth})`)
  .remediation(
    "Increase maxDepth only when needed and validate untrusted payload size/depth limits.",
  )
  .build();

// Values

export const malformedNumberError = error<
  { value: string; path: string } & DefaultErrorType
>(CodecErrorId.MalformedNumber)
  .format(
    ({ value, path }) => `Value "${value}" at ${path} is not a valid number`,
  )
  .remediation(
    "Quoted numbers must follow the JSON number grammar; integer members reject fractions.",
  )
  .build();

export const typeMismatchError = error<
  { expected: string; actual: string; path: string } & DefaultErrorType
>(CodecErrorId.TypeMismatch)
  .format(
    ({ expected, actual, path }) =>
      `Expected ${expected} at ${path} but found ${actual}`,
  )
  .build();

export const unsupportedKeyTypeError = error<
  { keyType: string; path: string } & DefaultErrorType
>(CodecErrorId.UnsupportedKeyType)
  .format(
    ({ keyType, path }) =>
      `Dictionary key type "${keyType}" at ${path} has no string conversion`,
  )
  .remediation("Use string, number, integer or boolean dictionary keys.")
  .build();

export const constructorArityError = error<
  {
    typeName: string;
    parameter: string;
    path: string;
    cause?: unknown;
  } & DefaultErrorType
>(CodecErrorId.ConstructorArity)
  .format(({ typeName, parameter, path, cause }) =>
    cause === undefined
      ? `Constructor parameter "${parameter}" of ${typeName} is missing at ${path}`
      : `Constructor parameter "${parameter}" of ${typeName} does not match its declared type at ${path}`,
  )
  .build();

export const invalidJsonError = error<
  { message: string; cause?: unknown } & DefaultErrorType
>(CodecErrorId.InvalidJson)
  .format(({ message }) => `Invalid JSON: ${message}`)
  .build();

// Configuration

export const converterRegistryError = error<
  { message: string } & DefaultErrorType
>(CodecErrorId.ConverterRegistry)
  .format(({ message }) => message)
  .remediation(
    "Register converters once, before the registry is handed to a Codec.",
  )
  .build();

export const invalidOptionsError = error<
  { message: string } & DefaultErrorType
>(CodecErrorId.InvalidOptions)
  .format(({ message }) => message)
  .build();

export const lockedMapMutationError = error<
  { name: string } & DefaultErrorType
>(CodecErrorId.LockedMapMutation)
  .format(({ name }) => `Cannot modify "${name}": the map is locked.`)
  .build();

// HTTP helper

export const httpBaseUrlRequiredError = error<DefaultErrorType>(
  CodecErrorId.HttpBaseUrlRequired,
)
  .format(() => "createJsonHttpClient requires a baseUrl")
  .build();

export const httpStatusError = error<
  {
    url: string;
    status: number;
    statusText: string;
    bodyPreview?: string;
  } & DefaultErrorType
>(CodecErrorId.HttpStatus)
  .format(({ url, status, statusText }) =>
    statusText ? `HTTP ${status} ${statusText} for ${url}` : `HTTP ${status} for ${url}`,
  )
  .build();

export const httpTimeoutError = error<
  { url: string; timeoutMs: number } & DefaultErrorType
>(CodecErrorId.HttpTimeout)
  .format(({ url, timeoutMs }) => `Request to ${url} timed out after ${timeoutMs}ms`)
  .build();
