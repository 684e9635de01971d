export * from "./codec";
export { defineType } from "./definers/builders/type";
export type { TypeFluentBuilder } from "./definers/builders/type";
export { isTypeDefinition } from "./definers/defineType";
export { error } from "./definers/builders/error";
export { CodecError } from "./definers/defineError";
export * from "./errors";
export {
  JsonHttpClient,
  createJsonHttpClient,
} from "./http/json-http-client";
export type {
  JsonHttpClientConfig,
  PostJsonResult,
} from "./http/json-http-client";
export { Logger } from "./models/Logger";
export type {
  ILog,
  ILogInfo,
  LogLevels,
  LoggerOptions,
  PrintStrategy,
} from "./models/Logger";
export { LogPrinter } from "./models/LogPrinter";
export { EnvironmentManager } from "./models/EnvironmentManager";
export type {
  ConstructionDefinition,
  FieldDefinition,
  FieldOptions,
  MemberKind,
  TypeDefinition,
} from "./types/typeDefinition";
export type {
  DefaultErrorType,
  ICodecError,
  IErrorHelper,
  IValidationSchema,
} from "./defs";
