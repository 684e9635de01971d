export type {
  DefaultErrorType,
  IErrorDefinition,
  IErrorHelper,
  ICodecError,
} from "./types/error";
export type { IValidationSchema } from "./types/utilities";
export { symbolError, symbolTypeDefinition } from "./types/symbols";
