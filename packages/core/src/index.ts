export {
  AppError,
  AuthError,
  ConfigurationError,
  StoreError,
  describeError,
  formatErrorForLog
} from "./errors";
export { consoleLogger, logError, logInfo, toStructuredLog, type Logger } from "./log";
export {
  DECLARATION_MARKERS,
  getDeclaredOperation,
  isDeclarationMarker,
  op,
  vop,
  type DeclarationMarker,
  type OperationDeclaration
} from "./markers";
export {
  ALL_TAG,
  DEFAULT_TAG,
  HTTP_METHODS,
  OPERATION_TYPE,
  SYSTEM_OWNER,
  effectiveTags,
  formatFieldIssues,
  literalValueSchema,
  matchesOperationRef,
  operationRecordSchema,
  operationRefSchema,
  validateOperation,
  validateOperationRef,
  type FieldIssue,
  type HttpMethod,
  type LiteralValue,
  type OperationInput,
  type OperationParam,
  type OperationRecord,
  type OperationRef,
  type ValidationOutcome
} from "./model";
export { RegistrySynchronizer, type DeleteOutcome, type PartitionStore } from "./registry";
export { OperationRegistry, type RegistryResult } from "./service";
