export * from "./domain/errors";
export type { ICompatibilityReport, CompatibilityMode } from "./domain/interfaces/ICompatibility";
export type { ICompiledSchema } from "./domain/interfaces/ICompiledSchema";
export type { IContract } from "./domain/interfaces/IContract";
export type { ILogDriver } from "./domain/interfaces/ILogDriver";
export type { ILogger, LogLevel } from "./domain/interfaces/ILogger";
export type { ISchemaCache } from "./domain/interfaces/ISchemaCache";
export type { ISchemaRegistryClient } from "./domain/interfaces/ISchemaRegistryClient";
export type { ISubjectNamer, SubjectStrategy } from "./domain/interfaces/ISubjectNamer";
export {
  INT_MAX,
  INT_MIN,
  describeType,
  fullName,
  isPrimitiveType,
  type EnumType,
  type FieldSchema,
  type FieldType,
  type FieldValue,
  type MapType,
  type PrimitiveType,
  type PrimitiveValue,
  type RecordSchema,
} from "./domain/schema/RecordSchema";
export { freezeRecord } from "./domain/freezeRecord";

export { BinaryRecordDecoder } from "./infrastructure/binarySchema/BinaryRecordDecoder";
export { BinaryRecordEncoder } from "./infrastructure/binarySchema/BinaryRecordEncoder";
export { WireFrame } from "./infrastructure/binary/WireFrame";
export { RecordBuilder, type BuildInput, type Invariant } from "./infrastructure/builder/RecordBuilder";
export { SchemaCache } from "./infrastructure/cache/SchemaCache";
export { CompatibilityChecker } from "./infrastructure/compatibility/CompatibilityChecker";
export {
  LOG_LEVELS,
  loadConfig,
  type LogConfig,
  type LogLevelName,
  type RegistryConfig,
  type SerdeConfig,
} from "./infrastructure/config/loadConfig";
export { LogBuffer, type LogBufferOptions } from "./infrastructure/logging/LogBuffer";
export { WinstonLogDriver, createWinstonLogger } from "./infrastructure/logging/WinstonLogDriver";
export {
  AvroSchemaMapper,
  type AvroField,
  type AvroFieldType,
  type AvroRecord,
} from "./infrastructure/registry/AvroSchemaMapper";
export {
  HttpSchemaRegistryClient,
  type FetchLike,
  type HttpSchemaRegistryOptions,
} from "./infrastructure/registry/HttpSchemaRegistryClient";
export {
  InMemorySchemaRegistry,
  type SubjectVersion,
} from "./infrastructure/registry/InMemorySchemaRegistry";
export type { ResolutionPlan, SchemaViolation } from "./infrastructure/resolution/ResolutionPlan";
export { ResolutionPlanner } from "./infrastructure/resolution/ResolutionPlanner";
export { canonicalForm, fingerprint } from "./infrastructure/schema/CanonicalForm";
export { SchemaCompiler } from "./infrastructure/schema/SchemaCompiler";

export { Serde } from "./application/Serde";
export { SerdeFactory, type SerdeDependencies } from "./application/factories/SerdeFactory";
export type { ISerde } from "./application/interfaces/ISerde";
export { SubjectNamer } from "./application/services/SubjectNamer";
