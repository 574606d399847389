export { ConfigError } from "./ConfigError";
export {
  ContractError,
  asContractError,
  type ContractErrorParams,
  type ErrorCode,
} from "./ContractError";
export { IncompatibleSchemaError } from "./IncompatibleSchemaError";
export { MalformedMessageError } from "./MalformedMessageError";
export { RegistryRequestError } from "./RegistryRequestError";
export { RegistryUnavailableError } from "./RegistryUnavailableError";
export { SchemaDefinitionError } from "./SchemaDefinitionError";
export { SchemaMismatchError } from "./SchemaMismatchError";
export { UnknownSchemaError } from "./UnknownSchemaError";
export { ValidationError, type FieldIssue } from "./ValidationError";
