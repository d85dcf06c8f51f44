/**
 * itemfield: typed attributes, dirty tracking and DynamoDB marshalling for
 * document models.
 *
 * @example
 * ```ts
 * import { createClient, defineModel, field } from "itemfield";
 * import { createSDKv3DocAdapter } from "itemfield/adapters/sdk-v3-doc";
 *
 * const Address = defineModel({
 *   name: "Address",
 *   fields: {
 *     city: "string",
 *     deliverable: "boolean",
 *     visits: field("integer", { default: 0 }),
 *   },
 * });
 *
 * const home = Address.build({ city: "Chicago", visits: "101" });
 * home.get("visits"); // 101
 * home.changedFields(); // Set { "city", "visits" }
 *
 * const addresses = createClient({ adapter }).model(Address);
 * await addresses.save(home);
 * ```
 */

// Model definition
export { defineModel } from "./core/define-model.js";
export { field } from "./fields/field.js";
export { createClient } from "./core/create-client.js";
export type { ClientConfig, ItemFieldClient } from "./core/create-client.js";
export type {
  FindOptions,
  KeyInput,
  ModelClient,
} from "./persistence/model-client.js";

// Model and field types
export type {
  AttributeInput,
  AttributeShape,
  ChildModelConfig,
  ModelAttributes,
  ModelConfig,
  ModelDefinition,
  TimestampAttributes,
  WriteOptions,
} from "./types/model.js";
export { TIMESTAMP_FIELDS } from "./types/model.js";
export type {
  DefaultValue,
  FieldDeclaration,
  FieldMetadata,
  FieldOptions,
  FieldSpec,
  FieldSpecs,
  FieldType,
  FieldValueMap,
  InferAttributes,
  Serializer,
} from "./types/field.js";
export { FIELD_TYPES } from "./types/field.js";

// Documents
export type { AttributeValues, Document } from "./document/document.js";
export type { AttributeChange } from "./document/dirty-ledger.js";
export type {
  AccessorTarget,
  AccessorWrapper,
} from "./document/accessors.js";
export type { FieldRegistry } from "./fields/registry.js";

// Coercion
export { castValue, dumpValue, loadValue } from "./coercion/registry.js";

// Configuration
export { configure, getConfig, resetConfig } from "./config/config.js";
export type { ConfigInput, ItemFieldConfig } from "./config/config.js";
export { consoleLogger, silentLogger } from "./config/logger.js";
export type { LogContext, Logger } from "./config/logger.js";

// Errors and results
export {
  ConfigError,
  ItemFieldError,
  TypeCastError,
  UnknownFieldError,
} from "./errors/errors.js";
export type { ConfigIssue, ItemFieldErrorType } from "./errors/errors.js";
export type { DynamoError } from "./types/operations.js";
export { createDynamoError } from "./types/operations.js";
export type { Result } from "./types/common.js";
export { ok, err } from "./types/common.js";

// Adapter interface
export type {
  SDKAdapter,
  WireItem,
  PutItemInput,
  GetItemInput,
  GetItemOutput,
  UpdateItemInput,
  DeleteItemInput,
} from "./adapters/adapter.js";

// Marshalling
export { marshallItem, marshallValue } from "./marshalling/marshall.js";
export { unmarshallItem, unmarshallValue } from "./marshalling/unmarshall.js";
export type { AttributeValue, AttributeMap } from "./marshalling/types.js";
export { MarshallingError } from "./marshalling/types.js";
