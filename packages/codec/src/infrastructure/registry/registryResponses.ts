import Ajv, { type JSONSchemaType } from "ajv";

export interface RegisterResponse {
  id: number;
}

export interface SchemaResponse {
  schema: string;
}

export interface CompatibilityResponse {
  is_compatible: boolean;
  messages?: string[];
}

export interface ErrorResponse {
  error_code?: number;
  message?: string;
}

const registerResponseSchema: JSONSchemaType<RegisterResponse> = {
  type: "object",
  properties: { id: { type: "integer", minimum: 0 } },
  required: ["id"],
};

const schemaResponseSchema: JSONSchemaType<SchemaResponse> = {
  type: "object",
  properties: { schema: { type: "string" } },
  required: ["schema"],
};

const compatibilityResponseSchema: JSONSchemaType<CompatibilityResponse> = {
  type: "object",
  properties: {
    is_compatible: { type: "boolean" },
    messages: { type: "array", items: { type: "string" }, nullable: true },
  },
  required: ["is_compatible"],
};

const errorResponseSchema: JSONSchemaType<ErrorResponse> = {
  type: "object",
  properties: {
    error_code: { type: "integer", nullable: true },
    message: { type: "string", nullable: true },
  },
  required: [],
};

const ajv = new Ajv();

export const isRegisterResponse = ajv.compile(registerResponseSchema);
export const isSchemaResponse = ajv.compile(schemaResponseSchema);
export const isCompatibilityResponse = ajv.compile(compatibilityResponseSchema);
export const isErrorResponse = ajv.compile(errorResponseSchema);
