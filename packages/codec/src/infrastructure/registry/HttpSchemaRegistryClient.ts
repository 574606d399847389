import type { ValidateFunction } from "ajv";
import { IncompatibleSchemaError } from "../../domain/errors/IncompatibleSchemaError";
import { RegistryRequestError } from "../../domain/errors/RegistryRequestError";
import { RegistryUnavailableError } from "../../domain/errors/RegistryUnavailableError";
import { SchemaDefinitionError } from "../../domain/errors/SchemaDefinitionError";
import { UnknownSchemaError } from "../../domain/errors/UnknownSchemaError";
import type { ICompatibilityReport } from "../../domain/interfaces/ICompatibility";
import type { ILogger } from "../../domain/interfaces/ILogger";
import type { ISchemaRegistryClient } from "../../domain/interfaces/ISchemaRegistryClient";
import type { RecordSchema } from "../../domain/schema/RecordSchema";
import { SchemaCompiler } from "../schema/SchemaCompiler";
import { AvroSchemaMapper } from "./AvroSchemaMapper";
import {
  isCompatibilityResponse,
  isErrorResponse,
  isRegisterResponse,
  isSchemaResponse,
} from "./registryResponses";

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface HttpSchemaRegistryOptions {
  baseUrl: string;
  timeoutMs?: number;
  username?: string;
  password?: string;
  fetch?: FetchLike;
  compiler?: SchemaCompiler;
  logger?: ILogger;
}

const CONTENT_TYPE = "application/vnd.schemaregistry.v1+json";

/**
 * Client for a registry exposing the Confluent REST API. Schemas travel as
 * Avro documents so the registry's own compatibility rules see optional
 * fields as nullable. No retries.
 */
export class HttpSchemaRegistryClient implements ISchemaRegistryClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly headers: Record<string, string>;
  private readonly fetch: FetchLike;
  private readonly compiler: SchemaCompiler;
  private readonly avro = new AvroSchemaMapper();
  private readonly logger?: ILogger;

  constructor(options: HttpSchemaRegistryOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? 5000;
    this.fetch = options.fetch ?? ((input, init) => fetch(input, init));
    this.compiler = options.compiler ?? new SchemaCompiler();
    this.logger = options.logger;

    this.headers = { "Content-Type": CONTENT_TYPE, Accept: CONTENT_TYPE };
    if (options.username !== undefined && options.password !== undefined) {
      const token = Buffer.from(`${options.username}:${options.password}`).toString("base64");
      this.headers.Authorization = `Basic ${token}`;
    }
  }

  async register(subject: string, definition: RecordSchema): Promise<number> {
    const path = `/subjects/${encodeURIComponent(subject)}/versions`;
    const response = await this.send("POST", path, {
      schema: JSON.stringify(this.avro.toAvro(definition)),
    });

    if (response.status === 409) {
      const message = await this.errorMessage(response);
      throw new IncompatibleSchemaError(subject, [message]);
    }
    if (response.status === 422) {
      const message = await this.errorMessage(response);
      throw new SchemaDefinitionError([message], definition.name);
    }

    const body = await this.readBody(response, path, isRegisterResponse);
    return body.id;
  }

  async lookup(schemaId: number): Promise<RecordSchema> {
    const path = `/schemas/ids/${schemaId}`;
    const response = await this.send("GET", path);

    if (response.status === 404) {
      throw new UnknownSchemaError(schemaId);
    }

    const body = await this.readBody(response, path, isSchemaResponse);
    const document = this.parseJson(body.schema, path, response.status);
    return this.compiler.parse(this.avro.fromAvro(document));
  }

  async checkCompatibility(
    subject: string,
    candidate: RecordSchema
  ): Promise<ICompatibilityReport> {
    const path = `/compatibility/subjects/${encodeURIComponent(subject)}/versions/latest?verbose=true`;
    const response = await this.send("POST", path, {
      schema: JSON.stringify(this.avro.toAvro(candidate)),
    });

    // Nothing registered under the subject yet
    if (response.status === 404) return { compatible: true, violations: [] };
    if (response.status === 422) {
      const message = await this.errorMessage(response);
      throw new SchemaDefinitionError([message], candidate.name);
    }

    const body = await this.readBody(response, path, isCompatibilityResponse);
    return { compatible: body.is_compatible, violations: body.messages ?? [] };
  }

  private async send(method: "GET" | "POST", path: string, body?: object): Promise<Response> {
    const url = `${this.baseUrl}${path}`;
    this.logger?.log("Registry request", { method, path }, "debug");

    let response: Response;
    try {
      response = await this.fetch(url, {
        method,
        headers: this.headers,
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (cause) {
      const message =
        cause instanceof Error && cause.name === "TimeoutError"
          ? `Registry request ${method} ${path} timed out after ${this.timeoutMs}ms`
          : `Registry request ${method} ${path} failed: ${cause instanceof Error ? cause.message : String(cause)}`;
      this.logger?.log(message, { method, path }, "error");
      throw new RegistryUnavailableError(message, cause);
    }

    if (response.status === 429 || response.status >= 500) {
      const detail = await this.errorMessage(response);
      const message = `Registry responded ${response.status} to ${method} ${path}: ${detail}`;
      this.logger?.log(message, { method, path, status: response.status }, "error");
      throw new RegistryUnavailableError(message, undefined, response.status);
    }

    return response;
  }

  private async readBody<T>(
    response: Response,
    path: string,
    validate: ValidateFunction<T>
  ): Promise<T> {
    if (!response.ok) {
      const detail = await this.errorMessage(response);
      throw new RegistryRequestError(
        response.status,
        `Registry rejected ${path} with ${response.status}: ${detail}`
      );
    }

    const body = this.parseJson(await response.text(), path, response.status);
    if (!validate(body)) {
      throw new RegistryRequestError(
        response.status,
        `Unexpected registry response for ${path}: ${this.formatErrors(validate)}`
      );
    }
    return body;
  }

  private parseJson(text: string, path: string, status: number): unknown {
    try {
      return JSON.parse(text);
    } catch (cause) {
      throw new RegistryRequestError(
        status,
        `Registry response for ${path} is not valid JSON: ${cause instanceof Error ? cause.message : String(cause)}`
      );
    }
  }

  private async errorMessage(response: Response): Promise<string> {
    const text = await response.text();
    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch {
      return text || response.statusText;
    }
    if (isErrorResponse(body) && body.message) return body.message;
    return text || response.statusText;
  }

  private formatErrors(validate: ValidateFunction): string {
    return (validate.errors ?? [])
      .map((e) => `${e.instancePath || "/"} ${e.message ?? e.keyword}`)
      .join(", ");
  }
}
