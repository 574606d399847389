import type { ILogDriver } from "../../domain/interfaces/ILogDriver";
import type { ISchemaCache } from "../../domain/interfaces/ISchemaCache";
import type { ISchemaRegistryClient } from "../../domain/interfaces/ISchemaRegistryClient";
import { SchemaCache } from "../../infrastructure/cache/SchemaCache";
import { loadConfig, type SerdeConfig } from "../../infrastructure/config/loadConfig";
import { LogBuffer } from "../../infrastructure/logging/LogBuffer";
import { createWinstonLogger, WinstonLogDriver } from "../../infrastructure/logging/WinstonLogDriver";
import {
  HttpSchemaRegistryClient,
  type FetchLike,
} from "../../infrastructure/registry/HttpSchemaRegistryClient";
import { InMemorySchemaRegistry } from "../../infrastructure/registry/InMemorySchemaRegistry";
import type { ISerde } from "../interfaces/ISerde";
import { Serde } from "../Serde";
import { SubjectNamer } from "../services/SubjectNamer";
import { CheckContractCompatibility } from "../usecases/CheckContractCompatibility";
import { DecodeRecord } from "../usecases/DecodeRecord";
import { EncodeRecord } from "../usecases/EncodeRecord";
import { RegisterContract } from "../usecases/RegisterContract";

export interface SerdeDependencies {
  registry?: ISchemaRegistryClient;
  cache?: ISchemaCache;
  logDriver?: ILogDriver;
  fetch?: FetchLike;
}

export class SerdeFactory {
  create(config: SerdeConfig = loadConfig(), deps: SerdeDependencies = {}): ISerde {
    // logging
    const driver =
      deps.logDriver ?? new WinstonLogDriver(createWinstonLogger(config.log.level));
    const logOptions = { level: config.log.level, chunkSize: config.log.bufferSize };
    const serdeLogger = new LogBuffer(driver, { ...logOptions, label: "serde" });
    const registryLogger = new LogBuffer(driver, { ...logOptions, label: "registry" });

    // registry
    const { registry: registryConfig } = config;
    const registry =
      deps.registry ??
      (registryConfig.url
        ? new HttpSchemaRegistryClient({
            baseUrl: registryConfig.url,
            timeoutMs: registryConfig.timeoutMs,
            username: registryConfig.username,
            password: registryConfig.password,
            fetch: deps.fetch,
            logger: registryLogger,
          })
        : new InMemorySchemaRegistry(registryConfig.compatibility));

    const cache = deps.cache ?? new SchemaCache();
    const subjects = new SubjectNamer(config.subjectStrategy);

    const registrar = new RegisterContract(registry, cache, subjects, serdeLogger);

    return new Serde(
      new EncodeRecord(registrar),
      new DecodeRecord(registry, cache, serdeLogger),
      registrar,
      new CheckContractCompatibility(registry, subjects),
      [serdeLogger, registryLogger]
    );
  }
}
