import type { Invariant } from "@sensorbus/codec";
import type { AlertEvent } from "../domain/AlertEvent";
import { Destinations } from "../domain/Destinations";
import type { SensorData } from "../domain/SensorData";
import type { SensorOutput, SensorOutputV1 } from "../domain/SensorOutput";
import {
  alertEventSchema,
  sensorDataSchema,
  sensorOutputSchema,
  sensorOutputV1Schema,
} from "../infrastructure/schemaDefinitions";
import { defineContract } from "./RecordContract";

const sensorOutputInvariants: Invariant<SensorOutputV1>[] = [
  (record) =>
    record.windowStart <= record.windowEnd
      ? undefined
      : {
          field: "windowEnd",
          expected: `>= ${record.windowStart}`,
          actual: String(record.windowEnd),
          message: `field "windowEnd" must not precede windowStart`,
        },
  (record) =>
    record.sensorCount >= 0
      ? undefined
      : {
          field: "sensorCount",
          expected: ">= 0",
          actual: String(record.sensorCount),
          message: `field "sensorCount" must not be negative`,
        },
  (record) =>
    record.sensorCount === 0 ||
    (record.minTemperature <= record.averageTemperature &&
      record.averageTemperature <= record.maxTemperature)
      ? undefined
      : {
          field: "averageTemperature",
          expected: `${record.minTemperature}..${record.maxTemperature}`,
          actual: String(record.averageTemperature),
          message: `field "averageTemperature" must lie between minTemperature and maxTemperature`,
        },
];

export const SensorDataContract = defineContract<SensorData>(
  "SensorData",
  Destinations.SensorData,
  sensorDataSchema
);

export const SensorOutputContract = defineContract<SensorOutput>(
  "SensorOutput",
  Destinations.SensorOutput,
  sensorOutputSchema,
  sensorOutputInvariants
);

/** Producers still publishing the first revision of the aggregate. */
export const SensorOutputV1Contract = defineContract<SensorOutputV1>(
  "SensorOutput",
  Destinations.SensorOutput,
  sensorOutputV1Schema,
  sensorOutputInvariants
);

export const AlertEventContract = defineContract<AlertEvent, "acknowledged">(
  "AlertEvent",
  Destinations.AlertEvent,
  alertEventSchema
);

export const buildSensorData = SensorDataContract.build;
export const buildSensorOutput = SensorOutputContract.build;
export const buildAlertEvent = AlertEventContract.build;
