import { SchemaCompiler } from "@sensorbus/codec";
import alertEventDefinition from "../../schemas/alert-event.json";
import sensorDataDefinition from "../../schemas/sensor-data.json";
import sensorOutputV1Definition from "../../schemas/sensor-output.v1.json";
import sensorOutputV2Definition from "../../schemas/sensor-output.v2.json";
import type { AlertEvent } from "../domain/AlertEvent";
import type { SensorData } from "../domain/SensorData";
import type { SensorOutput, SensorOutputV1 } from "../domain/SensorOutput";

const compiler = new SchemaCompiler();

export const sensorDataSchema = compiler.load<SensorData>(sensorDataDefinition);
export const sensorOutputV1Schema = compiler.load<SensorOutputV1>(sensorOutputV1Definition);
export const sensorOutputSchema = compiler.load<SensorOutput>(sensorOutputV2Definition);
export const alertEventSchema = compiler.load<AlertEvent>(alertEventDefinition);
