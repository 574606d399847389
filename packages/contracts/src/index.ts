export { ALERT_SEVERITIES, type AlertEvent, type AlertSeverity } from "./domain/AlertEvent";
export { Destinations, type Destination } from "./domain/Destinations";
export {
  MEASUREMENT_UNITS,
  SENSOR_STATUSES,
  type MeasurementUnit,
  type SensorData,
  type SensorStatus,
} from "./domain/SensorData";
export type { SensorOutput, SensorOutputV1 } from "./domain/SensorOutput";
export {
  AlertEventContract,
  SensorDataContract,
  SensorOutputContract,
  SensorOutputV1Contract,
  buildAlertEvent,
  buildSensorData,
  buildSensorOutput,
} from "./application/contracts";
export {
  Catalog,
  contractForDestination,
  registerCatalog,
  type CatalogContract,
} from "./application/Catalog";
export { defineContract, type RecordContract } from "./application/RecordContract";
