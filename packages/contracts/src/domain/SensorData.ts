export const SENSOR_STATUSES = ["ONLINE", "OFFLINE", "ERROR", "MAINTENANCE"] as const;
export type SensorStatus = (typeof SENSOR_STATUSES)[number];

/** Values `unit` is documented to take. Not enforced by the schema. */
export const MEASUREMENT_UNITS = ["Celsius", "Fahrenheit", "PSI"] as const;
export type MeasurementUnit = (typeof MEASUREMENT_UNITS)[number];

export interface SensorData {
  sensorId: string;
  equipmentId: string;
  /** Unix seconds. */
  timestamp: number;
  temperature: number;
  pressure?: number;
  unit: string;
  location: string;
  status: SensorStatus;
  metadata?: Readonly<Record<string, string>>;
}
