export const Destinations = {
  SensorData: "sensor-raw-data",
  SensorOutput: "aggregated-sensor-metrics",
  AlertEvent: "sensor-alerts",
} as const;

export type Destination = (typeof Destinations)[keyof typeof Destinations];
