/** Aggregate as first published, before anomaly scoring existed. */
export interface SensorOutputV1 {
  equipmentId: string;
  /** Epoch milliseconds. */
  windowStart: number;
  /** Epoch milliseconds. */
  windowEnd: number;
  averageTemperature: number;
  maxTemperature: number;
  minTemperature: number;
  sensorCount: number;
  unit: string;
  location: string;
  processingTime: number;
}

export interface SensorOutput extends SensorOutputV1 {
  anomalyScore?: number;
}
