export const ALERT_SEVERITIES = ["LOW", "MEDIUM", "HIGH", "CRITICAL"] as const;
export type AlertSeverity = (typeof ALERT_SEVERITIES)[number];

export interface AlertEvent {
  alertId: string;
  sensorId: string;
  equipmentId: string;
  location: string;
  timestamp: number;
  temperature: number;
  threshold: number;
  severity: AlertSeverity;
  message: string;
  acknowledged: boolean;
}
