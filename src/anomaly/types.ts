export type AnomalyField = "name" | "email" | "phone";

export type AnomalyDetail = {
  field: AnomalyField;
  value: string;
  issue: string;
};

// Persisted as-is in submission metadata, hence the snake_case keys.
export type AnomalyReport = {
  has_anomaly: boolean;
  anomaly_details: AnomalyDetail[];
};
