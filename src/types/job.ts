export type FileType = "csv" | "json";

export type DataSource =
  | { type: "api"; location: string }
  | { type: "file"; location: string; fileType: FileType };

export interface JobDefinition {
  name: string;
  /** 5-field cron expression */
  schedule: string;
  source: DataSource;
  /** JavaScript executed against the fetched dataset */
  transform: string;
  recipients: string[];
  createdAt: Date;
  lastRun: Date | null;
}
