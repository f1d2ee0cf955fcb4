export interface RunRecord {
  timestamp: Date;
  message: string;
  invocation: string;
}
