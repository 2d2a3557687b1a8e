export type ProbeFailureCategory =
  | "connection-refused"
  | "unknown-host"
  | "timeout"
  | "auth-rejected"
  | "tls"
  | "unreachable"
  | "incomplete-config";

export interface ProbeResult {
  success: boolean;
  category?: ProbeFailureCategory;
  message: string;
}
