export type LogSeverity = 'ERR' | 'WRN' | 'VRB' | 'TRC';

export type LogComponent = 'address' | 'cache' | 'validator' | 'router' | 'dispatch' | 'tool' | 'toolkit' | 'context';

export interface LogEntry {
  timestamp: number;                    // Unix timestamp (ms)
  severity: LogSeverity;
  component: LogComponent;
  message: string;
  // Canonical page address the entry is about, when there is one
  address?: string;
  // Resolved producer type tag (after alias lookup)
  type?: string;
  // Tool name for tool/toolkit entries
  tool?: string;
  // Extra key/value context rendered as labels
  details?: Record<string, string>;
}

export type LogCallback = (entry: LogEntry) => void;

export const makeLogEntry = (
  severity: LogSeverity,
  component: LogComponent,
  message: string,
  extra?: Partial<Pick<LogEntry, 'address' | 'type' | 'tool' | 'details'>>
): LogEntry => ({
  timestamp: Date.now(),
  severity,
  component,
  message,
  ...extra,
});
