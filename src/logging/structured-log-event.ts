import type { LogEntry } from '../types.js';

export interface StructuredLogEvent {
  timestamp: number;
  isoTimestamp: string;
  severity: LogEntry['severity'];
  priority: number;
  component: LogEntry['component'];
  message: string;
  address?: string;
  type?: string;
  tool?: string;
  labels: Record<string, string>;
}

const PRIORITY_BY_SEVERITY: Record<LogEntry['severity'], number> = {
  ERR: 3,
  WRN: 4,
  VRB: 6,
  TRC: 7,
};

const RESERVED_LABEL_KEYS = new Set([
  'ts',
  'level',
  'priority',
  'component',
  'address',
  'type',
  'tool',
  'message',
]);

export interface BuildStructuredEventOptions {
  labels?: Record<string, string>;
}

export function buildStructuredLogEvent(
  entry: LogEntry,
  options: BuildStructuredEventOptions = {}
): StructuredLogEvent {
  const labels: Record<string, string> = {};
  Object.entries(options.labels ?? {}).forEach(([key, value]) => {
    if (value.length > 0) labels[key] = value;
  });
  // Entry details never override the logger's own labels.
  Object.entries(entry.details ?? {}).forEach(([key, value]) => {
    if (value.length === 0) return;
    if (!Object.prototype.hasOwnProperty.call(labels, key)) labels[key] = value;
  });

  const filteredLabels = Object.entries(labels).reduce<Record<string, string>>((acc, [key, value]) => {
    if (RESERVED_LABEL_KEYS.has(key)) return acc;
    acc[key] = value;
    return acc;
  }, {});

  return {
    timestamp: entry.timestamp,
    isoTimestamp: new Date(entry.timestamp).toISOString(),
    severity: entry.severity,
    priority: PRIORITY_BY_SEVERITY[entry.severity],
    component: entry.component,
    message: entry.message,
    address: entry.address,
    type: entry.type,
    tool: entry.tool,
    labels: filteredLabels,
  };
}
