import type { LogEntry, LogSeverity } from '../types.js';

import { formatLogfmt } from './logfmt.js';
import { buildStructuredLogEvent, type StructuredLogEvent } from './structured-log-event.js';

export type LogFormat = 'logfmt' | 'json' | 'none';

export interface StructuredLoggerOptions {
  formats?: LogFormat[];
  labels?: Record<string, string>;
  color?: boolean;
  // Entries below this severity are dropped (ERR > WRN > VRB > TRC)
  minSeverity?: LogSeverity;
  logfmtWriter?: (line: string) => void;
  jsonWriter?: (line: string) => void;
}

const SEVERITY_RANK: Record<LogSeverity, number> = {
  TRC: 0,
  VRB: 1,
  WRN: 2,
  ERR: 3,
};

export class StructuredLogger {
  private readonly labels: Record<string, string>;
  private readonly sinks: ((event: StructuredLogEvent) => void)[] = [];
  private readonly minRank: number;

  constructor(options: StructuredLoggerOptions = {}) {
    this.labels = options.labels ?? {};
    this.minRank = SEVERITY_RANK[options.minSeverity ?? 'VRB'];
    const color = options.color ?? false;
    const formats = normalizeFormats(options.formats);

    if (formats.includes('logfmt')) {
      const writer = options.logfmtWriter ?? defaultWriter;
      this.sinks.push((event) => {
        writer(`${formatLogfmt(event, { color })}\n`);
      });
    }
    if (formats.includes('json')) {
      const writer = options.jsonWriter ?? defaultWriter;
      this.sinks.push((event) => {
        writer(`${JSON.stringify(buildJsonPayload(event))}\n`);
      });
    }
  }

  emit(entry: LogEntry): void {
    if (SEVERITY_RANK[entry.severity] < this.minRank) return;
    const event = buildStructuredLogEvent(entry, { labels: this.labels });
    this.sinks.forEach((sink) => {
      sink(event);
    });
  }

  /** Bound emitter, suitable as the `log` option of routers, registries and toolkits. */
  get callback(): (entry: LogEntry) => void {
    return (entry) => {
      this.emit(entry);
    };
  }
}

export function createStructuredLogger(options: StructuredLoggerOptions = {}): StructuredLogger {
  return new StructuredLogger(options);
}

function defaultWriter(line: string): void {
  try {
    process.stderr.write(line);
  } catch {
    // stderr closed; nothing left to report to
  }
}

function normalizeFormats(explicit?: LogFormat[]): LogFormat[] {
  const source: LogFormat[] = Array.isArray(explicit) && explicit.length > 0 ? explicit : ['logfmt'];
  if (source.includes('none')) return [];
  return source.reduce<LogFormat[]>((acc, candidate) => {
    if (!acc.includes(candidate)) acc.push(candidate);
    return acc;
  }, []);
}

function buildJsonPayload(event: StructuredLogEvent): Record<string, unknown> {
  const entries: [string, unknown][] = [];
  const push = (key: string, value: unknown): void => {
    if (value === undefined) return;
    entries.push([key, value]);
  };

  push('ts', event.isoTimestamp);
  push('timestamp', event.timestamp);
  push('severity', event.severity);
  push('level', event.severity.toLowerCase());
  push('priority', event.priority);
  push('component', event.component);
  push('address', event.address);
  push('type', event.type);
  push('tool', event.tool);
  if (Object.keys(event.labels).length > 0) push('labels', event.labels);

  entries.push(['message', event.message]);

  return Object.fromEntries(entries);
}
