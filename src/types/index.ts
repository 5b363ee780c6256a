/**
 * timetree - Type Definitions
 */

// Log levels understood by the shared logger
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

// A node of the project forest, as stored
export interface Project {
  id: number;
  parentId: number | null;
  name: string; // Single path segment
  path: string; // Dot-joined chain from the root, e.g. "Client.Website"
}

// Project with its children resolved
export interface ProjectNode extends Project {
  children: ProjectNode[];
}

// A tracked interval; end is null while the record is open
export interface TimeRecord {
  id: number;
  projectId: number;
  projectPath: string;
  start: Date;
  end: Date | null;
  note: string | null;
}

// Half-open [start, end) range
export interface Period {
  start: Date;
  end: Date;
}

// Calendar-aligned or fixed-width bucket specification
export type BucketUnit = 'day' | 'week' | 'month';

export type BucketSpec =
  | { kind: 'calendar'; unit: BucketUnit }
  | { kind: 'fixed'; seconds: number };

// Tool response types
export interface ToolSuccess<T = unknown> {
  success: true;
  data: T;
}

export interface ToolError {
  success: false;
  error: string;
  code?: string | undefined;
}

export type ToolResult<T = unknown> = ToolSuccess<T> | ToolError;

// Settings section of ~/.config/timetree/config.yaml
export interface TimeTreeSettings {
  log_level: LogLevel;
  db_path?: string | undefined;
  week_days: number;
  bar_width: number;
}

// Resolved runtime configuration
export interface TimeTreeConfig {
  dbPath: string;
  logLevel: LogLevel;
  weekDays: number;
  barWidth: number;
  configPath: string;
}
