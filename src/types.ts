import type { Logger } from 'pino';
import type { SiteDriver } from './site-driver';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface UserAppointmentSpec {
  email: string;
  password: string;
  location: string;
  startDate: string;
  endDate: string;
  preferredCities: string[];
  ivrNumber?: string;
  autoBook: boolean;
}

export interface SiteConfig {
  baseUrl: string;
  busyMarkers: string[];
  loginUrlMarkers: string[];
  postLoginUrlMarker: string;
}

export interface MonitoringConfig {
  checkIntervalSeconds: number;
  errorRetryIntervalSeconds: number;
  maxRetries: number;
  shutdownTimeoutMs: number;
}

export interface DebugConfig {
  enabled: boolean;
  saveScreenshots: boolean;
  saveHtml: boolean;
  sendNotifications: boolean;
  notificationIntervalSeconds: number;
}

export interface NotificationConfig {
  webhookUrl: string;
  webhookSecret: string;
}

export interface AppConfig {
  site: SiteConfig;
  user: UserAppointmentSpec | null;
  monitoring: MonitoringConfig;
  debug: DebugConfig;
  notification: NotificationConfig;
  headless: boolean;
  slowMo: number;
  globalTimeout: number;
  browserExecutablePath: string;
  logLevel: LogLevel;
  logsDir: string;
  stateDir: string;
}

export const WORKER_STATUSES = [
  'initializing',
  'starting',
  'logged_in',
  'login_failed',
  'checking',
  'available',
  'unavailable',
  'busy',
  'error',
  'stopped',
] as const;

export type WorkerStatus = (typeof WORKER_STATUSES)[number];

export interface WorkerState {
  email: string;
  status: WorkerStatus;
  lastCheckedAt: string | null;
  lastSlotFoundAt: string | null;
  dateRange: string;
  location: string;
  slotAvailable: boolean;
  notes: string;
}

export interface SlotResult {
  city: string;
  date: string;
  time: string;
  autoBooked: boolean;
}

export interface ScanOutcome {
  slots: SlotResult[];
  busy: boolean;
}

export type CycleOutcome = 'available' | 'booked' | 'unavailable' | 'busy';

export interface DebugArtifact {
  timestamp: string;
  prefix: string;
  url: string;
  screenshotPath?: string;
  pageSourcePath?: string;
}

export interface FlowContext {
  config: AppConfig;
  logger: Logger;
  user?: UserAppointmentSpec;
  driver?: SiteDriver;
  debug?: (prefix: string) => Promise<void>;
}

/** Returned by a step to end its flow early without running the remaining steps. */
export type StepSignal = 'halt';

export interface FlowStep {
  name: string;
  description?: string;
  action: (ctx: FlowContext) => Promise<void | StepSignal>;
}

export interface FlowDefinition {
  name: string;
  description: string;
  steps: FlowStep[];
}
