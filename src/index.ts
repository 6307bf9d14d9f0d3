export { PortalClient } from './portal/client.js';
export type { PatientProcessor, PortalClientOptions, PortalSession, AllDatesOptions } from './portal/client.js';
export { SessionController } from './session.js';
export type { SessionOptions, SessionPlatform } from './session.js';
export { runProcessing, emptySummary } from './run.js';
export type { RunOptions } from './run.js';
export { CancellationToken } from './cancel.js';
export { loadConfig, parseConfig, DEFAULT_TIMEOUTS } from './config.js';
export type { AppConfig, Timeouts, LogLevel } from './config.js';
export { createLogger, runStamp } from './logger.js';
export {
  PortalError,
  ConnectionError,
  NavigationError,
  LoginTimeoutError,
  ScrapeStructureError,
  ConfigError,
  describeError,
} from './errors.js';
export type { PortalErrorCode } from './errors.js';
export { resolveConnectionTarget, HttpEndpointProbe, waitForEndpoint, buildLaunchOptions } from './chrome-launcher.js';
export type { EndpointProbe, EngineInstaller } from './chrome-launcher.js';
export { SystemBrowserRegistration, defaultHandlerFromLaunchServices } from './platform/registration.js';
export type { BrowserRegistration } from './platform/registration.js';
export { WindowsLaunchOverride, systemLaunchOverride } from './platform/launch-override.js';
export type { LaunchOverride } from './platform/launch-override.js';
export type { ProcessControl } from './platform/processes.js';
export {
  selectRows,
  selectMostRecentRows,
  isTypeAllowed,
  parseRowDate,
  distinctFacilities,
  EXCLUDED_TYPES,
  REPORT_PREFIX,
} from './portal/filter.js';
export { resolveTableSchema } from './portal/table.js';
export { DEFAULT_SELECTORS, patientDeepLink } from './portal/selectors.js';

// Types
export type {
  BrowserChannel,
  BrowserExecutable,
  ConnectionTarget,
  SessionState,
  PortalPage,
  PortalLocator,
  DownloadHandle,
  TableSchema,
  RowRecord,
  DocumentResult,
  FilterCriteria,
  RowDecision,
  SkipReason,
  ScanMode,
  PatientOutcome,
  PortalSelectors,
  NotificationRecord,
  Mailbox,
  DocumentSink,
  RunSummary,
} from './types.js';
