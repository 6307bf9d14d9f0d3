// ── Browser Channels ──

/**
 * Browser family used to open a session.
 * `bundled` is the Chromium build managed by Playwright itself.
 */
export type BrowserChannel = 'msedge' | 'chrome' | 'chromium' | 'bundled';

/** A Chromium-family executable found on this machine. */
export interface BrowserExecutable {
  /** Channel the executable belongs to */
  channel: BrowserChannel;
  /** Absolute path to the executable */
  path: string;
  /** Image name used to find and terminate running instances (e.g. `msedge.exe`) */
  processName: string;
  /** Identifier of the registration that pointed at it (Windows ProgID, bundle id or desktop id) */
  progId?: string;
}

/** Everything needed to reach or start a debuggable browser. Derived once per `start()`. */
export interface ConnectionTarget {
  /** Remote debugging port */
  port: number;
  /** Image name of the browser process, when one was resolved */
  processName?: string;
  /** Executable to launch, when one was resolved */
  executablePath?: string;
  /** Registration the executable came from */
  progId?: string;
}

// ── Session ──

/** Lifecycle state of a `SessionController`. */
export type SessionState = 'not-started' | 'attached' | 'owned' | 'dead';

/** Page surface the session controller relies on. Playwright's `Page` satisfies it. */
export interface PageHandle {
  title(): Promise<string>;
  close(): Promise<void>;
  setDefaultTimeout(timeout: number): void;
}

/** Element query surface the portal code drives. Playwright's `Locator` satisfies it. */
export interface PortalLocator {
  first(): PortalLocator;
  last(): PortalLocator;
  nth(index: number): PortalLocator;
  locator(selector: string): PortalLocator;
  filter(options: { has?: PortalLocator }): PortalLocator;
  count(): Promise<number>;
  waitFor(options: { state: 'visible' | 'hidden'; timeout: number }): Promise<void>;
  click(): Promise<void>;
  fill(value: string): Promise<void>;
  allInnerTexts(): Promise<string[]>;
  allTextContents(): Promise<string[]>;
}

/** A captured download. */
export interface DownloadHandle {
  suggestedFilename(): string;
  saveAs(path: string): Promise<void>;
}

/** Page surface the portal code drives. Playwright's `Page` satisfies it. */
export interface PortalPage extends PageHandle {
  url(): string;
  goto(url: string, options: { waitUntil: 'domcontentloaded'; timeout: number }): Promise<unknown>;
  reload(options: { waitUntil: 'domcontentloaded' }): Promise<unknown>;
  waitForLoadState(state: 'networkidle', options: { timeout: number }): Promise<void>;
  locator(selector: string, options?: { hasText?: RegExp }): PortalLocator;
  getByRole(role: 'button', options: { name: string }): PortalLocator;
  getByText(text: string, options?: { exact?: boolean }): PortalLocator;
  waitForEvent(event: 'download', options: { timeout: number }): Promise<DownloadHandle>;
  screenshot(options: { path: string; fullPage: boolean }): Promise<unknown>;
}

/** Browsing context surface used by the session controller. */
export interface ContextHandle<P extends PageHandle> {
  pages(): P[];
  newPage(): Promise<P>;
  close(): Promise<void>;
}

/** Browser connection surface used by the session controller. */
export interface BrowserHandle<P extends PageHandle> {
  contexts(): ContextHandle<P>[];
  newContext(): Promise<ContextHandle<P>>;
  close(): Promise<void>;
}

/** Options passed to a persistent (owned) launch. */
export interface PersistentLaunchOptions {
  /** Playwright channel name; omitted for the bundled engine */
  channel?: string;
  /** Explicit executable; used for plain Chromium installs */
  executablePath?: string;
  headless: boolean;
  acceptDownloads: true;
  downloadsPath: string;
  args: string[];
}

/** The automation library, reduced to the two ways a session is acquired. */
export interface BrowserEngine<P extends PageHandle> {
  connectOverCDP(endpoint: string, timeoutMs: number): Promise<BrowserHandle<P>>;
  launchPersistent(userDataDir: string, opts: PersistentLaunchOptions): Promise<ContextHandle<P>>;
}

// ── Portal ──

/** Column positions resolved from the results table header. */
export interface TableSchema {
  /** Date column */
  dateIndex?: number;
  /** Document-type column. Always resolved; a table without it is rejected. */
  typeIndex: number;
  /** Originating facility column */
  facilityIndex?: number;
  /** Column holding the view/download control */
  actionIndex?: number;
}

/** One data row read during the scan phase, before any filtering. */
export interface RowRecord {
  /** Position among the table's data rows (0-based) */
  index: number;
  date: string;
  type: string;
  facility: string;
}

/** Outcome for a single scanned row. */
export interface DocumentResult {
  /** Document type as shown by the portal ("N/A" for patient-level failures) */
  readonly classification: string;
  readonly skipped: boolean;
  /** Temporary location of the downloaded file */
  readonly downloadPath?: string;
  readonly error?: string;
}

/** Filters applied in `all-dates` mode. Every field is optional; absent means "no filter". */
export interface FilterCriteria {
  /** Document types eligible for download. `undefined` accepts every type. */
  allowedTypes?: ReadonlySet<string>;
  /** Case-insensitive substring of the originating facility */
  facility?: string;
  /** Inclusive lower bound */
  dateFrom?: Date;
  /** Inclusive upper bound */
  dateTo?: Date;
}

/** Why a row was not downloaded. */
export type SkipReason = 'excluded' | 'type' | 'facility' | 'date';

/** Filter verdict for one row. */
export type RowDecision =
  | { row: RowRecord; action: 'download' }
  | { row: RowRecord; action: 'skip'; reason: SkipReason };

/** The two ways the results table is consumed. */
export type ScanMode = 'most-recent' | 'all-dates';

/** Per-patient outcome. `interrupted` is set when cancellation stopped the row loop. */
export interface PatientOutcome {
  results: DocumentResult[];
  interrupted: boolean;
}

/** Text and selectors that identify the portal's UI elements. */
export interface PortalSelectors {
  /** Loading overlay shown while the SPA fetches data */
  overlay: string;
  /** Search-by-identifier input */
  searchInput: string;
  /** Accessible name of the search trigger */
  searchButton: string;
  /** Accessible name of the button that opens the patient record */
  enterRecordButton: string;
  /** Visible text of the results section tab */
  sectionTab: string;
  /** Exact header label that identifies the results table */
  typeHeaderLabel: string;
  /** Accessible name of the consent button shown before some downloads */
  confirmButton: string;
  /** URL patterns of the identity provider / SSO pages */
  identityProviderPatterns: RegExp[];
}

// ── Mailbox / Sink ──

/** A notification announcing new documents for a patient. */
export interface NotificationRecord {
  /** Mailbox-unique id */
  id: string;
  patientName: string;
  /** Deep link into the portal */
  portalUrl: string;
  /** National identifier code of the patient */
  identifier: string;
  subject: string;
}

/** Source of notification records. Deduplication is its own concern. */
export interface Mailbox {
  fetchPending(): Promise<NotificationRecord[]>;
  markHandled(id: string): Promise<void>;
}

/** Consumer of successful downloads; gives each file its final name. */
export interface DocumentSink {
  /** Returns the final path, or `null` when the file could not be persisted. */
  accept(entry: { result: DocumentResult; record: NotificationRecord }): Promise<string | null>;
  /** Called once at the end of a run (reports, mappings). */
  finish(): Promise<void>;
}

/** Counters reported at the end of a run. */
export interface RunSummary {
  recordsFound: number;
  recordsProcessed: number;
  /** Records left unhandled because a document failed or could not be persisted */
  recordsFailed: number;
  documentsDownloaded: number;
  documentsPersisted: number;
  documentsSkipped: number;
  documentsFailed: number;
  interrupted: boolean;
}
