import type { AggregateStatus, FetchOutcome, RenderPayload, UsageSnapshot } from "../models/usage";
import type { UsageSource } from "../providers/types";
import { aggregateSnapshot, noDataStatus } from "./aggregate";
import { createCredentialProvider } from "./credentials";
import type { CredentialProvider } from "./credentials";
import { fetchUsage } from "./fetch";
import { getChildLogger } from "./logger";
import { applyOutcome, buildRenderPayload } from "./presentation";
import { isRefreshSeconds, SettingsError } from "./settings";
import type { Settings } from "./settings";
import type { HttpTransport } from "./transport";

export type MeterState = { phase: "idle" } | { phase: "fetching"; startedAt: string };

/** Everything the display layer reads. Replaced as a whole, never patched. */
export interface PublishedView {
  /** Last successfully fetched snapshot; kept across failed fetches. */
  snapshot: UsageSnapshot | null;
  status: AggregateStatus;
  lastOutcome: FetchOutcome | null;
  lastFetchedAt: string | null;
  payload: RenderPayload;
}

export type ViewListener = (view: PublishedView) => void;

export interface SettingsRepository {
  load(): Promise<Settings>;
  save(settings: Settings): Promise<void>;
}

export interface UsageMeterOptions {
  source: UsageSource;
  settings: SettingsRepository;
  transport: HttpTransport;
  /** Defaults to the environment/saved-settings lookup for the source's credential kind. */
  credentials?: CredentialProvider;
  /** Environment consulted by the default credential lookup. */
  env?: NodeJS.ProcessEnv;
  clock?: () => Date;
  timeZone?: string;
}

export class UsageMeter {
  private get log() {
    return getChildLogger("meter");
  }
  private readonly listeners = new Set<ViewListener>();
  private readonly credentials: CredentialProvider;
  private readonly clock: () => Date;
  private state: MeterState = { phase: "idle" };
  private view: PublishedView;
  private timer: NodeJS.Timeout | undefined;
  private sessionApiKey: string | undefined;

  static async create(options: UsageMeterOptions): Promise<UsageMeter> {
    return new UsageMeter(options, await options.settings.load());
  }

  constructor(
    private readonly options: UsageMeterOptions,
    private settings: Settings,
  ) {
    this.clock = options.clock ?? (() => new Date());
    this.credentials =
      options.credentials ??
      createCredentialProvider({
        kind: options.source.credentialKind,
        savedApiKey: () => this.settings.apiKey,
        sessionApiKey: () => this.sessionApiKey,
        env: options.env,
      });
    this.view = this.composeView(null, noDataStatus(), null, null);
  }

  get currentState(): MeterState {
    return this.state;
  }

  get published(): PublishedView {
    return this.view;
  }

  get currentSettings(): Readonly<Settings> {
    return this.settings;
  }

  get isRunning(): boolean {
    return this.timer !== undefined;
  }

  subscribe(listener: ViewListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Runs one fetch unless one is already in flight, in which case it resolves to undefined
   * without touching the network or the published view.
   */
  async refresh(): Promise<FetchOutcome | undefined> {
    if (this.state.phase === "fetching") {
      this.log.debug("Fetch already in flight, ignoring trigger");
      return undefined;
    }

    this.state = { phase: "fetching", startedAt: this.clock().toISOString() };
    try {
      const outcome = await fetchUsage({
        source: this.options.source,
        credentials: this.credentials,
        transport: this.options.transport,
        clock: this.clock,
      });
      this.publish(this.nextView(outcome));
      return outcome;
    } finally {
      this.state = { phase: "idle" };
    }
  }

  /** Starts the timer and fetches once straight away. */
  start(): Promise<FetchOutcome | undefined> {
    this.schedule();
    return this.refresh();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
  }

  async changeInterval(seconds: number): Promise<void> {
    if (!isRefreshSeconds(seconds)) {
      throw new SettingsError(`Unsupported refresh interval: ${seconds}s`);
    }

    this.settings = { ...this.settings, refreshSeconds: seconds };
    if (this.isRunning) {
      this.schedule();
    }
    await this.options.settings.save(this.settings);
    this.log.info(`Refresh interval set to ${seconds}s`);
    this.republish();
  }

  async setCredential(apiKey: string): Promise<FetchOutcome | undefined> {
    if (this.options.source.credentialKind !== "api-key") {
      throw new SettingsError(`${this.options.source.title} does not use an API key`);
    }

    const trimmed = apiKey.trim();
    if (!trimmed) {
      return undefined;
    }

    this.settings = { ...this.settings, apiKey: trimmed };
    await this.options.settings.save(this.settings);
    this.sessionApiKey = trimmed;
    this.republish();
    return this.refresh();
  }

  private schedule(): void {
    this.stop();
    this.timer = setInterval(() => {
      this.refresh().catch((error: unknown) => this.log.error("Scheduled refresh failed", error));
    }, this.settings.refreshSeconds * 1000);
  }

  private nextView(outcome: FetchOutcome): PublishedView {
    if (outcome.kind === "success") {
      const status = aggregateSnapshot(outcome.snapshot, this.options.source.layout.policy);
      return this.composeView(outcome.snapshot, status, outcome, outcome.snapshot.fetchedAt);
    }

    return this.composeView(this.view.snapshot, this.view.status, outcome, this.view.lastFetchedAt);
  }

  private composeView(
    snapshot: UsageSnapshot | null,
    status: AggregateStatus,
    lastOutcome: FetchOutcome | null,
    lastFetchedAt: string | null,
  ): PublishedView {
    const base = buildRenderPayload(snapshot, status, lastFetchedAt, {
      layout: this.options.source.layout,
      now: this.clock().getTime(),
      timeZone: this.options.timeZone,
    });

    return {
      snapshot,
      status,
      lastOutcome,
      lastFetchedAt,
      payload: lastOutcome
        ? applyOutcome(base, lastOutcome, {
            policy: this.options.source.layout.policy,
            credentialKind: this.options.source.credentialKind,
          })
        : base,
    };
  }

  private republish(): void {
    const { snapshot, status, lastOutcome, lastFetchedAt } = this.view;
    this.publish(this.composeView(snapshot, status, lastOutcome, lastFetchedAt));
  }

  private publish(view: PublishedView): void {
    this.view = view;
    for (const listener of this.listeners) {
      try {
        listener(view);
      } catch (error) {
        this.log.error("View listener failed", error);
      }
    }
  }
}
