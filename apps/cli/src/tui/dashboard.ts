import { DEFAULT_REQUEST_TIMEOUT_MS, healthFromError, withDeadline, type CloudApi, type HealthResponse } from '@cloudctl/cloud-api';
import type { LoggerLike } from '@cloudctl/logger';
import { errorMessage, formatClock } from '@cloudctl/shared';
import { CLUSTER_TAB, ClusterPane } from './cluster-pane.js';
import { TabSet, type DashboardPane, type FilterContext, type PaneContext, type TabInfo } from './pane.js';
import { RenderLock } from './render-lock.js';
import { VOLUME_TAB, VolumePane } from './volume-pane.js';
import { span, type Canvas, type Line, type ParagraphWidget, type Rect, type Span, type TabStripWidget } from './widgets.js';

export const HEADER_HEIGHT = 5;
export const FILTER_WIDTH = 25;

export interface ClientVersion {
  version: string;
  gitSha: string;
}

export interface DashboardOptions {
  api: CloudApi;
  canvas: Canvas;
  filter: FilterContext;
  client: ClientVersion;
  logger: LoggerLike;
  /** Case-insensitive tab name; the first tab when unset. */
  initialTab?: string;
  requestTimeoutMs?: number;
  /** Builds the tabs; defaults to the cluster and volume panes. */
  panes?: (ctx: PaneContext) => DashboardPane[];
  now?: () => Date;
}

export const DASHBOARD_TABS: readonly TabInfo[] = [CLUSTER_TAB, VOLUME_TAB];

export function defaultPanes(ctx: PaneContext): DashboardPane[] {
  return [new ClusterPane(ctx), new VolumePane(ctx)];
}

export function coloredHealth(health: string, message: string): string | Span {
  switch (health) {
    case 'healthy':
      return span(health, 'green');
    case 'degraded':
    case 'partial-unhealthy':
      return span(health, 'yellow');
    case 'unhealthy':
      return span(message ? `${health} (${message})` : health, 'red');
    default:
      return health;
  }
}

/**
 * Header with API status and filters, a tab strip at the bottom and the
 * active pane in between. One render cycle runs at a time.
 */
export class Dashboard {
  private readonly lock = new RenderLock();
  private readonly tabs: TabSet;

  private readonly statusHeader: ParagraphWidget;
  private readonly filterHeader: ParagraphWidget;
  private readonly tabStrip: TabStripWidget;

  private readonly canvas: Canvas;
  private readonly api: CloudApi;
  private readonly filter: FilterContext;
  private readonly client: ClientVersion;
  private readonly logger: LoggerLike;
  private readonly requestTimeoutMs: number;
  private readonly now: () => Date;

  constructor(options: DashboardOptions) {
    this.canvas = options.canvas;
    this.api = options.api;
    this.filter = options.filter;
    this.client = options.client;
    this.logger = options.logger;
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.now = options.now ?? (() => new Date());

    const ctx: PaneContext = {
      api: this.api,
      canvas: this.canvas,
      filter: this.filter,
      requestTimeoutMs: this.requestTimeoutMs,
      logger: this.logger,
    };
    this.tabs = new TabSet((options.panes ?? defaultPanes)(ctx));

    this.statusHeader = this.canvas.paragraph({ title: 'Cloud Dashboard' });
    this.filterHeader = this.canvas.paragraph({ title: 'Filters' });
    this.tabStrip = this.canvas.tabStrip(this.tabs.labels());

    if (options.initialTab !== undefined) {
      this.selectTab(this.tabs.findIndexByName(options.initialTab));
    }
  }

  get tabCount(): number {
    return this.tabs.size;
  }

  get activeTabIndex(): number {
    return this.tabs.activeIndex;
  }

  get activeTab(): DashboardPane {
    return this.tabs.activePane;
  }

  resize({ x1, y1, x2, y2 }: Rect): void {
    this.statusHeader.setRect({ x1, y1, x2: x2 - FILTER_WIDTH, y2: y1 + HEADER_HEIGHT });
    this.filterHeader.setRect({ x1: x2 - FILTER_WIDTH, y1, x2, y2: y1 + HEADER_HEIGHT });

    for (const pane of this.tabs.all) {
      pane.resize({ x1, y1: y1 + HEADER_HEIGHT, x2, y2: y2 - 1 });
    }

    this.tabStrip.setRect({ x1, y1: y2 - 1, x2, y2 });
  }

  /** Zero-based; returns false for an index without a tab. */
  selectTab(index: number): boolean {
    if (!this.tabs.select(index)) {
      return false;
    }
    this.tabStrip.setActive(index);
    return true;
  }

  /**
   * Runs one render cycle. Fetch failures end the cycle early and show up in
   * the status line; this never rejects for them.
   */
  async render(): Promise<void> {
    if (!this.lock.tryAcquire()) {
      return;
    }

    let apiVersion = 'unknown';
    let apiHealth = 'unknown';
    let apiHealthMessage = '';
    let lastError: unknown;

    try {
      this.filterHeader.setLines([
        [`Tenant=${this.filter.tenant ?? ''}`],
        [`Partition=${this.filter.partition ?? ''}`],
        [`Purpose=${this.filter.purpose ?? ''}`],
      ]);
      this.canvas.render(this.filterHeader, this.tabStrip);

      const info = await withDeadline(this.requestTimeoutMs, 'api version', (signal) =>
        this.api.versionInfo({ signal }),
      );
      apiVersion = info.version;

      const health = await this.fetchHealth();
      apiHealth = health.status;
      apiHealthMessage = health.message;

      await this.tabs.activePane.render();
    } catch (error) {
      lastError = error;
      this.logger.warn('dashboard update failed', { error: errorMessage(error), tab: this.tabs.activePane.name });
    } finally {
      this.statusHeader.setLines(this.statusLines(apiVersion, apiHealth, apiHealthMessage, lastError));
      this.canvas.render(this.statusHeader);
      this.lock.release();
    }
  }

  private async fetchHealth(): Promise<HealthResponse> {
    try {
      return await withDeadline(this.requestTimeoutMs, 'api health', (signal) => this.api.health({ signal }));
    } catch (error) {
      // an unhealthy API answers 500 with a regular health payload
      const health = healthFromError(error);
      if (health) {
        return health;
      }
      throw error;
    }
  }

  private statusLines(apiVersion: string, apiHealth: string, apiHealthMessage: string, lastError: unknown): Line[] {
    const versionLine: Line = [
      `cloud-api ${apiVersion} (API Health: `,
      coloredHealth(apiHealth, apiHealthMessage),
      `), cloudctl ${this.client.version} (${this.client.gitSha})`,
    ];

    const fetchInfoLine: Line = [`Last Update: ${formatClock(this.now())}`];
    if (lastError !== undefined) {
      fetchInfoLine.push(', ', span(`Update Error: ${errorMessage(lastError)}`, 'red'));
    }

    return [versionLine, fetchInfoLine, ['Switch between tabs with number keys. Press q to quit.']];
  }
}
