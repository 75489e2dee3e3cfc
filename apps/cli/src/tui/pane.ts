import type { CloudApi } from '@cloudctl/cloud-api';
import type { LoggerLike } from '@cloudctl/logger';
import { ConfigError } from '@cloudctl/shared';
import type { Canvas, Rect } from './widgets.js';

/** Read-only resource scoping applied to every fetch. */
export interface FilterContext {
  readonly tenant?: string;
  readonly partition?: string;
  readonly purpose?: string;
}

export interface PaneContext {
  readonly api: CloudApi;
  readonly canvas: Canvas;
  readonly filter: FilterContext;
  readonly requestTimeoutMs: number;
  readonly logger: LoggerLike;
}

export interface TabInfo {
  readonly name: string;
  readonly description: string;
}

/**
 * A self-rendering region of the dashboard tied to one data domain.
 * `render` fetches, reduces and draws; it rejects when the primary fetch fails.
 */
export interface DashboardPane extends TabInfo {
  resize(rect: Rect): void;
  render(): Promise<void>;
}

export class TabSet {
  private active = 0;

  constructor(private readonly panes: readonly DashboardPane[]) {
    if (panes.length === 0) {
      throw new ConfigError('dashboard needs at least one tab');
    }
  }

  get all(): readonly DashboardPane[] {
    return this.panes;
  }

  get size(): number {
    return this.panes.length;
  }

  get activeIndex(): number {
    return this.active;
  }

  get activePane(): DashboardPane {
    return this.panes[this.active];
  }

  /** Returns false and keeps the current tab for an out-of-range index. */
  select(index: number): boolean {
    if (!Number.isInteger(index) || index < 0 || index >= this.panes.length) {
      return false;
    }
    this.active = index;
    return true;
  }

  findIndexByName(name: string): number {
    const index = this.panes.findIndex((p) => p.name.toLowerCase() === name.toLowerCase());
    if (index < 0) {
      throw new ConfigError(`tab with name "${name}" not found`, {
        available: this.panes.map((p) => p.name.toLowerCase()),
      });
    }
    return index;
  }

  labels(): string[] {
    return this.panes.map((p, i) => `(${i + 1}) ${p.name}`);
  }
}
