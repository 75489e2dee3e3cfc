import { withDeadline, type StorageClusterInfo } from '@cloudctl/cloud-api';
import { humanizeSize, isForbidden } from '@cloudctl/shared';
import {
  PROTECTION_STATE_BUCKETS,
  SERVER_STATE_BUCKETS,
  STORAGE_HEALTH_BUCKETS,
  VOLUME_STATE_BUCKETS,
  histogramValues,
  isAllZero,
  percentOf,
  summarizeStorageClusters,
  summarizeVolumes,
} from './classify.js';
import type { DashboardPane, PaneContext, TabInfo } from './pane.js';
import { RenderLock } from './render-lock.js';
import type { BarChartWidget, Color, GaugeWidget, ParagraphWidget, Rect } from './widgets.js';

export function freeSpaceColor(percent: number): Color {
  if (percent < 10) return 'red';
  if (percent < 30) return 'yellow';
  return 'green';
}

export const VOLUME_TAB: TabInfo = {
  name: 'Volumes',
  description: 'Volume health, for operators also cluster health',
};

/**
 * Volume state and protection for everyone; storage cluster and server
 * health for users allowed to read the storage cluster info.
 */
export class VolumePane implements DashboardPane {
  readonly name = VOLUME_TAB.name;
  readonly description = VOLUME_TAB.description;

  private readonly lock = new RenderLock();

  private readonly volumeState: BarChartWidget;
  private readonly protectionState: BarChartWidget;
  private readonly usedSpace: ParagraphWidget;
  private readonly physicalFree: GaugeWidget;
  private readonly compressionRatio: GaugeWidget;
  private readonly clusterState: BarChartWidget;
  private readonly serverState: BarChartWidget;

  constructor(private readonly ctx: PaneContext) {
    const { canvas } = ctx;

    this.volumeState = canvas.barChart({ title: 'Volume State', labels: [...VOLUME_STATE_BUCKETS] });
    this.protectionState = canvas.barChart({
      title: 'Volume Protection State',
      labels: ['Protected', 'Degraded', 'Read-Only', 'N/A', 'Unknown'],
    });
    this.usedSpace = canvas.paragraph({ title: 'Volume Infos' });
    this.physicalFree = canvas.gauge({ title: 'Free Physical Space' });
    this.compressionRatio = canvas.gauge({ title: 'Compression Ratio' });
    this.clusterState = canvas.barChart({ title: 'Cluster State', labels: [...STORAGE_HEALTH_BUCKETS] });
    this.serverState = canvas.barChart({ title: 'Server State', labels: [...SERVER_STATE_BUCKETS] });
  }

  resize({ x1, y1, x2, y2 }: Rect): void {
    const columnWidth = Math.ceil((x2 - x1) / 2);
    const rowHeight = Math.ceil((y2 - y1) / 2);
    const xm = x1 + columnWidth;
    const ym = y1 + rowHeight;

    this.volumeState.setRect({ x1, y1, x2: xm, y2: ym });
    this.protectionState.setRect({ x1: xm, y1, x2, y2: ym });

    this.usedSpace.setRect({ x1, y1: ym, x2, y2: ym + 3 });

    this.physicalFree.setRect({ x1, y1: ym + 3, x2: xm, y2: ym + 6 });
    this.compressionRatio.setRect({ x1: xm, y1: ym + 3, x2, y2: ym + 6 });

    this.clusterState.setRect({ x1, y1: ym + 6, x2: xm, y2 });
    this.serverState.setRect({ x1: xm, y1: ym + 6, x2, y2 });
  }

  async render(): Promise<void> {
    if (!this.lock.tryAcquire()) {
      return;
    }

    try {
      const { api, canvas, filter, requestTimeoutMs, logger } = this.ctx;

      const volumes = await withDeadline(requestTimeoutMs, 'find volumes', (signal) =>
        api.findVolumes({ tenantId: filter.tenant, partitionId: filter.partition }, { signal }),
      );

      // Storage cluster info is only readable for provider admins.
      let storage: StorageClusterInfo[] | undefined;
      let storageError: unknown;
      try {
        storage = await withDeadline(requestTimeoutMs, 'storage cluster info', (signal) =>
          api.storageClusterInfo(filter.partition, { signal }),
        );
      } catch (error) {
        if (isForbidden(error)) {
          logger.debug('storage cluster info forbidden, showing volumes only');
        } else {
          storageError = error;
        }
      }

      const summary = summarizeVolumes(volumes);

      this.usedSpace.setLines([[`Summed up physical size of volumes: ${humanizeSize(summary.physicalUsed)}`]]);
      canvas.render(this.usedSpace);

      // the bar chart cannot draw an all-zero series
      if (!isAllZero(summary.state)) {
        this.volumeState.setData(histogramValues(summary.state, VOLUME_STATE_BUCKETS));
        canvas.render(this.volumeState);
      }
      if (!isAllZero(summary.protection)) {
        this.protectionState.setData(histogramValues(summary.protection, PROTECTION_STATE_BUCKETS));
        canvas.render(this.protectionState);
      }

      if (storageError !== undefined) {
        throw storageError;
      }
      if (!storage || storage.length === 0) {
        return;
      }

      this.renderStorage(storage);
    } finally {
      this.lock.release();
    }
  }

  private renderStorage(storage: StorageClusterInfo[]): void {
    const { canvas } = this.ctx;
    const summary = summarizeStorageClusters(storage);

    const drawn: GaugeWidget[] = [];

    const compression = percentOf(summary.compressionRatio * 100, 100);
    if (compression !== undefined) {
      this.compressionRatio.setPercent(compression);
      drawn.push(this.compressionRatio);
    }

    const free = percentOf(summary.physicalFree, summary.physicalFree + summary.physicalUsed);
    if (free !== undefined) {
      this.physicalFree.setColor(freeSpaceColor(free));
      this.physicalFree.setPercent(free);
      drawn.push(this.physicalFree);
    }

    if (drawn.length > 0) {
      canvas.render(...drawn);
    }

    if (!isAllZero(summary.health)) {
      this.clusterState.setData(histogramValues(summary.health, STORAGE_HEALTH_BUCKETS));
      canvas.render(this.clusterState);
    }
    if (!isAllZero(summary.servers)) {
      this.serverState.setData(histogramValues(summary.servers, SERVER_STATE_BUCKETS));
      canvas.render(this.serverState);
    }
  }
}
