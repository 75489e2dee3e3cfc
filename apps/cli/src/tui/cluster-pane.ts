import { withDeadline } from '@cloudctl/cloud-api';
import {
  CLUSTER_CONDITION_TYPES,
  CLUSTER_OPERATION_BUCKETS,
  histogramValues,
  isAllZero,
  percentOf,
  problemRows,
  summarizeClusters,
  type ClusterConditionType,
} from './classify.js';
import type { DashboardPane, PaneContext, TabInfo } from './pane.js';
import { RenderLock } from './render-lock.js';
import type { BarChartWidget, GaugeWidget, Rect, TableWidget } from './widgets.js';

const GAUGE_TITLES: Record<ClusterConditionType, string> = {
  APIServerAvailable: 'API',
  ControlPlaneHealthy: 'Control',
  EveryNodeReady: 'Nodes',
  SystemComponentsHealthy: 'System',
};

const CHART_WIDTH = 48;
const CHART_HEIGHT = 12;
const NAME_COLUMN_WIDTH = 12;

export const CLUSTER_TAB: TabInfo = {
  name: 'Clusters',
  description: 'Cluster health and issues',
};

/**
 * Cluster operation states, condition health gauges and the two problem
 * tables (failing conditions, last errors).
 */
export class ClusterPane implements DashboardPane {
  readonly name = CLUSTER_TAB.name;
  readonly description = CLUSTER_TAB.description;

  private readonly lock = new RenderLock();

  private readonly operation: BarChartWidget;
  private readonly gauges: Record<ClusterConditionType, GaugeWidget>;
  private readonly problems: TableWidget;
  private readonly lastErrors: TableWidget;

  constructor(private readonly ctx: PaneContext) {
    const { canvas } = ctx;

    this.operation = canvas.barChart({
      title: 'Cluster Operation',
      labels: [...CLUSTER_OPERATION_BUCKETS],
    });

    this.gauges = {
      APIServerAvailable: canvas.gauge({ title: GAUGE_TITLES.APIServerAvailable, color: 'green' }),
      ControlPlaneHealthy: canvas.gauge({ title: GAUGE_TITLES.ControlPlaneHealthy, color: 'green' }),
      EveryNodeReady: canvas.gauge({ title: GAUGE_TITLES.EveryNodeReady, color: 'green' }),
      SystemComponentsHealthy: canvas.gauge({ title: GAUGE_TITLES.SystemComponentsHealthy, color: 'green' }),
    };

    this.problems = canvas.table({ title: 'Cluster Problems', headers: ['Cluster', 'Problem'] });
    this.lastErrors = canvas.table({ title: 'Last Errors', headers: ['Cluster', 'Error'] });
  }

  resize({ x1, y1, x2, y2 }: Rect): void {
    this.operation.setRect({ x1, y1, x2: x1 + CHART_WIDTH, y2: y1 + CHART_HEIGHT });

    CLUSTER_CONDITION_TYPES.forEach((type, i) => {
      this.gauges[type].setRect({ x1: x1 + CHART_WIDTH + 2, y1: y1 + i * 3, x2, y2: y1 + (i + 1) * 3 });
    });

    const tableHeight = Math.ceil((y2 - (y1 + CHART_HEIGHT)) / 2);
    const columns = [NAME_COLUMN_WIDTH, Math.max(0, x2 - x1 - NAME_COLUMN_WIDTH)];

    this.problems.setRect({ x1, y1: y1 + CHART_HEIGHT, x2, y2: y1 + CHART_HEIGHT + tableHeight });
    this.problems.setColumnWidths(columns);

    this.lastErrors.setRect({ x1, y1: y1 + CHART_HEIGHT + tableHeight, x2, y2 });
    this.lastErrors.setColumnWidths(columns);
  }

  async render(): Promise<void> {
    if (!this.lock.tryAcquire()) {
      return;
    }

    try {
      const { api, canvas, filter, requestTimeoutMs } = this.ctx;

      const clusters = await withDeadline(requestTimeoutMs, 'find clusters', (signal) =>
        api.findClusters(
          { tenant: filter.tenant, partitionId: filter.partition, purpose: filter.purpose },
          { signal },
        ),
      );

      const summary = summarizeClusters(clusters);
      if (summary.total === 0) {
        return;
      }

      // the bar chart cannot draw an all-zero series
      if (!isAllZero(summary.operation)) {
        this.operation.setData(histogramValues(summary.operation, CLUSTER_OPERATION_BUCKETS));
        canvas.render(this.operation);
      }

      this.problems.setRows(problemRows(summary.problems));
      this.lastErrors.setRows(problemRows(summary.lastErrors));
      canvas.render(this.problems, this.lastErrors);

      for (const type of CLUSTER_CONDITION_TYPES) {
        this.gauges[type].setPercent(percentOf(summary.healthyConditions[type], summary.total) ?? 0);
      }
      canvas.render(...CLUSTER_CONDITION_TYPES.map((type) => this.gauges[type]));
    } finally {
      this.lock.release();
    }
  }
}
