/**
 * blessed / blessed-contrib backend for the widget interfaces.
 *
 * blessed keeps a retained scene graph, the dashboard draws in immediate
 * mode: every widget owns at most one blessed element, created hidden and
 * shown by `render`. Geometry and a few style properties are only read at
 * construction, so changing them recreates the element and replays the
 * last data.
 */

import * as blessed from 'blessed';
import * as contrib from 'blessed-contrib';
import { TerminalInitError, errorMessage } from '@cloudctl/shared';
import type { DashboardTheme } from './theme.js';
import type {
  BarChartOptions,
  BarChartWidget,
  Color,
  GaugeOptions,
  GaugeWidget,
  Line,
  ParagraphOptions,
  ParagraphWidget,
  Rect,
  TableOptions,
  TableWidget,
  TabStripWidget,
  Terminal,
  TerminalEvent,
  Widget,
} from './widgets.js';

type Element = blessed.Widgets.BlessedElement;

interface Position {
  left: number;
  top: number;
  width: number;
  height: number;
  hidden: boolean;
}

// blessed's own tag escaping
function escapeText(text: string): string {
  return text.replace(/[{}]/g, (ch) => (ch === '{' ? '{open}' : '{close}'));
}

/** Converts a line to blessed tag markup; plain parts use `fallback`. */
export function toTags(line: Line, fallback: Color): string {
  return line
    .map((part) => {
      const text = typeof part === 'string' ? part : part.text;
      const color = typeof part === 'string' ? fallback : part.color;
      return `{${color}-fg}${escapeText(text)}{/${color}-fg}`;
    })
    .join('');
}

function frame(theme: DashboardTheme, title: string) {
  return {
    label: ` ${title} `,
    border: { type: 'line' as const },
    style: { fg: theme.text, border: { fg: theme.border }, label: { fg: theme.text } },
  };
}

// ============================================================================
// Widgets
// ============================================================================

abstract class BlessedWidget<E extends Element> implements Widget {
  private rect: Rect = { x1: 0, y1: 0, x2: 1, y2: 1 };
  private element?: E;
  private visible = false;

  protected constructor(
    private readonly screen: blessed.Widgets.Screen,
    protected readonly theme: DashboardTheme,
    readonly title: string,
  ) {}

  protected abstract create(position: Position): E;

  /** Pushes the widget's current data into a fresh element. */
  protected abstract replay(element: E): void;

  setRect(rect: Rect): void {
    this.rect = rect;
    this.rebuild();
  }

  show(): void {
    const element = this.current();
    this.replay(element);
    element.show();
    this.visible = true;
  }

  hide(): void {
    this.element?.hide();
    this.visible = false;
  }

  destroy(): void {
    this.element?.destroy();
    this.element = undefined;
  }

  protected rebuild(): void {
    this.destroy();
    const element = this.current();
    if (this.visible) {
      element.show();
    }
  }

  protected current(): E {
    if (this.element) {
      return this.element;
    }
    const { x1, y1, x2, y2 } = this.rect;
    const element = this.create({
      left: x1,
      top: y1,
      width: Math.max(1, x2 - x1),
      height: Math.max(1, y2 - y1),
      hidden: true,
    });
    this.screen.append(element);
    this.replay(element);
    this.element = element;
    return element;
  }
}

class BlessedBarChart extends BlessedWidget<contrib.Widgets.BarElement> implements BarChartWidget {
  readonly labels: readonly string[];
  private values: number[] = [];

  constructor(screen: blessed.Widgets.Screen, theme: DashboardTheme, options: BarChartOptions) {
    super(screen, theme, options.title);
    this.labels = options.labels;
  }

  setData(values: number[]): void {
    this.values = values;
  }

  protected create(position: Position): contrib.Widgets.BarElement {
    const options = {
      ...position,
      ...frame(this.theme, this.title),
      barWidth: 9,
      barSpacing: 2,
      xOffset: 1,
      maxHeight: 9,
      barBgColor: this.theme.bar,
      barFgColor: this.theme.barNumber,
      labelColor: this.theme.barLabel,
    };
    return contrib.bar(options);
  }

  protected replay(element: contrib.Widgets.BarElement): void {
    if (this.values.length > 0) {
      element.setData({ titles: [...this.labels], data: this.values });
    }
  }
}

class BlessedGauge extends BlessedWidget<contrib.Widgets.GaugeElement> implements GaugeWidget {
  private percent = 0;
  private color: Color;

  constructor(screen: blessed.Widgets.Screen, theme: DashboardTheme, options: GaugeOptions) {
    super(screen, theme, options.title);
    this.color = options.color ?? theme.gauge;
  }

  setPercent(percent: number): void {
    this.percent = percent;
  }

  setColor(color: Color): void {
    if (color === this.color) {
      return;
    }
    this.color = color;
    this.rebuild();
  }

  protected create(position: Position): contrib.Widgets.GaugeElement {
    const options = {
      ...position,
      ...frame(this.theme, this.title),
      stroke: this.color,
      fill: this.theme.gaugeLabel,
    };
    return contrib.gauge(options);
  }

  protected replay(element: contrib.Widgets.GaugeElement): void {
    element.setPercent(this.percent);
  }
}

class BlessedTable extends BlessedWidget<contrib.Widgets.TableElement> implements TableWidget {
  private readonly headers: string[];
  private widths: number[] = [];
  private rows: string[][] = [];

  constructor(screen: blessed.Widgets.Screen, theme: DashboardTheme, options: TableOptions) {
    super(screen, theme, options.title);
    this.headers = options.headers;
  }

  setColumnWidths(widths: number[]): void {
    this.widths = widths;
    this.rebuild();
  }

  setRows(rows: string[][]): void {
    this.rows = rows;
  }

  protected create(position: Position): contrib.Widgets.TableElement {
    const options = {
      ...position,
      ...frame(this.theme, this.title),
      fg: this.theme.text,
      columnSpacing: 1,
      columnWidth: this.widths.length > 0 ? this.widths : this.headers.map(() => 20),
    };
    return contrib.table(options);
  }

  protected replay(element: contrib.Widgets.TableElement): void {
    element.setData({ headers: this.headers, data: this.rows });
  }
}

class BlessedParagraph extends BlessedWidget<blessed.Widgets.BoxElement> implements ParagraphWidget {
  private lines: Line[] = [];

  constructor(screen: blessed.Widgets.Screen, theme: DashboardTheme, options: ParagraphOptions) {
    super(screen, theme, options.title);
  }

  setLines(lines: Line[]): void {
    this.lines = lines;
  }

  protected create(position: Position): blessed.Widgets.BoxElement {
    const options = { ...position, ...frame(this.theme, this.title), tags: true, wrap: false };
    return blessed.box(options);
  }

  protected replay(element: blessed.Widgets.BoxElement): void {
    element.setContent(this.lines.map((line) => toTags(line, this.theme.text)).join('\n'));
  }
}

class BlessedTabStrip extends BlessedWidget<blessed.Widgets.BoxElement> implements TabStripWidget {
  private active = 0;

  constructor(
    screen: blessed.Widgets.Screen,
    theme: DashboardTheme,
    private readonly names: string[],
  ) {
    super(screen, theme, 'Tabs');
  }

  setActive(index: number): void {
    this.active = index;
  }

  protected create(position: Position): blessed.Widgets.BoxElement {
    const options = { ...position, tags: true, wrap: false, style: { fg: this.theme.inactiveTab } };
    return blessed.box(options);
  }

  protected replay(element: blessed.Widgets.BoxElement): void {
    const line: Line = this.names.map((name, i) =>
      i === this.active ? { text: ` ${name} `, color: this.theme.activeTab } : ` ${name} `,
    );
    element.setContent(toTags(line, this.theme.inactiveTab));
  }
}

// ============================================================================
// Terminal
// ============================================================================

class BlessedTerminal implements Terminal {
  private readonly widgets: BlessedWidget<Element>[] = [];
  private closed = false;

  constructor(
    private readonly screen: blessed.Widgets.Screen,
    private readonly theme: DashboardTheme,
  ) {}

  private track<W extends BlessedWidget<Element>>(widget: W): W {
    this.widgets.push(widget);
    return widget;
  }

  barChart(options: BarChartOptions): BarChartWidget {
    return this.track(new BlessedBarChart(this.screen, this.theme, options));
  }

  gauge(options: GaugeOptions): GaugeWidget {
    return this.track(new BlessedGauge(this.screen, this.theme, options));
  }

  table(options: TableOptions): TableWidget {
    return this.track(new BlessedTable(this.screen, this.theme, options));
  }

  paragraph(options: ParagraphOptions): ParagraphWidget {
    return this.track(new BlessedParagraph(this.screen, this.theme, options));
  }

  tabStrip(names: string[]): TabStripWidget {
    return this.track(new BlessedTabStrip(this.screen, this.theme, names));
  }

  render(...widgets: Widget[]): void {
    if (this.closed) {
      return;
    }
    for (const widget of widgets) {
      if (widget instanceof BlessedWidget) {
        widget.show();
      }
    }
    this.screen.render();
  }

  clear(): void {
    if (this.closed) {
      return;
    }
    for (const widget of this.widgets) {
      widget.hide();
    }
    this.screen.render();
  }

  size(): { width: number; height: number } {
    const width = typeof this.screen.width === 'number' ? this.screen.width : (process.stdout.columns ?? 80);
    const height = typeof this.screen.height === 'number' ? this.screen.height : (process.stdout.rows ?? 24);
    return { width, height };
  }

  onEvent(listener: (event: TerminalEvent) => void): () => void {
    const onKey = (_ch: unknown, key: blessed.Widgets.Events.IKeyEventArg | undefined): void => {
      if (key?.full) {
        listener({ type: 'key', key: key.full });
      }
    };
    const onResize = (): void => {
      listener({ type: 'resize', ...this.size() });
    };

    this.screen.on('keypress', onKey);
    this.screen.on('resize', onResize);
    return () => {
      this.screen.removeListener('keypress', onKey);
      this.screen.removeListener('resize', onResize);
    };
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    for (const widget of this.widgets) {
      widget.destroy();
    }
    this.screen.destroy();
  }
}

/** Switches the terminal to full-screen mode. */
export function openTerminal(theme: DashboardTheme): Terminal {
  if (!process.stdout.isTTY) {
    throw new TerminalInitError('the dashboard needs an interactive terminal');
  }

  let screen: blessed.Widgets.Screen;
  try {
    screen = blessed.screen({ smartCSR: true, fullUnicode: true, title: 'cloudctl dashboard' });
  } catch (error) {
    throw new TerminalInitError(`unable to initialize terminal: ${errorMessage(error)}`);
  }

  return new BlessedTerminal(screen, theme);
}
