/**
 * Drawing contract between the dashboard and the terminal.
 *
 * Panes and the controller only talk to these interfaces; terminal.ts backs
 * them with blessed, tests back them with an in-memory recorder.
 */

/** Screen rectangle, x2/y2 exclusive. */
export interface Rect {
  x1: number;
  y1: number;
  x2: number;
  y2: number;
}

export type Color = 'black' | 'red' | 'green' | 'yellow' | 'blue' | 'magenta' | 'cyan' | 'white';

export interface Span {
  text: string;
  color: Color;
}

/** One line of text; plain strings use the theme's text color. */
export type Line = Array<string | Span>;

export interface Widget {
  readonly title: string;
  setRect(rect: Rect): void;
}

export interface BarChartWidget extends Widget {
  readonly labels: readonly string[];
  setData(values: number[]): void;
}

export interface GaugeWidget extends Widget {
  setPercent(percent: number): void;
  setColor(color: Color): void;
}

export interface TableWidget extends Widget {
  setColumnWidths(widths: number[]): void;
  setRows(rows: string[][]): void;
}

export interface ParagraphWidget extends Widget {
  setLines(lines: Line[]): void;
}

export interface TabStripWidget extends Widget {
  setActive(index: number): void;
}

export interface BarChartOptions {
  title: string;
  labels: string[];
}

export interface GaugeOptions {
  title: string;
  color?: Color;
}

export interface TableOptions {
  title: string;
  headers: string[];
}

export interface ParagraphOptions {
  title: string;
}

export interface Canvas {
  barChart(options: BarChartOptions): BarChartWidget;
  gauge(options: GaugeOptions): GaugeWidget;
  table(options: TableOptions): TableWidget;
  paragraph(options: ParagraphOptions): ParagraphWidget;
  tabStrip(names: string[]): TabStripWidget;
  /** Draws the given widgets with their current data. */
  render(...widgets: Widget[]): void;
  /** Blanks the screen; nothing shows until it is rendered again. */
  clear(): void;
}

export type TerminalEvent =
  | { type: 'key'; key: string }
  | { type: 'resize'; width: number; height: number };

export interface Terminal extends Canvas {
  size(): { width: number; height: number };
  /** Subscribes to input and resize events; returns the unsubscribe function. */
  onEvent(listener: (event: TerminalEvent) => void): () => void;
  /** Restores the terminal. Safe to call more than once. */
  close(): void;
}

export function span(text: string, color: Color): Span {
  return { text, color };
}

export function lineText(line: Line): string {
  return line.map((part) => (typeof part === 'string' ? part : part.text)).join('');
}
