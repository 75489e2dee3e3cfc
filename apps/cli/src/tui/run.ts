import type { LoggerLike } from '@cloudctl/logger';
import { errorMessage } from '@cloudctl/shared';
import type { Dashboard } from './dashboard.js';
import type { Terminal, TerminalEvent } from './widgets.js';

export interface RunOptions {
  refreshIntervalMs: number;
  logger: LoggerLike;
  /** Stops the loop, e.g. on SIGTERM. */
  signal?: AbortSignal;
}

const QUIT_KEYS = new Set(['q', 'C-c']);

/** Applies a user action; returns false when nothing changed. */
type Action = () => boolean;

/**
 * Drives the dashboard until the user quits: periodic refreshes plus
 * keyboard and resize handling. Resolves once the loop has stopped; the
 * caller closes the terminal.
 *
 * Input never interleaves with a render cycle. Actions arriving while a
 * cycle runs wait for it to finish and are followed by one more cycle; a
 * tick that finds a cycle running is dropped.
 */
export function runDashboard(terminal: Terminal, dashboard: Dashboard, options: RunOptions): Promise<void> {
  const { logger } = options;

  let rendering = false;
  let stopped = false;
  let pending: Action[] = [];

  const layout = (width: number, height: number): void => {
    dashboard.resize({ x1: 0, y1: 0, x2: width, y2: height });
  };

  const applyPending = (): void => {
    const actions = pending;
    pending = [];
    let changed = false;
    for (const action of actions) {
      changed = action() || changed;
    }
    if (changed) {
      refresh();
    }
  };

  const refresh = (): void => {
    if (rendering || stopped) {
      return;
    }
    rendering = true;
    dashboard
      .render()
      .catch((error: unknown) => {
        logger.error('render cycle failed', { error: errorMessage(error) });
      })
      .then(() => {
        rendering = false;
        if (!stopped) {
          applyPending();
        }
      })
      .catch((error: unknown) => {
        logger.error('dashboard input failed', { error: errorMessage(error) });
      });
  };

  const dispatch = (action: Action): void => {
    pending.push(action);
    if (!rendering) {
      applyPending();
    }
  };

  const switchTo = (index: number): Action => () => {
    if (!dashboard.selectTab(index)) {
      return false;
    }
    terminal.clear();
    return true;
  };

  return new Promise<void>((resolve) => {
    const { width, height } = terminal.size();
    layout(width, height);
    refresh();

    const ticker = setInterval(refresh, options.refreshIntervalMs);

    const stop = (): void => {
      stopped = true;
      pending = [];
      clearInterval(ticker);
      unsubscribe();
      options.signal?.removeEventListener('abort', stop);
      resolve();
    };

    const handle = (event: TerminalEvent): void => {
      if (event.type === 'resize') {
        dispatch(() => {
          layout(event.width, event.height);
          terminal.clear();
          return true;
        });
        return;
      }

      const { key } = event;
      if (QUIT_KEYS.has(key)) {
        logger.debug('dashboard quit');
        stop();
        return;
      }
      if (key === 'r') {
        dispatch(() => true);
        return;
      }
      if (key === 'tab') {
        dispatch(() => switchTo((dashboard.activeTabIndex + 1) % dashboard.tabCount)());
        return;
      }
      if (/^[1-9]$/.test(key)) {
        dispatch(switchTo(Number(key) - 1));
      }
    };

    const unsubscribe = terminal.onEvent(handle);

    if (options.signal?.aborted) {
      stop();
    } else {
      options.signal?.addEventListener('abort', stop);
    }
  });
}
