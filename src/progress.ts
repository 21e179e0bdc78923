import cliProgress from 'cli-progress';

export interface ProgressHandle {
  increment(): void;
  stop(): void;
}

export interface ProgressReporter {
  track(label: string, total: number): ProgressHandle;
  log(line: string): void;
  stop(): void;
}

/**
 * Truncates long titles so progress bars remain readable in narrower terminals.
 */
export const truncateTitle = (value: string, maxLength = 42): string =>
  value.length <= maxLength ? value : `${value.slice(0, maxLength - 3)}...`;

const noopHandle: ProgressHandle = {
  increment: () => undefined,
  stop: () => undefined,
};

export const silentProgress: ProgressReporter = {
  track: () => noopHandle,
  log: (line) => console.log(line),
  stop: () => undefined,
};

/**
 * One bar per labelled runner call; log lines are printed above the bars.
 */
class MultiBarProgress implements ProgressReporter {
  private readonly bars = new cliProgress.MultiBar(
    {
      clearOnComplete: false,
      hideCursor: true,
      format: '{bar} {percentage}% | {value}/{total} | {title}',
    },
    cliProgress.Presets.shades_grey,
  );

  track(label: string, total: number): ProgressHandle {
    const bar = this.bars.create(total, 0, { title: truncateTitle(label) });
    return {
      increment: () => bar.increment(),
      stop: () => {
        bar.stop();
        this.bars.remove(bar);
      },
    };
  }

  log(line: string): void {
    this.bars.log(`${line}\n`);
  }

  stop(): void {
    this.bars.stop();
  }
}

export const createProgressReporter = (enabled: boolean): ProgressReporter =>
  enabled ? new MultiBarProgress() : silentProgress;
