import path from 'path';
import { TaggingEvent } from '../../types/events.js';
import { TagResult, TagSummary } from '../../services/tagging/taggingPipeline.js';
import { Theme, paint } from '../theme.js';

export interface OutputStream {
  write(chunk: string): boolean;
  isTTY?: boolean;
}

export function formatProgressBar(theme: Theme, fraction: number, width = 20): string {
  const clamped = Math.max(0, Math.min(1, fraction));
  const filled = Math.round(clamped * width);
  return theme.symbols.barFilled.repeat(filled) + theme.symbols.barEmpty.repeat(width - filled);
}

export function formatTagResult(theme: Theme, result: TagResult): string {
  switch (result.status) {
    case 'tagged':
      return `${paint(theme, 'green', theme.symbols.ok)} ${result.path} -> ${path.basename(result.newPath)}`;
    case 'skipped':
      return `${paint(theme, 'dim', theme.symbols.skip)} ${result.path} (${result.reason})`;
    case 'failed':
      return `${paint(theme, 'red', theme.symbols.fail)} ${result.path}: ${result.error.message}`;
  }
}

export function formatTagSummary(theme: Theme, summary: TagSummary): string {
  return [
    `${summary.tagged} ${theme.labels.tagged}`,
    `${summary.skipped} ${theme.labels.skipped}`,
    paint(theme, summary.failed > 0 ? 'red' : 'dim', `${summary.failed} ${theme.labels.failed}`),
  ].join(', ');
}

interface WorkerLine {
  path: string;
  progress: number;
}

/**
 * Live view of a tagging run. Result lines are printed as they arrive; on a
 * terminal a status block below them shows each busy worker and the overall bar.
 */
export class TaggingPresenter {
  private readonly workers = new Map<number, WorkerLine>();
  private completed = 0;
  private total = 0;
  private statusLines = 0;

  constructor(
    private readonly theme: Theme,
    private readonly out: OutputStream
  ) {}

  handleEvent(event: TaggingEvent): void {
    switch (event.type) {
      case 'worker-started':
        this.workers.set(event.workerId, { path: event.path, progress: 0 });
        break;
      case 'worker-progress':
        this.workers.set(event.workerId, { path: event.path, progress: event.progress });
        break;
      case 'worker-completed':
        this.workers.delete(event.workerId);
        break;
      case 'overall-progress':
        this.completed = event.completed;
        this.total = event.total;
        break;
    }
    this.redraw();
  }

  /**
   * Already-tagged files print nothing; they only count in the summary.
   */
  handleResult(result: TagResult): void {
    if (result.status === 'skipped' && result.reason === 'already-tagged') {
      return;
    }
    this.clearStatus();
    this.out.write(`${formatTagResult(this.theme, result)}\n`);
    this.redraw();
  }

  finish(summary: TagSummary): void {
    this.clearStatus();
    this.out.write(`\n${formatTagSummary(this.theme, summary)}\n`);
  }

  private redraw(): void {
    if (!this.out.isTTY) {
      return;
    }
    this.clearStatus();

    const lines = [...this.workers.entries()]
      .sort(([a], [b]) => a - b)
      .map(([id, line]) =>
        `  ${paint(this.theme, 'cyan', `#${id}`)} ${formatProgressBar(this.theme, line.progress, 10)} ${path.basename(line.path)}`
      );
    if (this.total > 0) {
      lines.push(`  ${formatProgressBar(this.theme, this.completed / this.total)} ${this.completed}/${this.total}`);
    }

    if (lines.length > 0) {
      this.out.write(`${lines.join('\n')}\n`);
    }
    this.statusLines = lines.length;
  }

  private clearStatus(): void {
    if (!this.out.isTTY || this.statusLines === 0) {
      return;
    }
    // cursor up N lines, then clear to end of screen
    this.out.write(`\u001b[${this.statusLines}A\u001b[0J`);
    this.statusLines = 0;
  }
}
