/**
 * Terminal rendering of session snapshots with chalk + cli-table3.
 */

import chalk from 'chalk';
import Table from 'cli-table3';
import type { RocSession, SessionEvent, Snapshot } from '../session/controller.js';
import type { ConfusionMatrix } from '../types.js';
import { renderCount, renderNumber, renderRate } from './render-numbers.js';

export interface RendererOptions {
  includeMetrics?: boolean;
  /** Print every point of the curve below the matrix. */
  includeCurve?: boolean;
}

/**
 * Render a snapshot as a text block: title, AUC, operating point, the
 * confusion matrix as a table, and optionally metrics and the curve itself.
 */
export function renderSnapshot(snapshot: Snapshot, opts?: RendererOptions): string {
  const includeMetrics = opts?.includeMetrics ?? true;

  const lines: string[] = [chalk.bold(snapshot.title)];
  lines.push(
    `AUC: ${renderNumber(snapshot.auc)} | ` +
      `operating point: FPR ${renderRate(snapshot.operatingX)}, TPR ${renderRate(snapshot.operatingY)}`,
  );
  if (snapshot.mode === 'external' && snapshot.dataUrl !== null) {
    lines.push(chalk.yellow(`external curve: ${snapshot.dataUrl}`));
  }
  lines.push(renderConfusionTable(snapshot.confusion));

  if (includeMetrics) {
    const m = snapshot.metrics;
    lines.push(
      [
        `accuracy: ${renderRate(m.accuracy)}`,
        `precision: ${renderRate(m.precision)}`,
        `recall: ${renderRate(m.recall)}`,
        `specificity: ${renderRate(m.specificity)}`,
        `f1: ${renderRate(m.f1)}`,
      ].join(' | '),
    );
  }

  if (opts?.includeCurve) {
    lines.push('curve:');
    for (let i = 0; i < snapshot.curveX.length; i++) {
      lines.push(`  (${renderNumber(snapshot.curveX[i]!)}, ${renderNumber(snapshot.curveY[i]!)})`);
    }
  }

  return lines.join('\n');
}

/**
 * Render a confusion matrix as a 2x2 table: actual class across, predicted class down.
 */
export function renderConfusionTable(matrix: ConfusionMatrix): string {
  const table = new Table({
    head: ['', chalk.bold('Actual +'), chalk.bold('Actual -')],
    style: { head: [], border: [] },
  });
  table.push(
    [
      chalk.bold('Predicted +'),
      chalk.green(renderCount(matrix.truePositives)),
      chalk.red(renderCount(matrix.falsePositives)),
    ],
    [
      chalk.bold('Predicted -'),
      chalk.red(renderCount(matrix.falseNegatives)),
      chalk.green(renderCount(matrix.trueNegatives)),
    ],
  );
  return table.toString();
}

/**
 * Print every snapshot of `session` to the console and warn on notices.
 * Returns a function that stops printing.
 */
export function attachConsoleRenderer(session: RocSession, opts?: RendererOptions): () => void {
  return session.subscribe((event: SessionEvent) => {
    if (event.type === 'snapshot') {
      // eslint-disable-next-line no-console
      console.log(renderSnapshot(event.snapshot, opts));
    } else {
      // eslint-disable-next-line no-console
      console.warn(`${event.notice.kind}: ${event.notice.message}`);
    }
  });
}
