import chalk, { type ChalkInstance } from 'chalk';
import Table from 'cli-table3';
import { relative } from 'node:path';
import type { RepoResult, RepoStatus } from '../core/types.js';
import type { SyncReport } from '../core/sync-orchestrator.js';
import type { BulkUpdateReport } from '../core/bulk-updater.js';

/** Icon, label and colour per status, in display order. */
export const STATUS_STYLE: Record<RepoStatus, { icon: string; label: string; color: ChalkInstance }> = {
  cloned: { icon: '✓', label: 'cloned', color: chalk.green },
  updated: { icon: '✓', label: 'updated', color: chalk.green },
  'up-to-date': { icon: '=', label: 'up to date', color: chalk.dim },
  'would-update': { icon: '→', label: 'would update', color: chalk.cyan },
  skipped: { icon: '-', label: 'skipped', color: chalk.dim },
  dirty: { icon: '●', label: 'dirty', color: chalk.yellow },
  conflicts: { icon: '⚡', label: 'diverged', color: chalk.magenta },
  'no-upstream': { icon: '?', label: 'no upstream', color: chalk.yellow },
  'merge-in-progress': { icon: '⚡', label: 'merge in progress', color: chalk.yellow },
  failed: { icon: '✗', label: 'failed', color: chalk.red },
  error: { icon: '✗', label: 'error', color: chalk.red },
  cancelled: { icon: '⊘', label: 'cancelled', color: chalk.dim },
};

const STATUS_ORDER = Object.keys(STATUS_STYLE);

const TABLE_CHARS = {
  top: '', 'top-mid': '', 'top-left': '', 'top-right': '',
  bottom: '', 'bottom-mid': '', 'bottom-left': '', 'bottom-right': '',
  left: '  ', 'left-mid': '', mid: '', 'mid-mid': '',
  right: '', 'right-mid': '', middle: chalk.dim(' │ '),
};

/** Display name of a result: repository name for remote refs, path below `root` otherwise. */
export function displayName(result: RepoResult, root?: string): string {
  if (result.ref.kind === 'remote') return result.ref.name;
  return root ? relative(root, result.path) || '.' : result.path;
}

/** `2 updated, 1 dirty` in status display order; zero counts are left out. */
export function formatSummary(summary: Partial<Record<RepoStatus, number>>): string {
  const parts = Object.entries(summary)
    .filter(([, count]) => count !== undefined && count > 0)
    .sort(([a], [b]) => STATUS_ORDER.indexOf(a) - STATUS_ORDER.indexOf(b))
    .map(([status, count]) => `${count} ${status}`);
  return parts.length > 0 ? parts.join(', ') : 'nothing to do';
}

function resultRow(result: RepoResult, root?: string, showTracking = true): string[] {
  const style = STATUS_STYLE[result.status];
  const row = [chalk.white(displayName(result, root)), style.color(`${style.icon} ${style.label}`)];
  if (showTracking) {
    const ahead = result.ahead > 0 ? chalk.green(`+${result.ahead}`) : chalk.dim('0');
    const behind = result.behind > 0 ? chalk.red(`-${result.behind}`) : chalk.dim('0');
    row.push(result.branch ? chalk.cyan(result.branch) : chalk.dim('-'), `${ahead}/${behind}${result.hasStash ? chalk.yellow(' ≡') : ''}`);
  }
  row.push(result.message);
  return row;
}

/**
 * Table and summary rendering for bulk update and sync results.
 */
export class ResultReport {
  /** Render the results table. */
  static table(results: readonly RepoResult[], options: { root?: string; tracking?: boolean } = {}): string {
    const tracking = options.tracking ?? true;
    const head = tracking ? ['Repo', 'Status', 'Branch', '↑/↓', 'Details'] : ['Repo', 'Status', 'Details'];
    const table = new Table({ head: head.map((h) => chalk.dim(h)), chars: TABLE_CHARS, style: { 'padding-left': 0, 'padding-right': 1 } });
    for (const r of results) table.push(resultRow(r, options.root, tracking));
    return table.toString();
  }

  static renderBulk(report: BulkUpdateReport, options: { quiet?: boolean } = {}): void {
    const shown = options.quiet
      ? report.results.filter((r) => r.status !== 'up-to-date')
      : report.results;
    console.log(chalk.bold(`\n  PULL-ALL  │  ${report.results.length} repo(s)  │  ${report.root}\n`));
    if (shown.length > 0) console.log(ResultReport.table(shown, { root: report.root }));
    ResultReport.renderErrors(report.results, report.root);
    console.log(chalk.dim(`\n  Summary: ${formatSummary(report.summary)}\n`));
  }

  static renderSync(report: SyncReport): void {
    const header = `${report.provider}/${report.organization}`;
    console.log(chalk.bold(`\n  SYNC ${header}  │  ${report.results.length} repo(s)  │  ${report.targetPath}\n`));
    if (report.results.length > 0) console.log(ResultReport.table(report.results, { tracking: false }));
    ResultReport.renderErrors(report.results);

    if (report.removedOrphans.length > 0) {
      console.log(chalk.yellow(`\n  Removed ${report.removedOrphans.length} orphan(s): ${report.removedOrphans.join(', ')}`));
    } else if (report.orphans.length > 0) {
      console.log(chalk.dim(`\n  Orphans (not removed): ${report.orphans.join(', ')}`));
    }
    const notes: string[] = [];
    if (report.resumed) notes.push('resumed');
    if (report.manifestReused) notes.push('manifest reused');
    const suffix = notes.length > 0 ? chalk.dim(` (${notes.join(', ')})`) : '';
    console.log(chalk.dim(`\n  Summary: ${formatSummary(report.summary)}`) + suffix + '\n');
  }

  /** List failures with their full messages below the table. */
  static renderErrors(results: readonly RepoResult[], root?: string): void {
    const failures = results.filter((r) => r.status === 'failed' || r.status === 'error');
    if (failures.length === 0) return;
    console.log(chalk.red.bold(`\n  ${failures.length} failure(s):`));
    for (const r of failures) {
      console.log(chalk.red(`    ✗ ${displayName(r, root)}: ${r.error ?? r.message}`));
    }
  }

  static toJson(report: BulkUpdateReport | SyncReport): string {
    return JSON.stringify(report, null, 2);
  }
}
