import { describe, it, expect } from 'vitest';
import { join } from 'node:path';
import { ResultReport, displayName, formatSummary } from '../../src/ui/report.js';
import { createResult, localRef, remoteRef, summarize } from '../../src/core/types.js';
import type { BulkUpdateReport } from '../../src/core/bulk-updater.js';

const ROOT = join('/work', 'projects');

const local = createResult({
  ref: localRef(join(ROOT, 'tools', 'lint')),
  path: join(ROOT, 'tools', 'lint'),
  status: 'dirty',
  message: 'uncommitted changes',
  durationMs: 3,
});

const remote = createResult({
  ref: remoteRef('github', 'acme', 'api', 'https://github.com/acme/api.git'),
  path: join(ROOT, 'api'),
  status: 'cloned',
  message: 'cloned',
  durationMs: 12,
});

describe('formatSummary', () => {
  it('orders counts by status and drops zeros', () => {
    expect(formatSummary({ failed: 1, cloned: 2, updated: 0 })).toBe('2 cloned, 1 failed');
    expect(formatSummary({ dirty: 1, 'up-to-date': 4, updated: 2 })).toBe('2 updated, 4 up-to-date, 1 dirty');
  });

  it('says when there was nothing to do', () => {
    expect(formatSummary({})).toBe('nothing to do');
  });
});

describe('displayName', () => {
  it('uses the repository name for remote results', () => {
    expect(displayName(remote, ROOT)).toBe('api');
  });

  it('uses the path below the root for local results', () => {
    expect(displayName(local, ROOT)).toBe(join('tools', 'lint'));
    expect(displayName(local)).toBe(join(ROOT, 'tools', 'lint'));
  });

  it('shows the root itself as a dot', () => {
    const atRoot = createResult({ ref: localRef(ROOT), path: ROOT, status: 'updated', message: 'ok', durationMs: 0 });
    expect(displayName(atRoot, ROOT)).toBe('.');
  });
});

describe('ResultReport', () => {
  it('lists every result in the table', () => {
    const table = ResultReport.table([local, remote], { root: ROOT });
    expect(table).toContain('api');
    expect(table).toContain('uncommitted changes');
  });

  it('serializes a report as indented JSON', () => {
    const report: BulkUpdateReport = {
      root: ROOT,
      results: [local],
      summary: summarize([local]),
      failed: false,
    };
    const json = ResultReport.toJson(report);

    expect(json.split('\n')[1]).toBe(`  "root": ${JSON.stringify(ROOT)},`);
    expect(JSON.parse(json)).toEqual(report);
  });
});
