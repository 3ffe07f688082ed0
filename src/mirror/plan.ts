/**
 * Human-readable rendering of the decisions of a pass.
 */
import type { MirrorPlan, PlanEntry } from './types.js';

const SYMBOLS: Record<PlanEntry['action'], string> = {
  create: '+',
  update: '~',
  delete: '-',
};

export function emptyPlan(): MirrorPlan {
  return { entries: [], unchanged: 0, totalBytes: 0 };
}

/**
 * Format a plan for display, one line per change.
 */
export function formatPlan(plan: MirrorPlan): string {
  if (plan.entries.length === 0) {
    return 'Replica is up to date.';
  }

  const lines = plan.entries.map((entry) => {
    const suffix = entry.kind === 'directory' ? '/' : '';
    return `  ${SYMBOLS[entry.action]} ${entry.path}${suffix} (${entry.reason})`;
  });

  const totalKB = Math.ceil(plan.totalBytes / 1024);
  lines.push('');
  lines.push(`${plan.entries.length} change(s), ${totalKB} KB to copy`);
  return lines.join('\n');
}
