import { ERROR_KINDS } from '../classifier/types.js';
import { runDuration } from './records.js';
import type { MetricsSnapshot, Run, Step } from './types.js';

// ANSI color codes for terminal styling
const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  green: '\x1b[32m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
  magenta: '\x1b[35m',
  brightBlack: '\x1b[90m',
  brightCyan: '\x1b[96m',
  brightYellow: '\x1b[93m',
};

const paint = (code: string) => (t: string) => `${code}${t}${colors.reset}`;

const s = {
  bold: paint(colors.bold),
  dim: paint(colors.dim),
  success: paint(colors.green),
  error: paint(colors.red),
  warning: paint(colors.yellow),
  info: paint(colors.cyan),
  thought: paint(colors.magenta),
  muted: paint(colors.brightBlack),
  number: paint(colors.brightYellow),
  primary: paint(colors.brightCyan),
};

const box = {
  horizontal: '─',
  dHorizontal: '═',
  branch: '├─',
  last: '└─',
  pipe: '│ ',
};

export interface ViewOptions {
  json: boolean;
  verbose: boolean;
  color: boolean;
}

const DEFAULT_VIEW_OPTIONS: ViewOptions = {
  json: false,
  verbose: false,
  color: true,
};

const ANSI_PATTERN = /\x1b\[[0-9;]*m/g;

export function stripAnsi(text: string): string {
  return text.replace(ANSI_PATTERN, '');
}

export function formatRun(run: Run, steps: Step[], options: Partial<ViewOptions> = {}): string {
  const opts = { ...DEFAULT_VIEW_OPTIONS, ...options };

  if (opts.json) {
    return JSON.stringify({ run, steps }, null, 2);
  }

  const lines: string[] = [];
  const w = 60;

  lines.push('');
  lines.push(s.primary(box.dHorizontal.repeat(w)));
  lines.push(`  ${s.bold('Run')} ${s.muted(run.id)}`);
  lines.push(s.primary(box.dHorizontal.repeat(w)));
  lines.push('');

  lines.push(kv('Query', run.query));
  lines.push(kv('Status', formatStatus(run.status)));
  lines.push(kv('Started', s.muted(run.startedAt)));
  const duration = runDuration(run);
  lines.push(kv('Duration', duration === null ? s.warning('in progress') : s.number(formatDuration(duration))));
  if (run.errorKind) {
    lines.push(kv('Error kind', s.error(run.errorKind)));
  }
  if (run.errorMessage) {
    lines.push(kv('Error', s.error(run.errorMessage)));
  }
  if (run.finalOutput !== null) {
    lines.push(kv('Output', run.finalOutput));
  }
  lines.push('');

  lines.push(sectionHeader(`Steps (${steps.length})`));
  steps.forEach((step, i) => {
    const connector = i === steps.length - 1 ? box.last : box.branch;
    const detailPrefix = i === steps.length - 1 ? '   ' : box.pipe + ' ';
    lines.push(`   ${s.dim(connector)} ${s.muted(`#${step.index}`)} ${formatStep(step)}`);
    if (opts.verbose) {
      for (const detail of stepDetails(step)) {
        lines.push(`   ${s.dim(detailPrefix)}   ${s.dim(detail)}`);
      }
    }
  });
  if (steps.length === 0) {
    lines.push(`   ${s.dim('(no steps recorded)')}`);
  }

  lines.push('');
  lines.push(s.primary(box.dHorizontal.repeat(w)));
  lines.push('');

  const output = lines.join('\n');
  return opts.color ? output : stripAnsi(output);
}

function formatStep(step: Step): string {
  switch (step.type) {
    case 'reasoning':
      return `${s.thought('thought')} ${truncate(step.payload.text, 80)}`;
    case 'tool_call':
      return `${s.info('call')} ${s.bold(step.payload.tool)}`;
    case 'tool_result': {
      const took = step.payload.durationMs !== undefined ? ` ${s.dim(`(${formatDuration(step.payload.durationMs)})`)}` : '';
      return `${s.success('result')} ${s.bold(step.payload.tool)}${took}`;
    }
    case 'error': {
      const tool = step.payload.tool ? ` ${s.bold(step.payload.tool)}` : '';
      return `${s.error('error')}${tool} ${s.error(`[${step.payload.kind}]`)} ${step.payload.message}`;
    }
    case 'final_answer':
      return `${s.primary('answer')} ${truncate(step.payload.output, 80)}`;
  }
}

function stepDetails(step: Step): string[] {
  switch (step.type) {
    case 'tool_call':
      return [`args: ${truncate(JSON.stringify(step.payload.args), 120)}`];
    case 'tool_result':
      return [`result: ${truncate(JSON.stringify(step.payload.result) ?? 'undefined', 120)}`];
    case 'reasoning':
      return step.payload.text.length > 80 ? [step.payload.text] : [];
    case 'final_answer':
      return step.payload.output.length > 80 ? [step.payload.output] : [];
    case 'error':
      return [];
  }
}

function sectionHeader(title: string): string {
  return `${s.dim(box.horizontal.repeat(3))} ${s.bold(title)} ${s.dim(box.horizontal.repeat(Math.max(0, 35 - title.length)))}`;
}

function kv(key: string, value: string): string {
  return `   ${s.dim(key + ':')} ${value}`;
}

function formatStatus(status: Run['status']): string {
  switch (status) {
    case 'success':
      return s.success('✓ success');
    case 'running':
      return s.warning('◐ running');
    case 'failed':
      return s.error('✗ failed');
  }
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
  const minutes = Math.floor(ms / 60000);
  const seconds = ((ms % 60000) / 1000).toFixed(0);
  return `${minutes}m ${seconds}s`;
}

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max - 1)}…` : text;
}

export function formatRunList(runs: Run[]): string {
  const lines: string[] = [];

  lines.push('');
  lines.push(`  ${s.bold('Recent Runs')}`);
  lines.push(s.primary(`  ${box.dHorizontal.repeat(84)}`));
  lines.push('');

  const hId = s.dim('ID'.padEnd(10));
  const hStatus = s.dim('Status'.padEnd(11));
  const hKind = s.dim('Error'.padEnd(18));
  const hDuration = s.dim('Duration'.padStart(9));
  lines.push(`  ${hId}${hStatus}${hKind}${hDuration}  ${s.dim('Query')}`);
  lines.push(s.dim(`  ${box.horizontal.repeat(84)}`));

  for (const run of runs) {
    const id = s.muted(run.id.slice(0, 8).padEnd(10));
    const status =
      run.status === 'success'
        ? s.success('✓ success'.padEnd(11))
        : run.status === 'running'
          ? s.warning('◐ running'.padEnd(11))
          : s.error('✗ failed'.padEnd(11));
    const kind = run.errorKind ? s.error(run.errorKind.padEnd(18)) : s.dim('-'.padEnd(18));
    const duration = runDuration(run);
    const took = s.number((duration === null ? '-' : formatDuration(duration)).padStart(9));
    lines.push(`  ${id}${status}${kind}${took}  ${truncate(run.query, 40)}`);
  }

  lines.push('');
  lines.push(`  ${s.dim('View a run:')} ${s.info('stepwise trace <run-id>')}`);
  lines.push('');

  return lines.join('\n');
}

export function formatMetrics(metrics: MetricsSnapshot): string {
  const lines: string[] = [];

  lines.push('');
  lines.push(sectionHeader('Run Metrics'));
  lines.push(kv('Total runs', s.number(String(metrics.totalRuns))));
  lines.push(kv('Finished', s.number(String(metrics.finishedRuns))));
  lines.push(kv('In progress', metrics.inProgress > 0 ? s.warning(String(metrics.inProgress)) : s.dim('0')));
  lines.push(kv('Succeeded', s.success(String(metrics.succeeded))));
  lines.push(kv('Failed', metrics.failed > 0 ? s.error(String(metrics.failed)) : s.dim('0')));
  lines.push(kv('Success rate', s.number(formatPercent(metrics.successRate))));
  lines.push(kv('Avg duration', s.number(formatDuration(metrics.averageDurationMs))));

  const kinds = ERROR_KINDS.filter(kind => metrics.errorKinds[kind] > 0);
  if (kinds.length > 0) {
    lines.push('');
    lines.push(sectionHeader('Error Kinds'));
    for (const kind of kinds) {
      lines.push(`   ${s.error('•')} ${kind.padEnd(18)} ${s.number(String(metrics.errorKinds[kind]))}`);
    }
  }
  lines.push('');

  return lines.join('\n');
}

export function formatPercent(rate: number): string {
  return `${(rate * 100).toFixed(1)}%`;
}
