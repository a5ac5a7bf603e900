/**
 * Terminal styling shared by the stepwise commands.
 */

import { formatDuration, stripAnsi } from '../observability/trace-viewer.js';

const SGR = {
  reset: 0,
  bold: 1,
  dim: 2,
  red: 31,
  green: 32,
  yellow: 33,
  cyan: 36,
  gray: 90,
  blue: 94,
  magenta: 95,
  brightCyan: 96,
  brightYellow: 93,
} as const;

const colorEnabled = !process.env.NO_COLOR;

function paint(...codes: number[]): (text: string) => string {
  const open = codes.map(code => `\x1b[${code}m`).join('');
  return text => (colorEnabled ? `${open}${text}\x1b[${SGR.reset}m` : text);
}

export const style = {
  bold: paint(SGR.bold),
  dim: paint(SGR.dim),
  label: paint(SGR.dim),
  muted: paint(SGR.gray),

  success: paint(SGR.green),
  error: paint(SGR.red),
  warning: paint(SGR.yellow),
  info: paint(SGR.cyan),

  primary: paint(SGR.brightCyan),
  accent: paint(SGR.magenta),
  command: paint(SGR.bold, SGR.cyan),
  path: paint(SGR.blue),
  number: paint(SGR.brightYellow),
};

export const icons = {
  success: '✓',
  error: '✗',
  warning: '⚠',
  arrow: '→',
  arrowRight: '▸',
  bullet: '•',
  test: '🧪',
  replay: '↻',
  broom: '🧹',
};

const frame = {
  topLeft: '╭',
  topRight: '╮',
  bottomLeft: '╰',
  bottomRight: '╯',
  horizontal: '─',
  vertical: '│',
};

export const BANNER_MINIMAL = `${style.accent('stepwise')} ${style.muted('·')} ${style.dim('trace, classify and test tool-using agents')}`;

export function section(title: string): string {
  const rule = frame.horizontal.repeat(Math.max(0, 34 - title.length));
  return `\n${style.dim(frame.horizontal.repeat(4))} ${style.bold(title)} ${style.dim(rule)}`;
}

export function keyValue(key: string, value: string | number, indent = 0): string {
  return `${'  '.repeat(indent)}${style.label(`${key}:`)} ${value}`;
}

const SPINNER_FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];

/** Progress indicator for long agent calls. Silent when stdout is not a TTY. */
export class Spinner {
  private tick = 0;
  private timer: NodeJS.Timeout | undefined;

  constructor(private label: string) {}

  start(): this {
    if (process.stdout.isTTY) {
      process.stdout.write('\x1b[?25l');
      this.draw();
      this.timer = setInterval(() => this.draw(), 80);
    }
    return this;
  }

  succeed(label = this.label): void {
    this.stop();
    console.log(`${style.success(icons.success)} ${label}`);
  }

  fail(label = this.label): void {
    this.stop();
    console.log(`${style.error(icons.error)} ${label}`);
  }

  stop(): void {
    clearInterval(this.timer);
    this.timer = undefined;
    if (process.stdout.isTTY) {
      process.stdout.write('\x1b[?25h\r\x1b[2K');
    }
  }

  private draw(): void {
    const glyph = SPINNER_FRAMES[this.tick++ % SPINNER_FRAMES.length];
    process.stdout.write(`\r${style.info(glyph)} ${this.label}`);
  }
}

const BOX_WIDTH = 38;

export function resultBox(results: { passed: number; failed: number; duration?: number }): string {
  const { passed, failed, duration } = results;
  const edge = (left: string, right: string) =>
    style.primary(`  ${left}${frame.horizontal.repeat(BOX_WIDTH)}${right}`);
  const row = (content = '') =>
    style.primary(`  ${frame.vertical}`) +
    content +
    ' '.repeat(Math.max(0, BOX_WIDTH - stripAnsi(content).length)) +
    style.primary(frame.vertical);

  const rows = [
    row(),
    row(`   ${style.bold('Test Results')}`),
    row(),
    row(`   ${style.success(icons.success)} Passed:  ${String(passed).padStart(4)}`),
    row(`   ${style.error(icons.error)} Failed:  ${String(failed).padStart(4)}`),
    row(style.dim(`   ${frame.horizontal.repeat(20)}`)),
    row(`   Total:     ${String(passed + failed).padStart(4)}`),
  ];
  if (duration !== undefined) {
    rows.push(row(`   Duration:  ${formatDuration(duration)}`));
  }
  rows.push(row());

  return [edge(frame.topLeft, frame.topRight), ...rows, edge(frame.bottomLeft, frame.bottomRight)].join('\n');
}

export function formatError(message: string, suggestions: string[] = []): string {
  const hints = suggestions.map(hint => `    ${style.dim(icons.arrowRight)} ${hint}`);
  const body = hints.length > 0 ? ['', style.dim('  Suggestions:'), ...hints] : [];
  return [`\n${style.error(`${icons.error} Error:`)} ${message}`, ...body, ''].join('\n');
}

export function nextSteps(steps: { command: string; description: string }[]): string {
  const width = Math.max(...steps.map(step => step.command.length));
  const rows = steps.map(
    step => `  ${style.command(step.command.padEnd(width))}  ${style.dim(step.description)}`
  );
  return [`\n${style.bold('Next steps:')}`, ...rows, ''].join('\n');
}

/** Diagnostic output on stderr, only when STEPWISE_DEBUG is set. */
export function debug(message: string): void {
  if (process.env.STEPWISE_DEBUG) {
    console.error(style.dim(`[debug] ${message}`));
  }
}
