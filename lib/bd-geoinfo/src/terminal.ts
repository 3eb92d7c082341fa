/**
 * Terminal Presenter
 *
 * An ordered buffer of display lines rendered as one bordered block.
 * Each `Terminal` owns its buffer; `addToTerminal`, `clearFromTerminal`
 * and `showTerminal` work on a shared default instance.
 *
 * `show()` leaves the buffer as it is; call `clear()` to start over.
 *
 * @example
 * const term = new Terminal();
 * term.add('Districts of Sylhet');
 * term.add(new Division('Sylhet'));   // rendered as JSON
 * term.add(new District('Sylhet').getMap());
 * term.show();
 */

/** Anything the terminal knows how to render */
export type TerminalContent =
  | string
  | number
  | boolean
  | null
  | readonly unknown[]
  | { [key: string]: unknown }
  | { toJSON(): unknown };

/** Where `show()` writes; `process.stdout` by default */
export interface TerminalOutput {
  write(chunk: string): unknown;
}

export interface TerminalOptions {
  /** Prefix each entry with "[hh:mm:ss]" (default: false) */
  timestamps?: boolean;
  /** Clock used for timestamps */
  clock?: () => Date;
  output?: TerminalOutput;
}

const URL_PATTERN = /^(https?:\/\/|www\.)\S+$/i;
const COORDINATE_PATTERN = /^-?\d+(\.\d+)?$/;
const IMAGE_PATTERN = /\.(png|jpe?g|gif|bmp|webp|svg)$/i;

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

/**
 * 12-hour "[hh:mm:ss]"
 */
export function formatTimestamp(date: Date): string {
  const hours = date.getHours() % 12 || 12;
  return `[${pad2(hours)}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}]`;
}

function formatMap(item: string): string {
  const parts = item.slice(4).split(',').map(p => p.trim());
  if (parts.length !== 2 || !parts.every(p => COORDINATE_PATTERN.test(p))) {
    return `[Invalid map coordinates] ${item}`;
  }
  const [lat, long] = parts;
  return `Map: https://maps.google.com/maps?q=${lat},${long}`;
}

/**
 * Turn one piece of content into display lines
 */
export function formatContent(item: TerminalContent): string[] {
  if (typeof item === 'string') {
    if (item.toLowerCase().startsWith('map:')) return [formatMap(item)];
    if (IMAGE_PATTERN.test(item)) return [`Image: ${item}`];
    if (URL_PATTERN.test(item)) {
      const url = /^https?:\/\//i.test(item) ? item : `https://${item}`;
      return [`Link: ${url}`];
    }
    return item.split(/\r?\n/);
  }
  if (item === null || typeof item === 'number' || typeof item === 'boolean') {
    return [String(item)];
  }
  const json: string | undefined = JSON.stringify(item, null, 2);
  if (json === undefined) return [String(item)];
  return json.split('\n');
}

const graphemes = new Intl.Segmenter(undefined, { granularity: 'grapheme' });

/** Display width in grapheme clusters, so Bangla vowel signs take no column */
function widthOf(line: string): number {
  return Array.from(graphemes.segment(line)).length;
}

export class Terminal {
  private entries: string[][] = [];
  private readonly timestamps: boolean;
  private readonly clock: () => Date;
  private readonly output: TerminalOutput;

  constructor(options: TerminalOptions = {}) {
    this.timestamps = options.timestamps ?? false;
    this.clock = options.clock ?? (() => new Date());
    this.output = options.output ?? process.stdout;
  }

  /** Number of buffered entries */
  get size(): number {
    return this.entries.length;
  }

  add(item: TerminalContent): void {
    const lines = formatContent(item);
    if (!this.timestamps) {
      this.entries.push(lines);
      return;
    }
    const stamp = formatTimestamp(this.clock());
    const indent = ' '.repeat(stamp.length + 1);
    this.entries.push(lines.map((line, i) => (i === 0 ? `${stamp} ${line}` : `${indent}${line}`)));
  }

  clear(): void {
    this.entries = [];
  }

  /** Buffered display lines, in insertion order */
  lines(): string[] {
    return this.entries.flat();
  }

  render(): string {
    const lines = this.lines();
    const width = lines.reduce((max, line) => Math.max(max, widthOf(line)), 0);
    const rule = '─'.repeat(width + 2);
    return [
      `┌${rule}┐`,
      ...lines.map(line => `│ ${line}${' '.repeat(width - widthOf(line))} │`),
      `└${rule}┘`,
    ].join('\n');
  }

  /**
   * Write the rendered block to the output and return it
   */
  show(): string {
    const block = this.render();
    this.output.write(`${block}\n`);
    return block;
  }
}

const defaultTerminal = new Terminal();

export function getDefaultTerminal(): Terminal {
  return defaultTerminal;
}

export function addToTerminal(item: TerminalContent): void {
  defaultTerminal.add(item);
}

export function clearFromTerminal(): void {
  defaultTerminal.clear();
}

export function showTerminal(): string {
  return defaultTerminal.show();
}
