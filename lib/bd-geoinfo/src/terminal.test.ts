import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  Terminal,
  addToTerminal,
  clearFromTerminal,
  showTerminal,
  getDefaultTerminal,
  formatContent,
  formatTimestamp,
} from './terminal.js';
import { Division } from './entities/division.js';

const EMPTY_BLOCK = '┌──┐\n└──┘';

function silentTerminal(options: { timestamps?: boolean; clock?: () => Date } = {}) {
  const write = vi.fn();
  return { terminal: new Terminal({ ...options, output: { write } }), write };
}

describe('formatContent', () => {
  it('splits plain text on newlines', () => {
    expect(formatContent('Dhaka')).toEqual(['Dhaka']);
    expect(formatContent('one\ntwo\r\nthree')).toEqual(['one', 'two', 'three']);
  });

  it('turns map strings into a map link', () => {
    expect(formatContent('map:22.701,90.3535')).toEqual([
      'Map: https://maps.google.com/maps?q=22.701,90.3535',
    ]);
    expect(formatContent('MAP: 24.8949 , 91.8687')).toEqual([
      'Map: https://maps.google.com/maps?q=24.8949,91.8687',
    ]);
  });

  it('flags malformed coordinates', () => {
    expect(formatContent('map:north,east')).toEqual(['[Invalid map coordinates] map:north,east']);
    expect(formatContent('map:22.7')).toEqual(['[Invalid map coordinates] map:22.7']);
  });

  it('labels URLs, adding a scheme to bare www addresses', () => {
    expect(formatContent('www.dhakadiv.gov.bd')).toEqual(['Link: https://www.dhakadiv.gov.bd']);
    expect(formatContent('http://example.com/a')).toEqual(['Link: http://example.com/a']);
  });

  it('labels image paths before URLs', () => {
    expect(formatContent('maps/sylhet.PNG')).toEqual(['Image: maps/sylhet.PNG']);
    expect(formatContent('https://example.com/a.jpg')).toEqual(['Image: https://example.com/a.jpg']);
  });

  it('pretty-prints objects and arrays as JSON', () => {
    expect(formatContent({ name: 'Sylhet', population: 1 })).toEqual([
      '{',
      '  "name": "Sylhet",',
      '  "population": 1',
      '}',
    ]);
    expect(formatContent(['a'])).toEqual(['[', '  "a"', ']']);
  });

  it('prints scalars as text', () => {
    expect(formatContent(42)).toEqual(['42']);
    expect(formatContent(false)).toEqual(['false']);
    expect(formatContent(null)).toEqual(['null']);
  });

  it('renders lookup handles through their record', () => {
    const lines = formatContent(new Division('Sylhet'));
    expect(JSON.parse(lines.join('\n'))).toMatchObject({ id: 8, name: 'Sylhet', nameLocal: 'সিলেট' });
    expect(formatContent(new Division('Atlantis'))).toEqual(['null']);
  });

  it('falls back to text when toJSON yields nothing', () => {
    expect(formatContent({ toJSON: () => undefined })).toEqual(['[object Object]']);
  });
});

describe('formatTimestamp', () => {
  it('uses a zero-padded 12-hour clock', () => {
    expect(formatTimestamp(new Date(2024, 0, 1, 15, 4, 5))).toBe('[03:04:05]');
    expect(formatTimestamp(new Date(2024, 0, 1, 0, 0, 0))).toBe('[12:00:00]');
    expect(formatTimestamp(new Date(2024, 0, 1, 11, 59, 59))).toBe('[11:59:59]');
  });
});

describe('Terminal', () => {
  it('renders an empty block when nothing was added', () => {
    const { terminal } = silentTerminal();
    expect(terminal.render()).toBe(EMPTY_BLOCK);
  });

  it('keeps lines in insertion order', () => {
    const { terminal } = silentTerminal();
    terminal.add('A');
    terminal.add('B');

    expect(terminal.render()).toBe('┌───┐\n│ A │\n│ B │\n└───┘');
  });

  it('pads every row to the widest line', () => {
    const { terminal } = silentTerminal();
    terminal.add('Dhaka');
    terminal.add('Sylhet');

    expect(terminal.render()).toBe('┌────────┐\n│ Dhaka  │\n│ Sylhet │\n└────────┘');
  });

  it('aligns Bangla rows by grapheme, not code point', () => {
    const { terminal } = silentTerminal();
    terminal.add('সিলেট');
    terminal.add('abc');

    expect(terminal.render()).toBe('┌─────┐\n│ সিলেট │\n│ abc │\n└─────┘');
  });

  it('counts entries, not lines', () => {
    const { terminal } = silentTerminal();
    terminal.add({ a: 1 });
    terminal.add('x');

    expect(terminal.size).toBe(2);
    expect(terminal.lines()).toEqual(['{', '  "a": 1', '}', 'x']);
  });

  it('writes the block on show and keeps the buffer', () => {
    const { terminal, write } = silentTerminal();
    terminal.add('A');

    const block = terminal.show();

    expect(block).toBe('┌───┐\n│ A │\n└───┘');
    expect(write).toHaveBeenCalledWith('┌───┐\n│ A │\n└───┘\n');
    expect(terminal.size).toBe(1);
    expect(terminal.show()).toBe(block);
  });

  it('clears idempotently', () => {
    const { terminal } = silentTerminal();
    terminal.add('A');
    terminal.clear();
    terminal.clear();

    expect(terminal.size).toBe(0);
    expect(terminal.show()).toBe(EMPTY_BLOCK);
  });

  it('stamps the first line of each entry when timestamps are on', () => {
    const { terminal } = silentTerminal({
      timestamps: true,
      clock: () => new Date(2024, 0, 1, 15, 4, 5),
    });
    terminal.add('hello');
    terminal.add('a\nb');

    expect(terminal.lines()).toEqual([
      '[03:04:05] hello',
      '[03:04:05] a',
      '           b',
    ]);
  });

  it('keeps separate buffers per instance', () => {
    const first = silentTerminal().terminal;
    const second = silentTerminal().terminal;
    first.add('only here');

    expect(second.render()).toBe(EMPTY_BLOCK);
  });
});

describe('default terminal', () => {
  afterEach(() => {
    clearFromTerminal();
    vi.restoreAllMocks();
  });

  it('shares one buffer across the module functions', () => {
    const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    clearFromTerminal();
    addToTerminal('A');
    addToTerminal('B');

    expect(showTerminal()).toBe('┌───┐\n│ A │\n│ B │\n└───┘');
    expect(write).toHaveBeenCalledWith('┌───┐\n│ A │\n│ B │\n└───┘\n');
    expect(getDefaultTerminal().size).toBe(2);
  });

  it('renders an empty block after clearing', () => {
    vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    addToTerminal('A');
    clearFromTerminal();

    expect(showTerminal()).toBe(EMPTY_BLOCK);
  });
});
