/**
 * Borderless report tables
 * @module utils/ui/tables
 */

import Table from 'cli-table3';

export interface TableOptions {
  head?: string[];
}

const BORDERLESS = {
  top: '',
  'top-mid': '',
  'top-left': '',
  'top-right': '',
  bottom: '',
  'bottom-mid': '',
  'bottom-left': '',
  'bottom-right': '',
  left: '',
  'left-mid': '',
  mid: '',
  'mid-mid': '',
  right: '',
  'right-mid': '',
  middle: ' ',
};

/**
 * Render rows as a borderless table.
 * Cells may contain ANSI colors; widths are measured without them.
 */
export function table(rows: string[][], options: TableOptions = {}): string {
  const t = new Table({
    head: options.head ?? [],
    chars: BORDERLESS,
    style: { head: [], border: [], 'padding-left': 0, 'padding-right': 1 },
    wordWrap: false,
  });

  t.push(...rows);
  return t.toString();
}
