import type { CompositionRow } from '@tagstore/maintenance';

interface Column {
  header: string;
  width: number;
  value: (row: CompositionRow) => string;
  align?: 'left' | 'right';
}

export interface CompositionSummary {
  creators: number;
  tags: number;
}

// Fixed widths: rows are printed as they stream in, before the longest value is known
function columnsFor(byCurrency: boolean): Column[] {
  const columns: Column[] = [
    { header: 'Creator', value: (row) => row.creator, width: 16 },
    { header: 'Category', value: (row) => row.category ?? '-', width: 16 },
    { header: 'Public', value: (row) => (row.isPublic ? 'yes' : 'no'), width: 6 },
  ];
  if (byCurrency) {
    columns.push({ header: 'Currency', value: (row) => row.currency ?? '-', width: 8 });
  }
  columns.push(
    { align: 'right', header: 'Labels', value: (row) => String(row.labelsCount), width: 6 },
    { align: 'right', header: 'Tags', value: (row) => String(row.tagsCount), width: 8 }
  );
  return columns;
}

function render(columns: Column[], values: string[]): string {
  return values
    .map((value, i) => {
      const column = columns[i];
      if (!column) return value;
      return column.align === 'right' ? value.padStart(column.width) : value.padEnd(column.width);
    })
    .join('  ')
    .trimEnd();
}

export function formatCompositionHeader(byCurrency: boolean): string {
  const columns = columnsFor(byCurrency);
  return render(columns, columns.map((column) => column.header));
}

export function formatCompositionRow(row: CompositionRow, byCurrency: boolean): string {
  const columns = columnsFor(byCurrency);
  return render(columns, columns.map((column) => column.value(row)));
}

/**
 * Consumes the composition stream once. Each row is handed to `emit` as soon
 * as it arrives, after the header; rows are only kept when `collect` is set.
 */
export async function streamComposition(
  source: AsyncIterable<CompositionRow>,
  options: { byCurrency: boolean; collect: boolean; emit: (line: string) => void }
): Promise<{ rows: CompositionRow[]; summary: CompositionSummary }> {
  const rows: CompositionRow[] = [];
  const creators = new Set<string>();
  let tags = 0;

  options.emit(formatCompositionHeader(options.byCurrency));
  for await (const row of source) {
    creators.add(row.creator);
    tags += row.tagsCount;
    if (options.collect) {
      rows.push(row);
    }
    options.emit(formatCompositionRow(row, options.byCurrency));
  }

  return { rows, summary: { creators: creators.size, tags } };
}
