import Table from 'cli-table3';

export function formatTable(
  head: string[],
  rows: string[][],
  options?: Table.TableConstructorOptions,
): string {
  const table = new Table({ head, style: { head: [], border: [] }, ...options });
  rows.forEach((row) => table.push(row));
  return table.toString();
}

export function printTable(
  head: string[],
  rows: string[][],
  options?: Table.TableConstructorOptions,
): void {
  console.log(formatTable(head, rows, options));
}
