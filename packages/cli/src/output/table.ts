import Table from 'cli-table3';

/** Plain box table; colours stay off so piped output is clean. */
export function formatTable(head: string[], rows: string[][]): string {
  const table = new Table({ head, style: { head: [], border: [] } });
  table.push(...rows);
  return table.toString();
}
