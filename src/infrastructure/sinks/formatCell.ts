/** Text for one numeric cell: the shortest round-trip form, with `nan`/`inf`/`-inf` for non-finite values. */
export function formatCell(value: number): string {
  if (Number.isNaN(value)) return 'nan';
  if (value === Infinity) return 'inf';
  if (value === -Infinity) return '-inf';
  return String(value);
}
