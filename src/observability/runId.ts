/** Sortable run identifier, e.g. `20260101T120000Z-k3f9qa`. Lease owners are derived from it. */
export function createRunId(now = new Date(), random: () => number = Math.random): string {
  const stamp = now.toISOString().slice(0, 19).replace(/[-:]/g, "");
  const suffix = random().toString(36).slice(2, 8).padEnd(6, "0");
  return `${stamp}Z-${suffix}`;
}
