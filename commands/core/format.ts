/** "YYYY-MM-DD HH:MM:SS" in UTC. */
export function formatUtcTimestamp(instant: Date): string {
  return instant.toISOString().slice(0, 19).replace("T", " ");
}

/** Round half away from zero to one decimal, always printing the decimal. */
export function formatOneDecimal(value: number): string {
  return (Math.round(value * 10) / 10).toFixed(1);
}
