// src/utils/duration.ts

const UNITS: ReadonlyArray<[suffix: string, nanos: bigint, digits: number]> = [
  ["s", 1_000_000_000n, 9],
  ["ms", 1_000_000n, 6],
  ["µs", 1_000n, 3],
];

/** Render elapsed nanoseconds as `850ns`, `12.5µs`, `1.234567ms`, `1.5s`, keeping every significant digit. */
export function formatDuration(nanos: bigint): string {
  if (nanos < 0n) return `-${formatDuration(-nanos)}`;
  for (const [suffix, size, digits] of UNITS) {
    if (nanos >= size) {
      const whole = nanos / size;
      const decimals = (nanos % size).toString().padStart(digits, "0").replace(/0+$/, "");
      return decimals ? `${whole}.${decimals}${suffix}` : `${whole}${suffix}`;
    }
  }
  return `${nanos}ns`;
}
