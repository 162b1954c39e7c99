import { Effect } from "effect";

const KiB = 1024;

const UNITS: Record<string, number> = {
  b: 1,
  k: KiB,
  kb: KiB,
  kib: KiB,
  m: KiB ** 2,
  mb: KiB ** 2,
  mib: KiB ** 2,
  g: KiB ** 3,
  gb: KiB ** 3,
  gib: KiB ** 3,
  t: KiB ** 4,
  tb: KiB ** 4,
  tib: KiB ** 4
};

const usage = (input: string) =>
  new Error(`Invalid size: "${input}". Use formats like: 512MB, 1GB, 2GiB`);

/** Parse a human size into bytes. Units are binary (1GB = 1024^3). */
export const parseSize = (input: string): Effect.Effect<number, Error> => {
  const trimmed = input.trim().toLowerCase();

  if (/^\d+$/.test(trimmed)) {
    return Effect.succeed(parseInt(trimmed, 10));
  }

  const match = trimmed.match(/^(\d+(?:\.\d+)?)\s*([a-z]+)$/);
  const numStr = match?.[1];
  const unit = match?.[2];
  if (!numStr || !unit) {
    return Effect.fail(usage(input));
  }

  const multiplier = UNITS[unit];
  if (multiplier === undefined) {
    return Effect.fail(new Error(`Unknown size unit: "${unit}". Use: B, KB, MB, GB, TB`));
  }

  return Effect.succeed(Math.floor(parseFloat(numStr) * multiplier));
};

/** Swap files are zero-filled in whole mebibytes (`dd bs=1m`). */
export const parseSwapFileSize = (input: string): Effect.Effect<number, Error> =>
  Effect.flatMap(parseSize(input), (bytes) =>
    bytes > 0 && bytes % KiB ** 2 === 0
      ? Effect.succeed(bytes)
      : Effect.fail(new Error(`Swap file size must be a positive whole number of MiB, got "${input}"`))
  );

/** Capacity in decimal units, the way Finder reports volumes. */
export const formatCapacity = (bytes: number): string => {
  if (bytes < 1_000_000) return `${(bytes / 1_000).toFixed(1)} KB`;
  if (bytes < 1_000_000_000) return `${(bytes / 1_000_000).toFixed(1)} MB`;
  if (bytes < 1_000_000_000_000) return `${(bytes / 1_000_000_000).toFixed(1)} GB`;
  return `${(bytes / 1_000_000_000_000).toFixed(2)} TB`;
};
