import { LogParseError } from "./errors.js";
import type { Phase } from "./types.js";

export interface ParseRule<T> {
  name: string;
  description: string;
  parse(text: string): T | undefined;
}

export interface ThroughputMatch {
  opsPerSec: number;
  phase: Phase;
}

export type SizeUnit = "K" | "M" | "G" | "";

// Decimal or scientific notation, e.g. 523412.7 or 1.44026e+06
const NUMBER = String.raw`(\d[\d.]*(?:[eE][+-]?\d+)?)`;

function toNumber(rule: string, raw: string): number {
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new LogParseError(rule, raw);
  }
  return value;
}

function throughputRule(label: string, phase: Phase): ParseRule<ThroughputMatch> {
  const name = `${phase}-throughput`;
  const pattern = new RegExp(String.raw`${label} throughput\(ops/sec\):\s*${NUMBER}`);
  return {
    name,
    description: `"${label} throughput(ops/sec): <n>" summary line`,
    parse(text) {
      const raw = pattern.exec(text)?.[1];
      if (raw === undefined) return undefined;
      return { opsPerSec: toNumber(name, raw), phase };
    },
  };
}

/**
 * Convert a size in the given unit to megabytes. A missing unit means bytes.
 */
export function toMegabytes(value: number, unit: SizeUnit): number {
  switch (unit) {
    case "G":
      return value * 1024;
    case "M":
      return value;
    case "K":
      return value / 1024;
    case "":
      return value / (1024 * 1024);
  }
}

const SIZE_PATTERN = /Database size:\s*([\d.,]+)([KMG]?)/;

function isSizeUnit(value: string): value is SizeUnit {
  return value === "K" || value === "M" || value === "G" || value === "";
}

export const RUN_THROUGHPUT = throughputRule("Run", "run");
export const LOAD_THROUGHPUT = throughputRule("Load", "load");

/**
 * Throughput rules in fallback order. The steady-state run figure wins; the
 * load figure is kept for logs where only the load step finished.
 */
export const THROUGHPUT_RULES: readonly ParseRule<ThroughputMatch>[] = [
  RUN_THROUGHPUT,
  LOAD_THROUGHPUT,
];

export const DATABASE_SIZE: ParseRule<number> = {
  name: "database-size",
  description: '"Database size: <n>[K|M|G]" line, in megabytes',
  parse(text) {
    const match = SIZE_PATTERN.exec(text);
    if (!match) return undefined;
    const [, raw = "", unit = ""] = match;
    if (!isSizeUnit(unit)) return undefined;
    return toMegabytes(toNumber("database-size", raw.replace(/,/g, ".")), unit);
  },
};

/**
 * Apply rules in order and return the first value produced
 */
export function firstMatch<T>(rules: readonly ParseRule<T>[], text: string): T | undefined {
  for (const rule of rules) {
    const value = rule.parse(text);
    if (value !== undefined) return value;
  }
  return undefined;
}
