import type { TimeoutBudget } from "@docsift/types";

export type TimeoutBudgets = Record<TimeoutBudget, number>;

const MB = 1024 * 1024;

// [upper bound in MB, extraction s, OCR s, tables s]
const TIERS: ReadonlyArray<readonly [number, number, number, number]> = [
  [1, 15, 30, 20],
  [5, 30, 60, 40],
  [10, 60, 120, 80],
  [25, 120, 240, 150],
  [50, 180, 360, 240],
  [100, 300, 600, 360],
  [200, 450, 900, 540],
  [300, 600, 1200, 720],
  [400, 750, 1500, 900],
];

const LARGEST: readonly [number, number, number] = [900, 1800, 1080];

/**
 * Per-method time budgets in milliseconds, scaled by file size.
 */
export function adaptiveTimeouts(fileSize: number): TimeoutBudgets {
  const sizeMb = fileSize / MB;
  const tier = TIERS.find(([limit]) => sizeMb < limit);
  const [extraction, ocr, tables] = tier ? [tier[1], tier[2], tier[3]] : LARGEST;

  return {
    extraction: extraction * 1000,
    ocr: ocr * 1000,
    tables: tables * 1000,
  };
}
