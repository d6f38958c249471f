import { Vector3 } from "three";
import type { HitMethod } from "./types";

/** One sample under the probed pixel, as read back from the GPU. */
export interface QueryHitResult {
  pos: Vector3;
  /** Distance along the view ray */
  depth: number;
  alpha: number;
}

export interface HitTester {
  mostAlpha(results: readonly QueryHitResult[], threshold: number): QueryHitResult | null;
  closest(results: readonly QueryHitResult[]): QueryHitResult | null;
}

export const DEFAULT_ALPHA_THRESHOLD = 0.05;

/**
 * Composite the samples front to back and pick the front-most one whose
 * contribution (alpha × remaining transmittance) is within `threshold` of
 * the largest contribution.
 */
export function hitByMostAlpha(
  results: readonly QueryHitResult[],
  threshold = DEFAULT_ALPHA_THRESHOLD,
): QueryHitResult | null {
  if (results.length === 0) return null;

  const sorted = [...results].sort((a, b) => a.depth - b.depth);
  let transmittance = 1;
  const contributions = sorted.map((sample) => {
    const contribution = sample.alpha * transmittance;
    transmittance *= 1 - sample.alpha;
    return contribution;
  });

  const max = Math.max(...contributions);
  const index = contributions.findIndex((c) => c >= max - threshold);
  return sorted[index];
}

export function hitByClosest(
  results: readonly QueryHitResult[],
): QueryHitResult | null {
  let best: QueryHitResult | null = null;
  for (const sample of results) {
    if (!best || sample.depth < best.depth) best = sample;
  }
  return best;
}

export const cpuHitTester: HitTester = {
  mostAlpha: hitByMostAlpha,
  closest: hitByClosest,
};

/** Apply the configured policy; no hit resolves to the world origin. */
export function locateHit(
  tester: HitTester,
  method: HitMethod,
  results: readonly QueryHitResult[],
  alphaThreshold: number,
): Vector3 {
  const hit =
    method === "most-alpha"
      ? tester.mostAlpha(results, alphaThreshold)
      : tester.closest(results);
  return hit ? hit.pos.clone() : new Vector3(0, 0, 0);
}
