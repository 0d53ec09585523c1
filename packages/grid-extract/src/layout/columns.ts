/**
 * Column anchor detection.
 * Clusters the x coordinates of all tokens into column centers.
 */
import type { Token, ColumnAnchor } from '@gridscan/types';
import { COLUMN_THRESHOLD, median, consecutiveGaps } from '@gridscan/types';

export interface ColumnClusterOptions {
  /** Fixed gap threshold in pixels; computed from the token gaps when omitted */
  threshold?: number;
}

/**
 * Horizontal gap that closes a column cluster: twice the median gap between
 * sorted x values, never below 20. Undefined with fewer than two tokens.
 */
export function computeColumnThreshold(tokens: readonly Token[]): number | undefined {
  const xs = tokens.map(token => token.x).sort((a, b) => a - b);
  const medianGap = median(consecutiveGaps(xs));
  if (medianGap === undefined) return undefined;
  return Math.max(COLUMN_THRESHOLD.MIN, medianGap * COLUMN_THRESHOLD.FACTOR);
}

/**
 * Derive column anchors from every token's x coordinate.
 *
 * Sorted x values join the current cluster while they stay within the
 * threshold of the cluster's last member; each closed cluster contributes its
 * median as an anchor.
 *
 * @returns Anchors in ascending order; empty when there is nothing to cluster
 */
export function clusterColumns(
  tokens: readonly Token[],
  options: ColumnClusterOptions = {}
): ColumnAnchor[] {
  if (tokens.length < 2) return [];

  const threshold = options.threshold ?? computeColumnThreshold(tokens);
  if (threshold === undefined) return [];

  const xPositions = tokens.map(token => token.x).sort((a, b) => a - b);
  const first = xPositions[0];
  if (first === undefined) return [];

  const anchors: ColumnAnchor[] = [];
  let currentCluster: number[] = [first];

  for (let i = 1; i < xPositions.length; i++) {
    const x = xPositions[i];
    const last = currentCluster[currentCluster.length - 1];
    if (x === undefined || last === undefined) continue;

    if (x - last < threshold) {
      currentCluster.push(x);
    } else {
      anchors.push(clusterCenter(currentCluster));
      currentCluster = [x];
    }
  }
  anchors.push(clusterCenter(currentCluster));

  return anchors;
}

function clusterCenter(cluster: number[]): number {
  return median(cluster) ?? 0;
}
