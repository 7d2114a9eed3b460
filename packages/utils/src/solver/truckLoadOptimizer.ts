/**
 * Warehouse Planner - Truck Load Optimizer
 *
 * Picks the subset of candidate packages with the largest total size that
 * still fits the truck. Exhaustive depth-first search over include/skip
 * choices in input order, cut only where an inclusion would overflow.
 * Runs on an explicit work stack, so list length never limits call depth.
 * Exponential in the candidate count; callers with long lists should pass
 * maxNodes.
 */

import { Package, TruckLoadOptions, TruckLoadPlan } from '../types';

// Combinations share their prefixes, so extending one is O(1) and the
// work stack never copies package lists.
interface Chain {
  pkg: Package;
  parent: Chain | null;
}

interface SearchFrame {
  index: number;
  combination: Chain | null;
  total: number;
}

function toPackages(chain: Chain | null): Package[] {
  const packages: Package[] = [];
  for (let link = chain; link; link = link.parent) {
    packages.push(link.pkg);
  }
  return packages.reverse();
}

export function optimizeTruckLoad(
  packages: readonly Package[],
  maxCapacity: number,
  options: TruckLoadOptions = {}
): TruckLoadPlan {
  const limit = options.maxNodes ?? Number.POSITIVE_INFINITY;
  const frames: SearchFrame[] = [{ index: 0, combination: null, total: 0 }];
  let best: SearchFrame = frames[0];
  let explored = 0;
  let truncated = false;

  // Skip is pushed before include so include is explored first, and only a
  // strictly larger total replaces the best: among equal totals the first
  // subset reached wins.
  for (let frame = frames.pop(); frame; frame = frames.pop()) {
    if (explored >= limit) {
      truncated = true;
      break;
    }
    explored++;

    if (frame.total > best.total) {
      best = frame;
    }

    if (frame.index === packages.length) {
      continue;
    }

    const pkg = packages[frame.index];

    frames.push({ index: frame.index + 1, combination: frame.combination, total: frame.total });
    if (frame.total + pkg.size <= maxCapacity) {
      frames.push({
        index: frame.index + 1,
        combination: { pkg, parent: frame.combination },
        total: frame.total + pkg.size
      });
    }
  }

  return {
    packages: toPackages(best.combination),
    total_size: best.total,
    max_capacity: maxCapacity,
    nodes_explored: explored,
    truncated
  };
}
