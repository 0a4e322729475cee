import { ValidationError } from '../errors.js';
import { euclideanDistance } from '../storage/vector.js';
import { NOISE } from './types.js';
import type { HdbscanOptions } from './types.js';

/**
 * Density-based hierarchical clustering (HDBSCAN) over Euclidean distance.
 *
 * core distance -> mutual reachability -> minimum spanning tree ->
 * single-linkage hierarchy -> condensed tree -> stable cluster selection.
 * Time is O(n²·d); memory stays O(n) because no distance matrix is kept.
 * Runs inside a clustering worker, never on the main thread.
 */

// Stand-in for 1/0 when duplicates sit at distance zero
const MAX_LAMBDA = 1e12;

interface Edge {
  a: number;
  b: number;
  weight: number;
}

interface LinkageNode {
  left: number;
  right: number;
  distance: number;
  size: number;
}

interface CondensedEntry {
  parent: number;
  child: number;
  lambda: number;
  childSize: number;
}

export interface HdbscanResult {
  labels: number[];
  probabilities: number[];
}

// Distance to the k-th nearest other point, keeping only the k smallest per row
function coreDistances(points: ArrayLike<number>[], minSamples: number): Float64Array {
  const n = points.length;
  const k = Math.min(n - 1, minSamples);
  const core = new Float64Array(n);
  const nearest = new Float64Array(k);

  for (let i = 0; i < n; i++) {
    nearest.fill(Infinity);
    for (let j = 0; j < n; j++) {
      if (j === i) continue;
      const d = euclideanDistance(points[i], points[j]);
      if (d >= nearest[k - 1]) continue;
      let slot = k - 1;
      while (slot > 0 && nearest[slot - 1] > d) {
        nearest[slot] = nearest[slot - 1];
        slot--;
      }
      nearest[slot] = d;
    }
    core[i] = nearest[k - 1];
  }
  return core;
}

// Prim over the implicit mutual-reachability graph; distances are computed
// as they are needed so memory stays linear in n
function minimumSpanningTree(points: ArrayLike<number>[], core: Float64Array): Edge[] {
  const n = points.length;
  const inTree = new Uint8Array(n);
  const best = new Float64Array(n).fill(Infinity);
  const from = new Int32Array(n).fill(-1);
  const edges: Edge[] = [];

  let current = 0;
  inTree[0] = 1;

  for (let added = 1; added < n; added++) {
    for (let j = 0; j < n; j++) {
      if (inTree[j]) continue;
      const reach = Math.max(core[current], core[j], euclideanDistance(points[current], points[j]));
      if (reach < best[j]) {
        best[j] = reach;
        from[j] = current;
      }
    }

    let next = -1;
    for (let j = 0; j < n; j++) {
      if (!inTree[j] && (next === -1 || best[j] < best[next])) next = j;
    }

    inTree[next] = 1;
    edges.push({ a: from[next], b: next, weight: best[next] });
    current = next;
  }

  // Array.prototype.sort is stable, so equal weights keep discovery order
  return edges.sort((x, y) => x.weight - y.weight);
}

// Nodes 0..n-1 are points; merge i creates node n + i
function singleLinkage(edges: Edge[], n: number): LinkageNode[] {
  const parent = new Int32Array(2 * n - 1).map((_, i) => i);
  const size = new Int32Array(2 * n - 1).fill(1);
  const find = (x: number): number => {
    let root = x;
    while (parent[root] !== root) root = parent[root];
    while (parent[x] !== root) {
      const up = parent[x];
      parent[x] = root;
      x = up;
    }
    return root;
  };

  const nodes: LinkageNode[] = [];
  for (const edge of edges) {
    const left = find(edge.a);
    const right = find(edge.b);
    const id = n + nodes.length;
    parent[left] = id;
    parent[right] = id;
    size[id] = size[left] + size[right];
    nodes.push({ left, right, distance: edge.weight, size: size[id] });
  }
  return nodes;
}

function toLambda(distance: number): number {
  return distance > 0 ? 1 / distance : MAX_LAMBDA;
}

function condenseTree(nodes: LinkageNode[], n: number, minClusterSize: number): CondensedEntry[] {
  const sizeOf = (node: number): number => (node < n ? 1 : nodes[node - n].size);
  const leavesOf = (node: number): number[] => {
    const leaves: number[] = [];
    const stack = [node];
    while (stack.length > 0) {
      const current = stack.pop();
      if (current === undefined) break;
      if (current < n) {
        leaves.push(current);
      } else {
        stack.push(nodes[current - n].left, nodes[current - n].right);
      }
    }
    return leaves;
  };

  const root = 2 * n - 2;
  const relabel = new Map<number, number>([[root, n]]);
  let nextLabel = n + 1;
  const entries: CondensedEntry[] = [];
  const queue = [root];

  for (let head = 0; head < queue.length; head++) {
    const node = queue[head];
    if (node < n) continue;
    const label = relabel.get(node);
    if (label === undefined) continue;

    const { left, right, distance } = nodes[node - n];
    const lambda = toLambda(distance);
    const leftSize = sizeOf(left);
    const rightSize = sizeOf(right);
    const leftBig = leftSize >= minClusterSize;
    const rightBig = rightSize >= minClusterSize;

    if (leftBig && rightBig) {
      for (const [child, childSize] of [[left, leftSize], [right, rightSize]]) {
        relabel.set(child, nextLabel);
        entries.push({ parent: label, child: nextLabel, lambda, childSize });
        nextLabel++;
        queue.push(child);
      }
      continue;
    }

    for (const [child, big] of [[left, leftBig], [right, rightBig]] as const) {
      if (big) {
        // The cluster carries on under its parent's label
        relabel.set(child, label);
        queue.push(child);
      } else {
        for (const point of leavesOf(child)) {
          entries.push({ parent: label, child: point, lambda, childSize: 1 });
        }
      }
    }
  }

  return entries;
}

function selectClusters(
  entries: CondensedEntry[],
  n: number,
  method: 'eom' | 'leaf'
): Set<number> {
  const birth = new Map<number, number>([[n, 0]]);
  const children = new Map<number, number[]>();
  for (const entry of entries) {
    if (entry.child >= n) {
      birth.set(entry.child, entry.lambda);
      const list = children.get(entry.parent) ?? [];
      list.push(entry.child);
      children.set(entry.parent, list);
    }
  }

  const stability = new Map<number, number>();
  for (const cluster of birth.keys()) stability.set(cluster, 0);
  for (const entry of entries) {
    const start = birth.get(entry.parent) ?? 0;
    stability.set(entry.parent, (stability.get(entry.parent) ?? 0) + (entry.lambda - start) * entry.childSize);
  }

  // Children always carry larger labels than their parents
  const clusters = Array.from(birth.keys()).filter((c) => c !== n).sort((x, y) => y - x);
  const selected = new Set<number>();

  if (method === 'leaf') {
    for (const cluster of clusters) {
      if (!children.has(cluster)) selected.add(cluster);
    }
    return selected;
  }

  const descendants = (cluster: number): number[] => {
    const out: number[] = [];
    const stack = [...(children.get(cluster) ?? [])];
    while (stack.length > 0) {
      const current = stack.pop();
      if (current === undefined) break;
      out.push(current);
      stack.push(...(children.get(current) ?? []));
    }
    return out;
  };

  for (const cluster of clusters) {
    const own = stability.get(cluster) ?? 0;
    const subtree = (children.get(cluster) ?? []).reduce((sum, child) => sum + (stability.get(child) ?? 0), 0);
    if (subtree > own) {
      stability.set(cluster, subtree);
    } else {
      selected.add(cluster);
      for (const below of descendants(cluster)) selected.delete(below);
    }
  }
  return selected;
}

function labelPoints(
  entries: CondensedEntry[],
  n: number,
  selected: Set<number>
): HdbscanResult {
  const parentOf = new Map<number, number>();
  const pointEntries: CondensedEntry[] = [];
  for (const entry of entries) {
    if (entry.child >= n) {
      parentOf.set(entry.child, entry.parent);
    } else {
      pointEntries.push(entry);
    }
  }

  const ordered = Array.from(selected).sort((x, y) => x - y);
  const labelOf = new Map(ordered.map((cluster, index) => [cluster, index]));
  const labels: number[] = new Array(n).fill(NOISE);
  const lambdas = new Float64Array(n);
  const maxLambda = new Float64Array(ordered.length);

  for (const entry of pointEntries) {
    let cluster: number | undefined = entry.parent;
    while (cluster !== undefined && !selected.has(cluster)) {
      cluster = parentOf.get(cluster);
    }
    if (cluster === undefined) continue;

    const label = labelOf.get(cluster);
    if (label === undefined) continue;
    labels[entry.child] = label;
    lambdas[entry.child] = entry.lambda;
    maxLambda[label] = Math.max(maxLambda[label], entry.lambda);
  }

  const probabilities = labels.map((label, point) => {
    if (label === NOISE) return 0;
    const max = maxLambda[label];
    return max > 0 ? Math.min(lambdas[point], max) / max : 1;
  });

  return { labels, probabilities };
}

export function hdbscan(points: ArrayLike<number>[], options: HdbscanOptions): HdbscanResult {
  const { minClusterSize, minSamples } = options;
  if (!Number.isInteger(minClusterSize) || minClusterSize < 2) {
    throw new ValidationError(`minClusterSize must be an integer >= 2, got ${minClusterSize}`);
  }
  if (!Number.isInteger(minSamples) || minSamples < 1) {
    throw new ValidationError(`minSamples must be a positive integer, got ${minSamples}`);
  }

  const n = points.length;
  if (n < 2 || n < minClusterSize) {
    return { labels: new Array(n).fill(NOISE), probabilities: new Array(n).fill(0) };
  }

  const core = coreDistances(points, minSamples);
  const edges = minimumSpanningTree(points, core);
  const tree = condenseTree(singleLinkage(edges, n), n, minClusterSize);
  const selected = selectClusters(tree, n, options.selectionMethod ?? 'eom');
  return labelPoints(tree, n, selected);
}
