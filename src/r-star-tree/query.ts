import { type Point, type Region, contains, distanceSquared, overlaps, pointDistanceSquared } from './bounds';
import { type Heap, createHeap, heapPeekPriority, heapPop, heapPush, heapSize } from './heap';
import { type LeafNode, type TreeNode, type BranchNode, unknownNode } from './node';

export type Filter<Data> = (data: Data) => boolean;

export interface NearestSearch<Data> {
    dimensions: number;
    key: Point;
    k: number;
    filter: Filter<Data>;
    /** Max-heap of the best candidates so far, keyed by squared distance. */
    results: Heap<Data>;
}

function offer<Data>(search: NearestSearch<Data>, data: Data, distance: number): void {
    if (heapSize(search.results) < search.k) {
        heapPush(search.results, data, distance);
        return;
    }
    const worst = heapPeekPriority(search.results);
    if (worst !== undefined && distance < worst) {
        heapPop(search.results);
        heapPush(search.results, data, distance);
    }
}

function nearestInLeaf<Data>(search: NearestSearch<Data>, node: LeafNode<Data>): void {
    for (const entry of node.entries) {
        if (!search.filter(entry.data)) {
            continue;
        }
        const distance = pointDistanceSquared(search.key, entry.region.min, search.dimensions);
        offer(search, entry.data, distance);
    }
}

function nearestInBranch<Data>(search: NearestSearch<Data>, node: BranchNode<Data>): void {
    const queue = createHeap<TreeNode<Data>>('min');
    for (const entry of node.entries) {
        heapPush(queue, entry.child, distanceSquared(search.key, entry.region, search.dimensions));
    }
    let next = heapPop(queue);
    while (next !== undefined) {
        if (heapSize(search.results) >= search.k) {
            const worst = heapPeekPriority(search.results);
            // Nothing in this subtree can be strictly closer than the current k-th best.
            if (worst !== undefined && next.priority > worst) {
                break;
            }
        }
        nearest(search, next.item);
        next = heapPop(queue);
    }
}

/** Branch-and-bound walk collecting the `k` closest accepted values below `node`. */
export function nearest<Data>(search: NearestSearch<Data>, node: TreeNode<Data>): void {
    switch (node.type) {
        case 'leaf':
            nearestInLeaf(search, node);
            break;
        case 'branch':
            nearestInBranch(search, node);
            break;
        default:
            unknownNode(node);
    }
}

/** Drains the result heap nearest-first. */
export function collectNearest<Data>(results: Heap<Data>): Data[] {
    const output: Data[] = [];
    let entry = heapPop(results);
    while (entry !== undefined) {
        output.push(entry.item);
        entry = heapPop(results);
    }
    return output.reverse();
}

/** Every value below `node` whose point lies inside `region`, borders inclusively. */
export function searchRegion<Data>(node: TreeNode<Data>, region: Region, dimensions: number): Data[] {
    switch (node.type) {
        case 'leaf':
            return node.entries
                .filter((entry) => contains(region, entry.region.min, dimensions))
                .map((entry) => entry.data);
        case 'branch':
            return node.entries
                .filter((entry) => overlaps(region, entry.region, dimensions))
                .map((entry) => searchRegion(entry.child, region, dimensions))
                .reduce<Data[]>((accumulator, data) => accumulator.concat(data), []);
        default:
            return unknownNode(node);
    }
}
