import { type Point, type Region, cloneRegion, combine } from './bounds';
import { DimensionMismatchError } from './errors';
import { createHeap } from './heap';
import { type BranchNode, type TreeNode, insertIntoNode, makeLeaf, unknownNode } from './node';
import { type ResolvedTreeOptions, type TreeOptions, resolveOptions } from './options';
import { type Filter, collectNearest, nearest, searchRegion } from './query';

export interface Tree<Data> extends ResolvedTreeOptions {
    /** Absent until the first insert. */
    root: TreeNode<Data> | undefined;
}

function checkDimensions<Data>(tree: Tree<Data>, point: Point): void {
    if (point.length !== tree.dimensions) {
        throw new DimensionMismatchError(tree.dimensions, point.length);
    }
}

const acceptAll = () => true;

export function makeTree<Data>(options: TreeOptions): Tree<Data> {
    return {
        ...resolveOptions(options),
        root: undefined
    };
}

/** Stores `data` at `key`. Equal keys are kept side by side, never overwritten. */
export function insert<Data>(tree: Tree<Data>, key: Point, data: Data): void {
    checkDimensions(tree, key);
    if (tree.root === undefined) {
        tree.root = makeLeaf(key, data);
        return;
    }
    const split = insertIntoNode(tree, tree.root, key, data);
    if (split === undefined) {
        return;
    }
    const root: BranchNode<Data> = {
        type: 'branch',
        region: combine(tree.root.region, split.region, tree.dimensions),
        entries: [
            { region: cloneRegion(tree.root.region), child: tree.root },
            { region: split.region, child: split.sibling }
        ]
    };
    tree.root = root;
    tree.logger.debug('root split', { height: height(tree) });
}

/**
 * The `max` values stored nearest to `key` (Euclidean distance), nearest first,
 * skipping values rejected by `filter` without counting them against `max`.
 * Values at equal distance come out in the order the search reached them.
 * A fractional `max` is rounded down.
 */
export function queryWithFilter<Data>(tree: Tree<Data>, key: Point, max: number, filter: Filter<Data>): Data[] {
    checkDimensions(tree, key);
    const k = Math.floor(max);
    if (tree.root === undefined || k <= 0) {
        return [];
    }
    const search = {
        dimensions: tree.dimensions,
        key,
        k,
        filter,
        results: createHeap<Data>('max')
    };
    nearest(search, tree.root);
    return collectNearest(search.results);
}

export function query<Data>(tree: Tree<Data>, key: Point, max = 1): Data[] {
    return queryWithFilter(tree, key, max, acceptAll);
}

/** Values whose key lies inside `region`, borders inclusively. */
export function search<Data>(tree: Tree<Data>, region: Region): Data[] {
    checkDimensions(tree, region.min);
    checkDimensions(tree, region.max);
    if (tree.root === undefined) {
        return [];
    }
    return searchRegion(tree.root, region, tree.dimensions);
}

/** Number of levels, 0 for an empty tree. */
export function height(tree: Tree<unknown>): number {
    let node: TreeNode<unknown> | undefined = tree.root;
    let height = 0;
    while (node !== undefined) {
        height += 1;
        node = node.type === 'branch' ? node.entries[0]?.child : undefined;
    }
    return height;
}

function collectValues<Data>(node: TreeNode<Data>, output: Data[]): void {
    switch (node.type) {
        case 'leaf':
            for (const entry of node.entries) {
                output.push(entry.data);
            }
            break;
        case 'branch':
            for (const entry of node.entries) {
                collectValues(entry.child, output);
            }
            break;
        default:
            unknownNode(node);
    }
}

/** Every stored value, depth first. */
export function values<Data>(tree: Tree<Data>): Data[] {
    const output: Data[] = [];
    if (tree.root !== undefined) {
        collectValues(tree.root, output);
    }
    return output;
}

export function count(tree: Tree<unknown>): number {
    return values(tree).length;
}
