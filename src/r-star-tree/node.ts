import { type Bounded, type Point, type Region, area, cloneRegion, combine, expand, expandPoint, pointRegion } from './bounds';
import { CorruptNodeError } from './errors';
import type { ResolvedTreeOptions } from './options';
import { packEntries, rStarSplit } from './split';

export interface LeafEntry<Data> extends Bounded {
    data: Data;
}

export interface LeafNode<Data> {
    type: 'leaf';
    /** Tight union of the entry regions. */
    region: Region;
    entries: LeafEntry<Data>[];
}

export interface BranchEntry<Data> extends Bounded {
    child: TreeNode<Data>;
}

export interface BranchNode<Data> {
    type: 'branch';
    /** Tight union of the entry regions. */
    region: Region;
    entries: BranchEntry<Data>[];
}

export type TreeNode<Data> = BranchNode<Data> | LeafNode<Data>;

export type Entry<Data> = LeafEntry<Data> | BranchEntry<Data>;

/** Produced when a node overflowed: the sibling holds the upper half of its entries. */
export interface SplitResult<Data> {
    region: Region;
    sibling: TreeNode<Data>;
}

export function unknownNode(node: never): never {
    throw new CorruptNodeError(`unknown node variant ${String(Reflect.get(node, 'type'))}.`);
}

export function isLeaf<Data>(node: TreeNode<Data>): node is LeafNode<Data> {
    return node.type === 'leaf';
}

export function nodeSize<Data>(node: TreeNode<Data>): number {
    return node.entries.length;
}

export function nodeCapacity<Data>(options: ResolvedTreeOptions, node: TreeNode<Data>): number {
    return isLeaf(node) ? options.maximumLeafEntries : options.maximumEntries;
}

export function isFull<Data>(options: ResolvedTreeOptions, node: TreeNode<Data>): boolean {
    return nodeSize(node) >= nodeCapacity(options, node);
}

export function makeLeaf<Data>(key: Point, data: Data): LeafNode<Data> {
    return {
        type: 'leaf',
        region: pointRegion(key),
        entries: [{ region: pointRegion(key), data }]
    };
}

/**
 * Index of the entry whose region grows least when it has to cover `key`;
 * ties go to the entry with the smaller region, then to the earlier entry.
 */
export function chooseSubtree<Data>(options: ResolvedTreeOptions, node: BranchNode<Data>, key: Point): number {
    const keyRegion = pointRegion(key);
    let minArea = Number.POSITIVE_INFINITY;
    let minEnlargement = Number.POSITIVE_INFINITY;
    let selectedIndex: number | undefined = undefined;
    for (let i = 0; i < node.entries.length; i++) {
        const entry = node.entries[i];
        if (entry === undefined) {
            throw new CorruptNodeError(`missing entry in live slot ${i} of ${node.entries.length}.`);
        }
        const entryArea = area(entry.region, options.dimensions);
        const entryEnlargement = area(combine(entry.region, keyRegion, options.dimensions), options.dimensions) - entryArea;
        if (entryEnlargement < minEnlargement || entryEnlargement === minEnlargement && entryArea < minArea) {
            minArea = entryArea;
            minEnlargement = entryEnlargement;
            selectedIndex = i;
        }
    }
    if (selectedIndex === undefined) {
        throw new CorruptNodeError('branch node has no entries to descend into.');
    }
    return selectedIndex;
}

function insertIntoLeaf<Data>(options: ResolvedTreeOptions, node: LeafNode<Data>, key: Point, data: Data): SplitResult<Data> | undefined {
    const entry: LeafEntry<Data> = { region: pointRegion(key), data };
    if (!isFull(options, node)) {
        node.entries.push(entry);
        expandPoint(node.region, key, options.dimensions);
        return undefined;
    }
    const packed = packEntries(node.entries, entry, (candidate) => 'data' in candidate);
    const split = rStarSplit(packed, options.maximumLeafEntries, options.minimumSplitFraction, options.dimensions);
    node.entries = split.lower.entries;
    node.region = split.lower.region;
    const sibling: LeafNode<Data> = {
        type: 'leaf',
        region: split.upper.region,
        entries: split.upper.entries
    };
    options.logger.debug('leaf split', {
        axis: split.axis,
        lower: split.lower.entries.length,
        upper: split.upper.entries.length
    });
    return { region: cloneRegion(sibling.region), sibling };
}

function insertIntoBranch<Data>(options: ResolvedTreeOptions, node: BranchNode<Data>, key: Point, data: Data): SplitResult<Data> | undefined {
    const selectedIndex = chooseSubtree(options, node, key);
    const selected = node.entries[selectedIndex];
    if (selected === undefined) {
        throw new CorruptNodeError(`missing entry in live slot ${selectedIndex} of ${node.entries.length}.`);
    }
    const childSplit = insertIntoNode(options, selected.child, key, data);
    if (childSplit === undefined) {
        expandPoint(selected.region, key, options.dimensions);
        expandPoint(node.region, key, options.dimensions);
        return undefined;
    }
    // The child kept the lower half of its entries.
    selected.region = cloneRegion(selected.child.region);
    const entry: BranchEntry<Data> = { region: childSplit.region, child: childSplit.sibling };
    if (!isFull(options, node)) {
        node.entries.push(entry);
        expandPoint(node.region, key, options.dimensions);
        expand(node.region, entry.region, options.dimensions);
        return undefined;
    }
    const packed = packEntries(node.entries, entry, (candidate) => candidate.child !== undefined);
    const split = rStarSplit(packed, options.maximumEntries, options.minimumSplitFraction, options.dimensions);
    node.entries = split.lower.entries;
    node.region = split.lower.region;
    const sibling: BranchNode<Data> = {
        type: 'branch',
        region: split.upper.region,
        entries: split.upper.entries
    };
    options.logger.debug('branch split', {
        axis: split.axis,
        lower: split.lower.entries.length,
        upper: split.upper.entries.length
    });
    return { region: cloneRegion(sibling.region), sibling };
}

/**
 * Inserts `data` at `key` somewhere below `node`. Returns the new sibling when
 * `node` had to split; `node` itself then holds the lower half.
 */
export function insertIntoNode<Data>(options: ResolvedTreeOptions, node: TreeNode<Data>, key: Point, data: Data): SplitResult<Data> | undefined {
    switch (node.type) {
        case 'leaf':
            return insertIntoLeaf(options, node, key, data);
        case 'branch':
            return insertIntoBranch(options, node, key, data);
        default:
            return unknownNode(node);
    }
}
