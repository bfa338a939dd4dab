import { describe, it, expect } from 'vitest';
import { type Region, enclose } from '../bounds';
import { CorruptNodeError } from '../errors';
import { insert, makeTree, query, search, values } from '../index';
import { type LogFields, type TreeLogger, silentLogger } from '../logger';
import { type BranchNode, type LeafNode, chooseSubtree, insertIntoNode, isFull, makeLeaf } from '../node';
import { resolveOptions } from '../options';
import { validateTree } from '../validate';

interface Logged {
    message: string;
    fields: LogFields | undefined;
}

function recordingLogger(logged: Logged[]): TreeLogger {
    return {
        debug(message, fields) {
            logged.push({ message, fields });
        }
    };
}

function branch(regions: Region[]): BranchNode<string> {
    return {
        type: 'branch',
        region: enclose(regions, 2),
        entries: regions.map((region, index) => ({ region, child: makeLeaf(region.min, `leaf-${index}`) }))
    };
}

function leafData(node: LeafNode<string>): string[] {
    return node.entries.map((entry) => entry.data);
}

describe('chooseSubtree', () => {
    const options = resolveOptions({ dimensions: 2, maximumEntries: 4, logger: silentLogger });

    it('picks the entry needing the least enlargement', () => {
        const node = branch([
            { min: [0, 0], max: [1, 1] },
            { min: [5, 5], max: [6, 6] }
        ]);
        expect(chooseSubtree(options, node, [2, 2])).toBe(0);
        expect(chooseSubtree(options, node, [4, 4])).toBe(1);
    });

    it('breaks enlargement ties by the smaller area', () => {
        const node = branch([
            { min: [0, 0], max: [4, 4] },
            { min: [1, 1], max: [3, 3] }
        ]);
        expect(chooseSubtree(options, node, [2, 2])).toBe(1);
    });

    it('breaks full ties by the earlier entry', () => {
        const node = branch([
            { min: [0, 0], max: [2, 2] },
            { min: [0, 0], max: [2, 2] }
        ]);
        expect(chooseSubtree(options, node, [1, 1])).toBe(0);
    });
});

describe('insertIntoNode on a leaf', () => {
    it('appends while there is room', () => {
        const options = resolveOptions({ dimensions: 2, maximumLeafEntries: 2, logger: silentLogger });
        const leaf = makeLeaf([0, 0], 'a');
        expect(insertIntoNode(options, leaf, [3, -1], 'b')).toBeUndefined();
        expect(leafData(leaf)).toEqual(['a', 'b']);
        expect(leaf.region).toEqual({ min: [0, -1], max: [3, 0] });
        expect(isFull(options, leaf)).toBe(true);
    });

    it('splits when full and hands back the upper half', () => {
        const logged: Logged[] = [];
        const options = resolveOptions({ dimensions: 2, maximumLeafEntries: 2, logger: recordingLogger(logged) });
        const leaf = makeLeaf([0, 0], 'a');
        insertIntoNode(options, leaf, [10, 10], 'b');
        const split = insertIntoNode(options, leaf, [1, 1], 'c');
        expect(split).toBeDefined();
        expect(leafData(leaf)).toEqual(['a', 'c']);
        expect(leaf.region).toEqual({ min: [0, 0], max: [1, 1] });
        expect(split?.region).toEqual({ min: [10, 10], max: [10, 10] });
        expect(split?.sibling.type).toBe('leaf');
        expect(split?.sibling.entries.length).toBe(1);
        expect(logged).toEqual([{ message: 'leaf split', fields: { axis: 0, lower: 2, upper: 1 } }]);
    });
});

describe('insertIntoNode on a branch', () => {
    it('grows the chosen entry and the node region without splitting', () => {
        const options = resolveOptions({ dimensions: 2, maximumEntries: 4, logger: silentLogger });
        const node = branch([
            { min: [0, 0], max: [0, 0] },
            { min: [5, 5], max: [5, 5] }
        ]);
        expect(insertIntoNode(options, node, [6, 7], 'x')).toBeUndefined();
        expect(node.entries[1]?.region).toEqual({ min: [5, 5], max: [6, 7] });
        expect(node.entries[1]?.child.region).toEqual({ min: [5, 5], max: [6, 7] });
        expect(node.region).toEqual({ min: [0, 0], max: [6, 7] });
    });
});

interface Cyclic {
    self?: Cyclic;
}

function treeWithBogusRoot<Data>(data: Data) {
    const tree = makeTree<Data>({ dimensions: 1, logger: silentLogger });
    insert(tree, [0], data);
    if (tree.root !== undefined) {
        Reflect.set(tree.root, 'type', 'bogus');
    }
    return tree;
}

describe('corrupted nodes', () => {
    const unknownVariant = 'Corrupt node: unknown node variant bogus.';

    it('refuses to insert below a node of unknown type', () => {
        const tree = treeWithBogusRoot('plain');
        expect(() => insert(tree, [1], 'more')).toThrow(CorruptNodeError);
        expect(() => insert(tree, [1], 'more')).toThrow(unknownVariant);
    });

    it('refuses to read from a node of unknown type', () => {
        const tree = treeWithBogusRoot('plain');
        expect(() => query(tree, [0], 1)).toThrow(unknownVariant);
        expect(() => search(tree, { min: [0], max: [1] })).toThrow(unknownVariant);
        expect(() => values(tree)).toThrow(unknownVariant);
        expect(() => validateTree(tree)).toThrow(unknownVariant);
    });

    it('names only the bad type, whatever the stored values are', () => {
        const cyclic: Cyclic = {};
        cyclic.self = cyclic;
        expect(() => query(treeWithBogusRoot(1n), [0], 1)).toThrow(unknownVariant);
        expect(() => insert(treeWithBogusRoot(cyclic), [1], cyclic)).toThrow(unknownVariant);
        expect(() => query(treeWithBogusRoot(cyclic), [0], 1)).toThrow(CorruptNodeError);
    });

    it('refuses to split a branch with a child missing from a live slot', () => {
        const options = resolveOptions({ dimensions: 1, maximumEntries: 2, maximumLeafEntries: 1, logger: silentLogger });
        const first = { region: { min: [0], max: [0] }, child: makeLeaf([0], 'a') };
        const second = { region: { min: [10], max: [10] }, child: makeLeaf([10], 'b') };
        const node: BranchNode<string> = {
            type: 'branch',
            region: { min: [0], max: [10] },
            entries: [first, second]
        };
        Reflect.deleteProperty(first, 'child');
        expect(() => insertIntoNode(options, node, [20], 'c')).toThrow(CorruptNodeError);
        expect(() => insertIntoNode(options, node, [20], 'c')).toThrow('Corrupt node: missing region or payload in live slot 0 of 2.');
    });
});
