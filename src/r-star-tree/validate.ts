import { enclose, equals } from './bounds';
import { type TreeNode, nodeCapacity, unknownNode } from './node';
import type { Tree } from './index';

export interface Violation {
    /** Entry indices from the root down to the offending node. */
    path: number[];
    message: string;
}

interface Walk {
    violations: Violation[];
    leafDepths: Set<number>;
}

function checkNode<Data>(tree: Tree<Data>, node: TreeNode<Data>, path: number[], walk: Walk): void {
    const capacity = nodeCapacity(tree, node);
    if (node.entries.length === 0) {
        walk.violations.push({ path, message: `${node.type} node has no entries` });
        return;
    }
    if (node.entries.length > capacity) {
        walk.violations.push({ path, message: `${node.type} node holds ${node.entries.length} entries, capacity is ${capacity}` });
    }
    const tight = enclose(node.entries.map((entry) => entry.region), tree.dimensions);
    if (!equals(tight, node.region, tree.dimensions)) {
        walk.violations.push({ path, message: `${node.type} node region is not the union of its entries` });
    }
    switch (node.type) {
        case 'leaf':
            walk.leafDepths.add(path.length);
            node.entries.forEach((entry, index) => {
                if (!equals({ min: entry.region.min, max: entry.region.min }, entry.region, tree.dimensions)) {
                    walk.violations.push({ path: [...path, index], message: 'leaf entry region is not a point' });
                }
            });
            break;
        case 'branch':
            node.entries.forEach((entry, index) => {
                if (!equals(entry.region, entry.child.region, tree.dimensions)) {
                    walk.violations.push({ path: [...path, index], message: 'branch entry region differs from its child region' });
                }
                checkNode(tree, entry.child, [...path, index], walk);
            });
            break;
        default:
            unknownNode(node);
    }
}

/**
 * Walks the whole tree and reports every broken structural invariant:
 * capacities, tight regions, non-empty nodes and leaves all at one depth.
 * An empty tree is valid.
 */
export function validateTree<Data>(tree: Tree<Data>): Violation[] {
    const walk: Walk = { violations: [], leafDepths: new Set() };
    if (tree.root !== undefined) {
        checkNode(tree, tree.root, [], walk);
    }
    if (walk.leafDepths.size > 1) {
        walk.violations.push({ path: [], message: `leaves found at depths ${[...walk.leafDepths].sort((a, b) => a - b).join(', ')}` });
    }
    return walk.violations;
}
