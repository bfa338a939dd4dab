export {
    makeTree,
    insert,
    query,
    queryWithFilter,
    search,
    height,
    values,
    count,
    type Tree
} from './r-star-tree';
export { validateTree, type Violation } from './r-star-tree/validate';
export {
    type Point,
    type Region,
    emptyRegion,
    pointRegion,
    area,
    margin,
    contains,
    overlaps,
    expand,
    expandPoint,
    distanceSquared
} from './r-star-tree/bounds';
export type { TreeNode, LeafNode, BranchNode, LeafEntry, BranchEntry } from './r-star-tree/node';
export type { Filter } from './r-star-tree/query';
export { type TreeOptions, type ResolvedTreeOptions, treeOptionsSchema } from './r-star-tree/options';
export { type TreeLogger, type LogFields, createJsonLogger, silentLogger } from './r-star-tree/logger';
export { CorruptNodeError, InvalidTreeOptionsError, DimensionMismatchError } from './r-star-tree/errors';
