import { type Bounded, type Region, area, cloneRegion, emptyRegion, enclose, expand, lowerAt, margin, overlapVolume } from './bounds';
import { CorruptNodeError } from './errors';
import { minimumSplitCount } from './options';

export interface SplitGroup<Entry extends Bounded> {
    region: Region;
    entries: Entry[];
}

export interface Split<Entry extends Bounded> {
    axis: number;
    /** Number of entries that went to the lower group. */
    index: number;
    lower: SplitGroup<Entry>;
    upper: SplitGroup<Entry>;
}

interface SplitCandidate {
    axis: number;
    index: number;
    overlap: number;
    margin: number;
    area: number;
}

/**
 * Collects the live entries of a full node followed by the incoming one.
 * A live slot without a region or payload means the node was corrupted.
 */
export function packEntries<Entry extends Bounded>(entries: Entry[], incoming: Entry, hasPayload: (entry: Entry) => boolean): Entry[] {
    const packed: Entry[] = [];
    for (let i = 0; i < entries.length; i++) {
        const entry = entries[i];
        if (entry === undefined || entry.region === undefined || !hasPayload(entry)) {
            throw new CorruptNodeError(`missing region or payload in live slot ${i} of ${entries.length}.`);
        }
        packed.push(entry);
    }
    packed.push(incoming);
    return packed;
}

function sortByAxis<Entry extends Bounded>(entries: Entry[], axis: number): Entry[] {
    return entries.slice().sort((a, b) => lowerAt(a.region, axis) - lowerAt(b.region, axis));
}

function prefixRegions<Entry extends Bounded>(entries: Entry[], dimensions: number): Region[] {
    const regions: Region[] = [];
    const running = emptyRegion(dimensions);
    for (const entry of entries) {
        expand(running, entry.region, dimensions);
        regions.push(cloneRegion(running));
    }
    return regions;
}

function suffixRegions<Entry extends Bounded>(entries: Entry[], dimensions: number): Region[] {
    const regions: Region[] = new Array<Region>(entries.length);
    const running = emptyRegion(dimensions);
    for (let i = entries.length - 1; i >= 0; i--) {
        const entry = entries[i];
        if (entry !== undefined) {
            expand(running, entry.region, dimensions);
        }
        regions[i] = cloneRegion(running);
    }
    return regions;
}

function isBetter(candidate: SplitCandidate, best: SplitCandidate | undefined): boolean {
    if (best === undefined) {
        return true;
    }
    if (candidate.overlap !== best.overlap) {
        return candidate.overlap < best.overlap;
    }
    if (candidate.margin !== best.margin) {
        return candidate.margin < best.margin;
    }
    return candidate.area < best.area;
}

/**
 * R*-style split of `capacity + 1` entries into two groups.
 *
 * Every axis is tried with the entries sorted by their lower coordinate, and
 * every split index that leaves at least `minimumSplitCount` entries on each
 * side. The winner minimises overlap, then margin, then area; on exact ties
 * the first candidate examined is kept.
 */
export function rStarSplit<Entry extends Bounded>(entries: Entry[], capacity: number, minimumSplitFraction: number, dimensions: number): Split<Entry> {
    const minimumCount = minimumSplitCount(capacity, minimumSplitFraction);
    let best: SplitCandidate | undefined = undefined;
    for (let axis = 0; axis < dimensions; axis++) {
        const sorted = sortByAxis(entries, axis);
        const lowers = prefixRegions(sorted, dimensions);
        const uppers = suffixRegions(sorted, dimensions);
        for (let k = minimumCount; k <= sorted.length - minimumCount; k++) {
            const lower = lowers[k - 1];
            const upper = uppers[k];
            if (lower === undefined || upper === undefined) {
                continue;
            }
            const candidate: SplitCandidate = {
                axis,
                index: k,
                overlap: overlapVolume(lower, upper, dimensions),
                margin: margin(lower, dimensions) + margin(upper, dimensions),
                area: area(lower, dimensions) + area(upper, dimensions)
            };
            if (isBetter(candidate, best)) {
                best = candidate;
            }
        }
    }
    if (best === undefined) {
        throw new CorruptNodeError(`could not find a valid split for ${entries.length} entries.`);
    }
    const sorted = sortByAxis(entries, best.axis);
    const lowerEntries = sorted.slice(0, best.index);
    const upperEntries = sorted.slice(best.index);
    return {
        axis: best.axis,
        index: best.index,
        lower: {
            region: enclose(lowerEntries.map((entry) => entry.region), dimensions),
            entries: lowerEntries
        },
        upper: {
            region: enclose(upperEntries.map((entry) => entry.region), dimensions),
            entries: upperEntries
        }
    };
}
