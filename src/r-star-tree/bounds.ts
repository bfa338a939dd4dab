export type Point = number[];

export interface Region {
    min: number[];
    max: number[];
}

export interface Bounded {
    region: Region;
}

export function emptyRegion(dimensions: number): Region {
    const region: Region = { min: [], max: [] };
    for (let i = 0; i < dimensions; i++) {
        region.min[i] = Number.POSITIVE_INFINITY;
        region.max[i] = Number.NEGATIVE_INFINITY;
    }
    return region;
}

export function pointRegion(point: Point): Region {
    return { min: point.slice(), max: point.slice() };
}

export function cloneRegion(region: Region): Region {
    return { min: region.min.slice(), max: region.max.slice() };
}

export function lowerAt(region: Region, axis: number): number {
    return region.min[axis] ?? Number.POSITIVE_INFINITY;
}

export function upperAt(region: Region, axis: number): number {
    return region.max[axis] ?? Number.NEGATIVE_INFINITY;
}

function coordinateAt(point: Point, axis: number): number {
    return point[axis] ?? Number.NaN;
}

export function contains(region: Region, point: Point, dimensions: number): boolean {
    // Borders inclusively
    for (let i = 0; i < dimensions; i++) {
        const value = coordinateAt(point, i);
        if (value < lowerAt(region, i) || value > upperAt(region, i)) {
            return false;
        }
    }
    return true;
}

export function overlaps(a: Region, b: Region, dimensions: number): boolean {
    // Separating axis test, borders inclusively
    for (let i = 0; i < dimensions; i++) {
        if (upperAt(a, i) < lowerAt(b, i) || lowerAt(a, i) > upperAt(b, i)) {
            return false;
        }
    }
    return true;
}

export function area(region: Region, dimensions: number): number {
    let area = 1;
    for (let i = 0; i < dimensions; i++) {
        area *= upperAt(region, i) - lowerAt(region, i);
    }
    return area;
}

export function margin(region: Region, dimensions: number): number {
    let margin = 0;
    for (let i = 0; i < dimensions; i++) {
        margin += upperAt(region, i) - lowerAt(region, i);
    }
    return margin;
}

/**
 * Volume shared by two regions. Zero as soon as one axis has no positive
 * intersection extent, so touching boxes do not overlap.
 */
export function overlapVolume(a: Region, b: Region, dimensions: number): number {
    let volume = 1;
    for (let i = 0; i < dimensions; i++) {
        const extent = Math.min(upperAt(a, i), upperAt(b, i)) - Math.max(lowerAt(a, i), lowerAt(b, i));
        if (extent <= 0) {
            return 0;
        }
        volume *= extent;
    }
    return volume;
}

export function expand(region: Region, other: Region, dimensions: number): void {
    for (let i = 0; i < dimensions; i++) {
        if (lowerAt(other, i) < lowerAt(region, i)) {
            region.min[i] = lowerAt(other, i);
        }
        if (upperAt(other, i) > upperAt(region, i)) {
            region.max[i] = upperAt(other, i);
        }
    }
}

export function expandPoint(region: Region, point: Point, dimensions: number): void {
    for (let i = 0; i < dimensions; i++) {
        const value = coordinateAt(point, i);
        if (value < lowerAt(region, i)) {
            region.min[i] = value;
        }
        if (value > upperAt(region, i)) {
            region.max[i] = value;
        }
    }
}

export function combine(a: Region, b: Region, dimensions: number): Region {
    const region = cloneRegion(a);
    expand(region, b, dimensions);
    return region;
}

export function enclose(regions: Region[], dimensions: number): Region {
    const region = emptyRegion(dimensions);
    for (const other of regions) {
        expand(region, other, dimensions);
    }
    return region;
}

export function equals(a: Region, b: Region, dimensions: number): boolean {
    for (let i = 0; i < dimensions; i++) {
        if (lowerAt(a, i) !== lowerAt(b, i) || upperAt(a, i) !== upperAt(b, i)) {
            return false;
        }
    }
    return true;
}

/**
 * Smallest squared Euclidean distance from `point` to any point of `region`.
 * Zero when the point lies inside.
 */
export function distanceSquared(point: Point, region: Region, dimensions: number): number {
    let distance = 0;
    for (let i = 0; i < dimensions; i++) {
        const value = coordinateAt(point, i);
        const lower = lowerAt(region, i);
        const upper = upperAt(region, i);
        if (value < lower) {
            distance += (lower - value) * (lower - value);
        } else if (value > upper) {
            distance += (value - upper) * (value - upper);
        }
    }
    return distance;
}

export function pointDistanceSquared(a: Point, b: Point, dimensions: number): number {
    let distance = 0;
    for (let i = 0; i < dimensions; i++) {
        const difference = coordinateAt(a, i) - coordinateAt(b, i);
        distance += difference * difference;
    }
    return distance;
}
