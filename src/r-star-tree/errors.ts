/** A live slot is missing, or the tree reached a state insertion never produces. */
export class CorruptNodeError extends Error {
    constructor(message: string) {
        super(`Corrupt node: ${message}`);
        this.name = 'CorruptNodeError';
    }
}

export class InvalidTreeOptionsError extends Error {
    constructor(public readonly issues: string[]) {
        super(`Invalid tree options: ${issues.join('; ')}`);
        this.name = 'InvalidTreeOptionsError';
    }
}

export class DimensionMismatchError extends Error {
    constructor(
        public readonly expected: number,
        public readonly actual: number
    ) {
        super(`Expected a ${expected}-dimensional point, got ${actual} coordinates.`);
        this.name = 'DimensionMismatchError';
    }
}
