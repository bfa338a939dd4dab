// ---------------------------------------------------------------------------
// Binary heap keyed by a numeric priority.
// ---------------------------------------------------------------------------
// `order: 'min'` pops the lowest priority first, `order: 'max'` the highest.
// Equal priorities are ordered by insertion sequence: a min-heap pops the
// earliest pushed first, a max-heap pops the latest pushed first, so draining
// a max-heap and reversing the result yields ascending priority with earlier
// pushes ahead of later ones.
// ---------------------------------------------------------------------------

export interface HeapEntry<T> {
    item: T;
    priority: number;
    seq: number;
}

export interface Heap<T> {
    order: 'min' | 'max';
    entries: HeapEntry<T>[];
    nextSeq: number;
}

export function createHeap<T>(order: 'min' | 'max'): Heap<T> {
    return { order, entries: [], nextSeq: 0 };
}

function before<T>(heap: Heap<T>, a: HeapEntry<T>, b: HeapEntry<T>): boolean {
    if (a.priority !== b.priority) {
        return heap.order === 'min' ? a.priority < b.priority : a.priority > b.priority;
    }
    return heap.order === 'min' ? a.seq < b.seq : a.seq > b.seq;
}

function siftUp<T>(heap: Heap<T>, index: number): void {
    const entries = heap.entries;
    let current = entries[index];
    while (index > 0 && current !== undefined) {
        const parentIndex = (index - 1) >> 1;
        const parent = entries[parentIndex];
        if (parent === undefined || !before(heap, current, parent)) {
            break;
        }
        entries[parentIndex] = current;
        entries[index] = parent;
        index = parentIndex;
        current = entries[index];
    }
}

function siftDown<T>(heap: Heap<T>, index: number): void {
    const entries = heap.entries;
    while (true) {
        let first = index;
        const left = 2 * index + 1;
        const right = 2 * index + 2;
        const leftEntry = entries[left];
        const rightEntry = entries[right];
        let firstEntry = entries[first];
        if (firstEntry === undefined) {
            return;
        }
        if (leftEntry !== undefined && before(heap, leftEntry, firstEntry)) {
            first = left;
            firstEntry = leftEntry;
        }
        if (rightEntry !== undefined && before(heap, rightEntry, firstEntry)) {
            first = right;
            firstEntry = rightEntry;
        }
        if (first === index) {
            return;
        }
        const swap = entries[index];
        if (swap === undefined) {
            return;
        }
        entries[index] = firstEntry;
        entries[first] = swap;
        index = first;
    }
}

export function heapPush<T>(heap: Heap<T>, item: T, priority: number): void {
    heap.entries.push({ item, priority, seq: heap.nextSeq++ });
    siftUp(heap, heap.entries.length - 1);
}

export function heapPop<T>(heap: Heap<T>): HeapEntry<T> | undefined {
    const top = heap.entries[0];
    const last = heap.entries.pop();
    if (top === undefined || last === undefined) {
        return undefined;
    }
    if (heap.entries.length > 0) {
        heap.entries[0] = last;
        siftDown(heap, 0);
    }
    return top;
}

/** Priority of the entry `heapPop` would return next. */
export function heapPeekPriority<T>(heap: Heap<T>): number | undefined {
    return heap.entries[0]?.priority;
}

export function heapSize<T>(heap: Heap<T>): number {
    return heap.entries.length;
}
